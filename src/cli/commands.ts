import { existsSync } from "fs";
import { parseArgs } from "util";
import Database from "better-sqlite3";
import { GraphDB } from "../store/db";
import { loadConfig } from "../store/config";
import { newestGeneration, readGeneration, runMigrations } from "../store/migrate";
import { IntegrityValidator } from "../utils/validator";

class CliError extends Error {}

/**
 * Runs one CLI invocation and returns the process exit code.
 * @param argv arguments after the executable and script name
 */
export function main(argv: string[]): number {
	const { positionals } = parseArgs({
		args: argv,
		options: {},
		allowPositionals: true,
		strict: false,
	});

	const cmd = positionals[0] ?? "help";
	try {
		const path = positionals[1] ?? loadConfig().database.path;
		switch (cmd) {
			case "migrate":
				runMigrateCommand(path);
				break;
			case "status":
				runStatusCommand(path);
				break;
			case "check":
				return runCheckCommand(path);
			default:
				printHelp();
				return cmd === "help" ? 0 : 1;
		}
		return 0;
	} catch (error) {
		if (error instanceof CliError) {
			console.error(`❌ ${error.message}`);
		} else {
			console.error("\n❌ Fatal Error:", error);
		}
		return 1;
	}
}

function requireStore(path: string): void {
	if (!existsSync(path)) {
		throw new CliError(`No database found at ${path}`);
	}
}

function runMigrateCommand(path: string) {
	requireStore(path);
	const target = newestGeneration();

	console.log(`Opening database at ${path}`);
	const db = new Database(path, { fileMustExist: true });
	try {
		const current = readGeneration(db);
		console.log(`Current schema version: ${current}`);
		console.log(`Target schema version: ${target}`);
		if (current === target) {
			throw new CliError("Already migrated");
		}

		console.log("Migrating...");
		const result = runMigrations(db);
		for (const version of result.applied) {
			console.log(`Migrated to version ${version}`);
		}
		console.log("Done");

		console.log("Checking schema version...");
		const now = readGeneration(db);
		console.log(`Schema version now: ${now}`);
		if (now !== target) {
			throw new CliError(`Schema version mismatch: current=${now}, target=${target}`);
		}
		console.log("Migration successful");
	} finally {
		db.close();
	}
}

function readStoreGeneration(path: string): number {
	const db = new Database(path, { readonly: true, fileMustExist: true });
	try {
		return readGeneration(db);
	} finally {
		db.close();
	}
}

function runStatusCommand(path: string) {
	requireStore(path);
	const generation = readStoreGeneration(path);
	const target = newestGeneration();
	if (generation < target) {
		console.log(`📊 ${path}`);
		console.log(`   - Generation: ${generation}`);
		console.log(`   - Pending: migration to v${target}; run "valuegraph migrate ${path}"`);
		return;
	}

	const db = GraphDB.open({ path });
	try {
		const stats = db.stats();
		console.log(`📊 ${path}`);
		console.log(`   - Generation: ${stats.generation}`);
		console.log(`   - Values: ${stats.values}`);
		console.log(`   - Links: ${stats.links} (${stats.unlabeledLinks} unlabeled)`);
		console.log(`   - Size: ${stats.dbSizeBytes} bytes`);
	} finally {
		db.close();
	}
}

function runCheckCommand(path: string): number {
	requireStore(path);
	const generation = readStoreGeneration(path);
	const target = newestGeneration();
	if (generation < target) {
		throw new CliError(
			`Store is at schema version ${generation}, target is ${target}; run "valuegraph migrate" first`,
		);
	}

	const db = GraphDB.open({ path });
	try {
		const report = db.checkIntegrity();
		new IntegrityValidator().printReport(report);
		return report.passed ? 0 : 1;
	} finally {
		db.close();
	}
}

function printHelp() {
	console.log(`
valuegraph <command> [path]

Commands:
  migrate   Upgrade the store at [path] to the newest schema generation
  status    Print generation and row counts (never migrates)
  check     Run the link integrity check on a migrated store

[path] defaults to database.path from valuegraph.settings.json
`);
}
