import type Database from "better-sqlite3";
import {
	MigrationFailedError,
	UnsupportedGenerationError,
	isGraphStoreError,
} from "../core/errors";
import { type IntegrityReport, IntegrityValidator } from "../utils/validator";
import { readPragmaNumber } from "../utils/sqlite";
import { MIGRATIONS, type Migration } from "./schema";

export interface MigrateOptions {
	/** Stop at this generation instead of the newest one. */
	to?: number;
	migrations?: readonly Migration[];
}

export interface MigrationResult {
	from: number;
	to: number;
	applied: number[];
	/** Report of the last step that ran an integrity pass. */
	integrity: IntegrityReport | null;
}

export function readGeneration(db: Database.Database): number {
	return readPragmaNumber(db, "user_version");
}

export function newestGeneration(migrations: readonly Migration[] = MIGRATIONS): number {
	return migrations.reduce((max, m) => Math.max(max, m.version), 0);
}

/**
 * Brings the store up to the target generation, one exclusive transaction
 * per step. The generation is written last inside each step, so a failed
 * step leaves the store at the generation it started from.
 *
 * @throws UnsupportedGenerationError when the store is newer than `migrations`
 * @throws MigrationFailedError when a step fails; earlier steps stay applied
 */
export function runMigrations(db: Database.Database, options: MigrateOptions = {}): MigrationResult {
	const migrations = [...(options.migrations ?? MIGRATIONS)].sort((a, b) => a.version - b.version);
	const newest = newestGeneration(migrations);
	const target = options.to ?? newest;
	const from = readGeneration(db);

	if (from > newest) {
		throw new UnsupportedGenerationError(from, newest);
	}
	if (target > newest) {
		throw new UnsupportedGenerationError(target, newest);
	}

	const result: MigrationResult = { from, to: from, applied: [], integrity: null };
	if (from >= target) return result;

	console.log(`📦 GraphDB: Migrating from v${from} to v${target}...`);

	let current = from;
	for (const migration of migrations) {
		if (migration.version <= current || migration.version > target) continue;
		if (migration.version !== current + 1) {
			throw new MigrationFailedError(
				migration.version,
				`no migration from v${current} to v${current + 1}`,
			);
		}

		const report = applyStep(db, migration, current);
		if (report) {
			result.integrity = report;
		}
		current = migration.version;
		result.to = current;
		result.applied.push(current);
		console.log(`   ✅ v${current}: ${migration.description}`);
	}

	return result;
}

function applyStep(
	db: Database.Database,
	migration: Migration,
	expected: number,
): IntegrityReport | null {
	const validator = new IntegrityValidator();

	const step = db.transaction((): IntegrityReport | null => {
		const generation = readGeneration(db);
		if (generation !== expected) {
			throw new MigrationFailedError(
				migration.version,
				`store moved to v${generation} while waiting to migrate from v${expected}`,
			);
		}

		if (migration.preservesRows) {
			validator.captureBaseline(db);
		}
		if (migration.sql) {
			db.exec(migration.sql);
		}
		migration.up?.(db);

		let report: IntegrityReport | null = null;
		if (migration.preservesRows) {
			report = validator.validate(db, { expectUnchanged: true });
			if (!report.passed) {
				validator.printReport(report);
				throw new MigrationFailedError(
					migration.version,
					report.errors.map((e) => e.message).join("; "),
				);
			}
		}

		db.pragma(`user_version = ${migration.version}`);
		return report;
	});

	try {
		migration.prepare?.(db);
		const report = step.exclusive();
		if (report && report.warnings.length > 0) {
			validator.printReport(report);
		}
		return report;
	} catch (error) {
		console.error(`❌ Failed to migrate to v${migration.version}:`, error);
		if (isGraphStoreError(error, "MigrationFailed")) throw error;
		const message = error instanceof Error ? error.message : String(error);
		throw new MigrationFailedError(migration.version, message, { cause: error });
	}
}
