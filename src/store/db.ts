import { mkdirSync } from "fs";
import { dirname } from "path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import * as schema from "../db/schema";
import { LinkStore } from "../data/LinkStore";
import { type GraphOrm, ValueStore, type WritePolicy } from "../data/ValueStore";
import { type IdentifierLike, newIdentifier, toIdentifier } from "../core/identifier";
import type { Fact } from "../types/fact";
import { type IntegrityReport, IntegrityValidator } from "../utils/validator";
import { isInMemory, readPragmaNumber } from "../utils/sqlite";
import type { GraphConfig } from "./config";
import { type MigrationResult, readGeneration, runMigrations } from "./migrate";
import type { Migration } from "./schema";

export type JournalMode = GraphConfig["database"]["journalMode"];

export interface GraphDBOptions {
	/** File to open; `:memory:` (the default) keeps the store in memory. */
	path?: string;
	/** Use an already open connection instead of opening `path`. */
	connection?: Database.Database;
	writePolicy?: WritePolicy;
	journalMode?: JournalMode;
	busyTimeoutMs?: number;
	/** Override the built-in migration list. */
	migrations?: readonly Migration[];
}

export interface GraphStats {
	generation: number;
	values: number;
	links: number;
	unlabeledLinks: number;
	dbSizeBytes: number;
}

/**
 * An open graph store. Opening runs every pending migration; a failed
 * migration closes the connection and rethrows, so no GraphDB exists at a
 * half-migrated generation.
 */
export class GraphDB {
	private db: Database.Database;
	private orm: GraphOrm;
	readonly values: ValueStore;
	readonly links: LinkStore;
	readonly migration: MigrationResult;

	constructor(options: GraphDBOptions = {}) {
		this.db = options.connection ?? openConnection(options.path ?? ":memory:");

		try {
			if (!isInMemory(this.db)) {
				this.db.pragma(`journal_mode = ${options.journalMode ?? "WAL"}`);
			}
			this.db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
			this.db.defaultSafeIntegers(true);

			this.migration = runMigrations(this.db, { migrations: options.migrations });
		} catch (error) {
			this.db.close();
			throw error;
		}

		this.orm = drizzle(this.db, { schema });
		this.values = new ValueStore(this.orm, options.writePolicy);
		this.links = new LinkStore(this.db, this.orm);
	}

	static open(options: GraphDBOptions = {}): GraphDB {
		return new GraphDB(options);
	}

	static fromConfig(config: GraphConfig, overrides: GraphDBOptions = {}): GraphDB {
		return new GraphDB({
			path: config.database.path,
			journalMode: config.database.journalMode,
			busyTimeoutMs: config.database.busyTimeoutMs,
			writePolicy: config.store.writePolicy,
			...overrides,
		});
	}

	get generation(): number {
		return readGeneration(this.db);
	}

	getRawDb(): Database.Database {
		return this.db;
	}

	/** Runs `fn` in one transaction; nested calls become savepoints. */
	transaction<T>(fn: () => T): T {
		return this.db.transaction(fn)();
	}

	/**
	 * Writes a value and its outgoing links, storing nested facts first.
	 * @returns the id of the top-level value
	 */
	store(fact: Fact): Buffer {
		return this.transaction(() => this.storeFact(fact));
	}

	private storeFact(fact: Fact): Buffer {
		const id = fact.id === undefined ? newIdentifier() : toIdentifier(fact.id);
		this.values.put(id, fact.value);

		for (const link of fact.links ?? []) {
			const key = link.key === undefined ? null : this.resolve(link.key);
			const target = this.resolve(link.target);
			this.links.addEdge(id, key, target);
		}
		return id;
	}

	private resolve(ref: Fact | IdentifierLike): Buffer {
		if (typeof ref === "string" || ref instanceof Uint8Array) {
			return toIdentifier(ref);
		}
		return this.storeFact(ref);
	}

	checkIntegrity(): IntegrityReport {
		return new IntegrityValidator().validate(this.db);
	}

	stats(): GraphStats {
		return {
			generation: this.generation,
			values: this.values.count(),
			links: this.links.count(),
			unlabeledLinks: this.links.countUnlabeled(),
			dbSizeBytes:
				readPragmaNumber(this.db, "page_count") * readPragmaNumber(this.db, "page_size"),
		};
	}

	checkpoint(): void {
		if (!isInMemory(this.db)) {
			this.db.pragma("wal_checkpoint(TRUNCATE)");
		}
	}

	close(): void {
		this.db.close();
	}
}

function openConnection(path: string): Database.Database {
	if (path !== ":memory:" && path !== "") {
		mkdirSync(dirname(path), { recursive: true });
	}
	return new Database(path);
}
