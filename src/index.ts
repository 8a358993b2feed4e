export { GraphDB, type GraphDBOptions, type GraphStats, type JournalMode } from "./store/db";
export { type GraphConfig, GraphConfigSchema, loadConfig } from "./store/config";
export {
	type MigrateOptions,
	type MigrationResult,
	newestGeneration,
	readGeneration,
	runMigrations,
} from "./store/migrate";
export {
	CURRENT_SCHEMA_VERSION,
	GENERATION_1_SQL,
	GENERATION_2_SQL,
	MIGRATIONS,
	type Migration,
} from "./store/schema";
export { ValueStore, type StringMatch, type WritePolicy } from "./data/ValueStore";
export { type Edge, type EdgeHandle, LinkStore } from "./data/LinkStore";
export * from "./core/errors";
export * from "./core/identifier";
export * from "./core/typedValue";
export type { Fact, FactLink } from "./types/fact";
export {
	type IntegrityReport,
	type IntegrityRule,
	type IntegrityWarning,
	IntegrityValidator,
} from "./utils/validator";
