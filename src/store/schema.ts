import type Database from "better-sqlite3";
import { legacyIdentifier } from "../core/identifier";

export const CURRENT_SCHEMA_VERSION = 2;

export const GENERATION_1_SQL = `
    CREATE TABLE IF NOT EXISTS \`values\` (
        \`id\` TEXT NOT NULL,
        \`bool\` BOOLEAN,
        \`u8\` UNSIGNED INT(1),
        \`i8\` INT(1),
        \`u16\` UNSIGNED INT(2),
        \`i16\` INT(2),
        \`u32\` UNSIGNED INT(4),
        \`i32\` INT(4),
        \`u64\` UNSIGNED INT(8),
        \`i64\` INT(8),
        \`f32\` FLOAT(4),
        \`f64\` FLOAT(8),
        \`str\` TEXT,
        PRIMARY KEY (\`id\`)
    );
    CREATE TABLE IF NOT EXISTS \`links\` (
        \`source_id\` TEXT NOT NULL,
        \`key_id\` TEXT,
        \`target_id\` TEXT NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS \`data_id\` ON \`values\` (\`id\`);
    CREATE INDEX IF NOT EXISTS \`links_source_id\` ON \`links\` (\`source_id\`);
    CREATE INDEX IF NOT EXISTS \`links_key_id\` ON \`links\` (\`key_id\`);
    CREATE INDEX IF NOT EXISTS \`links_keyed\` ON \`links\` (\`source_id\`, \`key_id\`);
`;

/** Registered on the connection before the generation 2 rewrite runs. */
export const LEGACY_UUID_FUNCTION = "legacy_uuid";

// Rewrites both tables into fresh ones and swaps them in. Everything here
// runs inside the migration's transaction.
export const GENERATION_2_SQL = `
    DROP INDEX IF EXISTS \`data_id\`;
    DROP INDEX IF EXISTS \`links_source_id\`;
    DROP INDEX IF EXISTS \`links_key_id\`;
    DROP INDEX IF EXISTS \`links_keyed\`;
    DROP TABLE IF EXISTS \`values_new\`;
    DROP TABLE IF EXISTS \`links_new\`;

    CREATE TABLE \`values_new\` (
        \`uuid\` BLOB NOT NULL UNIQUE CHECK(length(uuid) = 16),
        \`bool\` BOOLEAN,
        \`u8\` UNSIGNED INT(1),
        \`i8\` INT(1),
        \`u16\` UNSIGNED INT(2),
        \`i16\` INT(2),
        \`u32\` UNSIGNED INT(4),
        \`i32\` INT(4),
        \`u64\` UNSIGNED INT(8),
        \`i64\` INT(8),
        \`f32\` FLOAT(4),
        \`f64\` FLOAT(8),
        \`str\` TEXT,
        PRIMARY KEY (\`uuid\`)
    );
    INSERT INTO \`values_new\`
        (\`uuid\`, \`bool\`, \`u8\`, \`i8\`, \`u16\`, \`i16\`, \`u32\`, \`i32\`, \`u64\`, \`i64\`, \`f32\`, \`f64\`, \`str\`)
    SELECT ${LEGACY_UUID_FUNCTION}(\`id\`),
        \`bool\`, \`u8\`, \`i8\`, \`u16\`, \`i16\`, \`u32\`, \`i32\`, \`u64\`, \`i64\`, \`f32\`, \`f64\`, \`str\`
    FROM \`values\`;
    DROP TABLE \`values\`;
    ALTER TABLE \`values_new\` RENAME TO \`values\`;

    CREATE TABLE \`links_new\` (
        \`source_uuid\` BLOB NOT NULL CHECK(length(source_uuid) = 16),
        \`key_uuid\` BLOB CHECK(length(key_uuid) = 16),
        \`target_uuid\` BLOB NOT NULL CHECK(length(target_uuid) = 16)
    );
    INSERT INTO \`links_new\` (\`source_uuid\`, \`key_uuid\`, \`target_uuid\`)
    SELECT ${LEGACY_UUID_FUNCTION}(\`source_id\`),
        ${LEGACY_UUID_FUNCTION}(\`key_id\`),
        ${LEGACY_UUID_FUNCTION}(\`target_id\`)
    FROM \`links\`
    ORDER BY rowid;
    DROP TABLE \`links\`;
    ALTER TABLE \`links_new\` RENAME TO \`links\`;

    CREATE UNIQUE INDEX \`data_id\` ON \`values\` (\`uuid\`);
    CREATE INDEX \`data_strs\` ON \`values\` (\`str\`);
    CREATE INDEX \`links_source\` ON \`links\` (\`source_uuid\`);
    CREATE INDEX \`links_key\` ON \`links\` (\`key_uuid\`);
    CREATE INDEX \`links_target\` ON \`links\` (\`target_uuid\`);
    CREATE INDEX \`links_keyed\` ON \`links\` (\`source_uuid\`, \`key_uuid\`);
`;

export interface Migration {
	version: number;
	description: string;
	/** Runs before the step's transaction opens. */
	prepare?: (db: Database.Database) => void;
	sql?: string;
	up?: (db: Database.Database) => void;
	/** Row counts of both tables must survive the step unchanged. */
	preservesRows?: boolean;
}

export function registerLegacyUuid(db: Database.Database): void {
	db.function(LEGACY_UUID_FUNCTION, { deterministic: true }, (id: unknown) => {
		if (id === null || id === undefined) return null;
		if (Buffer.isBuffer(id) && id.byteLength === 16) return id;
		if (Buffer.isBuffer(id)) return legacyIdentifier(id.toString("hex"));
		return legacyIdentifier(String(id));
	});
}

export const MIGRATIONS: readonly Migration[] = [
	{
		version: 1,
		description: "Genesis: values and links with text identifiers",
		sql: GENERATION_1_SQL,
	},
	{
		version: 2,
		description: "16-byte binary identifiers, string and target indexes",
		prepare: registerLegacyUuid,
		sql: GENERATION_2_SQL,
		preservesRows: true,
	},
];
