import type Database from "better-sqlite3";
import { runMigrations } from "@src/store/migrate";

export interface LegacyValue {
	id: string;
	u32?: number;
	bool?: boolean;
	str?: string;
}

export interface LegacyLink {
	source: string;
	key: string | null;
	target: string;
}

/**
 * Brings a connection to generation 1 and writes rows with text ids, the
 * way a generation 1 writer stored them.
 */
export function seedGenerationOne(
	db: Database.Database,
	rows: { values?: LegacyValue[]; links?: LegacyLink[] } = {},
): void {
	runMigrations(db, { to: 1 });

	const insertValue = db.prepare(
		"INSERT INTO `values` (id, u32, bool, str) VALUES (?, ?, ?, ?)",
	);
	for (const value of rows.values ?? []) {
		insertValue.run(
			value.id,
			value.u32 ?? null,
			value.bool === undefined ? null : value.bool ? 1 : 0,
			value.str ?? null,
		);
	}

	const insertLink = db.prepare(
		"INSERT INTO links (source_id, key_id, target_id) VALUES (?, ?, ?)",
	);
	for (const link of rows.links ?? []) {
		insertLink.run(link.source, link.key, link.target);
	}
}
