import type Database from "better-sqlite3";

/**
 * SQLite integers come back as number or bigint depending on the
 * statement's safe-integer mode.
 */
export function toNumber(value: unknown): number {
	if (typeof value === "number") return value;
	if (typeof value === "bigint") return Number(value);
	throw new TypeError(`Expected an integer from SQLite, got ${typeof value}`);
}

export function readPragmaNumber(db: Database.Database, pragma: string): number {
	return toNumber(db.pragma(pragma, { simple: true }));
}

export function isInMemory(db: Database.Database): boolean {
	return db.memory || db.name === "" || db.name === ":memory:";
}
