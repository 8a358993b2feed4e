import type Database from "better-sqlite3";
import { and, eq, isNull, sql } from "drizzle-orm";
import { links } from "../db/schema";
import { NotFoundError } from "../core/errors";
import { type IdentifierLike, toIdentifier } from "../core/identifier";
import { toNumber } from "../utils/sqlite";
import type { GraphOrm } from "./ValueStore";

/**
 * Addresses one link row. SQLite reuses the rowid of a removed row, so the
 * handle also carries the endpoints it was issued for; a handle whose row has
 * since been replaced by a different edge no longer matches anything.
 * Handles do not survive a migration that rewrites the table.
 */
export interface EdgeHandle {
	rowid: number;
	source: Buffer;
	key: Buffer | null;
	target: Buffer;
}

export interface Edge {
	handle: EdgeHandle;
	source: Buffer;
	key: Buffer | null;
	target: Buffer;
}

interface EdgeRow {
	handle: number | bigint;
	source: Buffer;
	key: Buffer | null;
	target: Buffer;
}

const EDGE_COLUMNS =
	"rowid AS handle, source_uuid AS source, key_uuid AS key, target_uuid AS target";

// drizzle has no streaming reads on better-sqlite3, so traversals prepare
// their own statements and hand out lazy iterators.
const SELECT_BY_HANDLE = `SELECT ${EDGE_COLUMNS} FROM links WHERE rowid = ? AND source_uuid = ? AND key_uuid IS ? AND target_uuid = ?`;
const SELECT_FROM = `SELECT ${EDGE_COLUMNS} FROM links WHERE source_uuid = ? ORDER BY rowid`;
const SELECT_FROM_WITH_KEY = `SELECT ${EDGE_COLUMNS} FROM links WHERE source_uuid = ? AND key_uuid = ? ORDER BY rowid`;
const SELECT_FROM_UNLABELED = `SELECT ${EDGE_COLUMNS} FROM links WHERE source_uuid = ? AND key_uuid IS NULL ORDER BY rowid`;
const SELECT_BY_KEY = `SELECT ${EDGE_COLUMNS} FROM links WHERE key_uuid = ? ORDER BY rowid`;
const SELECT_TO = `SELECT ${EDGE_COLUMNS} FROM links WHERE target_uuid = ? ORDER BY rowid`;

/**
 * Directed, optionally labeled edges. Endpoints are never checked against
 * the value table and identical edges may coexist.
 *
 * Iterators returned by the traversal methods keep the connection busy until
 * they are exhausted or returned; do not write to the store while one is open.
 */
export class LinkStore {
	private db: Database.Database;
	private orm: GraphOrm;

	constructor(db: Database.Database, orm: GraphOrm) {
		this.db = db;
		this.orm = orm;
	}

	addEdge(source: IdentifierLike, key: IdentifierLike | null | undefined, target: IdentifierLike): EdgeHandle {
		const handle = {
			source: toIdentifier(source),
			key: key === null || key === undefined ? null : toIdentifier(key),
			target: toIdentifier(target),
		};
		const result = this.orm
			.insert(links)
			.values({ sourceUuid: handle.source, keyUuid: handle.key, targetUuid: handle.target })
			.run();
		return { rowid: toNumber(result.lastInsertRowid), ...handle };
	}

	/**
	 * @throws NotFoundError when the handle does not address a link
	 */
	removeEdge(handle: EdgeHandle): void {
		const result = this.orm
			.delete(links)
			.where(
				and(
					eq(sql`rowid`, handle.rowid),
					eq(links.sourceUuid, handle.source),
					handle.key === null ? isNull(links.keyUuid) : eq(links.keyUuid, handle.key),
					eq(links.targetUuid, handle.target),
				),
			)
			.run();
		if (result.changes === 0) {
			throw new NotFoundError(`Edge ${handle.rowid}`);
		}
	}

	/**
	 * @throws NotFoundError when the handle does not address a link
	 */
	getEdge(handle: EdgeHandle): Edge {
		const row = this.db
			.prepare<[number, Buffer, Buffer | null, Buffer], EdgeRow>(SELECT_BY_HANDLE)
			.get(handle.rowid, handle.source, handle.key, handle.target);
		if (!row) {
			throw new NotFoundError(`Edge ${handle.rowid}`);
		}
		return toEdge(row);
	}

	edgesFrom(source: IdentifierLike): IterableIterator<Edge> {
		return this.iterate(SELECT_FROM, toIdentifier(source));
	}

	/** A `null` key selects the unlabeled edges leaving `source`. */
	edgesFromWithKey(source: IdentifierLike, key: IdentifierLike | null): IterableIterator<Edge> {
		if (key === null) {
			return this.iterate(SELECT_FROM_UNLABELED, toIdentifier(source));
		}
		return this.iterate(SELECT_FROM_WITH_KEY, toIdentifier(source), toIdentifier(key));
	}

	edgesByKey(key: IdentifierLike): IterableIterator<Edge> {
		return this.iterate(SELECT_BY_KEY, toIdentifier(key));
	}

	edgesTo(target: IdentifierLike): IterableIterator<Edge> {
		return this.iterate(SELECT_TO, toIdentifier(target));
	}

	count(): number {
		const row = this.orm
			.select({ count: sql<number>`count(*)`.mapWith(Number) })
			.from(links)
			.get();
		return row?.count ?? 0;
	}

	countUnlabeled(): number {
		const row = this.orm
			.select({ count: sql<number>`count(*)`.mapWith(Number) })
			.from(links)
			.where(isNull(links.keyUuid))
			.get();
		return row?.count ?? 0;
	}

	private *iterate(statement: string, ...params: Buffer[]): Generator<Edge, void, undefined> {
		const rows = this.db.prepare<Buffer[], EdgeRow>(statement).iterate(...params);
		for (const row of rows) {
			yield toEdge(row);
		}
	}
}

function toEdge(row: EdgeRow): Edge {
	return {
		handle: { rowid: toNumber(row.handle), source: row.source, key: row.key, target: row.target },
		source: row.source,
		key: row.key,
		target: row.target,
	};
}
