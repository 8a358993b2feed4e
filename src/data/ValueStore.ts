import { asc, eq, like, sql } from "drizzle-orm";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "../db/schema";
import { DuplicateIdentifierError, NotFoundError } from "../core/errors";
import { type IdentifierLike, formatIdentifier, toIdentifier } from "../core/identifier";
import { type StoredValue, decodeValue, encodeValue } from "../core/typedValue";

export type WritePolicy = "upsert" | "insert";

export type GraphOrm = BetterSQLite3Database<typeof schema>;

export interface StringMatch {
	id: Buffer;
	value: string;
}

const { values } = schema;

const payloadColumns = {
	bool: values.bool,
	u8: values.u8,
	i8: values.i8,
	u16: values.u16,
	i16: values.i16,
	u32: values.u32,
	i32: values.i32,
	u64: values.u64,
	i64: values.i64,
	f32: values.f32,
	f64: values.f64,
	str: values.str,
};

/**
 * Value records keyed by 16-byte identifiers.
 *
 * Under the default `upsert` policy `put` replaces the whole payload of an
 * existing record. Under `insert` an existing id is rejected.
 */
export class ValueStore {
	private orm: GraphOrm;
	readonly writePolicy: WritePolicy;

	constructor(orm: GraphOrm, writePolicy: WritePolicy = "upsert") {
		this.orm = orm;
		this.writePolicy = writePolicy;
	}

	put(id: IdentifierLike, value: StoredValue): void {
		const uuid = toIdentifier(id);
		const payload = encodeValue(value);

		if (this.writePolicy === "upsert") {
			this.orm
				.insert(values)
				.values({ uuid, ...payload })
				.onConflictDoUpdate({ target: values.uuid, set: payload })
				.run();
			return;
		}

		this.orm.transaction((tx) => {
			const existing = tx
				.select({ uuid: values.uuid })
				.from(values)
				.where(eq(values.uuid, uuid))
				.get();
			if (existing) {
				throw new DuplicateIdentifierError(formatIdentifier(uuid));
			}
			tx.insert(values).values({ uuid, ...payload }).run();
		});
	}

	/**
	 * @throws NotFoundError when no record has this id
	 */
	get(id: IdentifierLike): StoredValue {
		const uuid = toIdentifier(id);
		const row = this.orm.select(payloadColumns).from(values).where(eq(values.uuid, uuid)).get();
		if (!row) {
			throw new NotFoundError(`Value ${formatIdentifier(uuid)}`);
		}

		const { value, ignored } = decodeValue(row);
		if (ignored.length > 0) {
			console.warn(
				`⚠️ Value ${formatIdentifier(uuid)} has more than one payload column; ignoring ${ignored.join(", ")}`,
			);
		}
		return value;
	}

	has(id: IdentifierLike): boolean {
		const uuid = toIdentifier(id);
		const row = this.orm
			.select({ uuid: values.uuid })
			.from(values)
			.where(eq(values.uuid, uuid))
			.get();
		return row !== undefined;
	}

	/** Removes the record if present. Links pointing at it are left alone. */
	delete(id: IdentifierLike): void {
		this.orm.delete(values).where(eq(values.uuid, toIdentifier(id))).run();
	}

	findByString(text: string): Buffer[] {
		return this.orm
			.select({ uuid: values.uuid })
			.from(values)
			.where(eq(values.str, text))
			.orderBy(asc(values.uuid))
			.all()
			.map((row) => row.uuid);
	}

	/**
	 * String values matching a SQL LIKE pattern (`%` and `_` wildcards,
	 * ASCII case-insensitive).
	 */
	searchStrings(pattern: string, limit = 100): StringMatch[] {
		const rows = this.orm
			.select({ uuid: values.uuid, str: values.str })
			.from(values)
			.where(like(values.str, pattern))
			.orderBy(asc(values.str), asc(values.uuid))
			.limit(limit)
			.all();

		const matches: StringMatch[] = [];
		for (const row of rows) {
			if (row.str !== null) matches.push({ id: row.uuid, value: row.str });
		}
		return matches;
	}

	count(): number {
		const row = this.orm
			.select({ count: sql<number>`count(*)`.mapWith(Number) })
			.from(values)
			.get();
		return row?.count ?? 0;
	}
}
