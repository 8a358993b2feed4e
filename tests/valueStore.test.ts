import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	DuplicateIdentifierError,
	InvalidValueError,
	MalformedIdentifierError,
	NotFoundError,
} from "@src/core/errors";
import { formatIdentifier } from "@src/core/identifier";
import {
	type TypedValue,
	bool,
	f32,
	f64,
	i8,
	i16,
	i32,
	i64,
	str,
	u8,
	u16,
	u32,
	u64,
} from "@src/core/typedValue";
import { GraphDB } from "@src/store/db";

const idOf = (byte: number) => Buffer.alloc(16, byte);

describe("ValueStore", () => {
	let graph: GraphDB;

	beforeEach(() => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		graph = GraphDB.open();
	});

	afterEach(() => {
		graph.close();
		vi.restoreAllMocks();
	});

	it("round-trips every payload type", () => {
		const payloads: TypedValue[] = [
			bool(true),
			bool(false),
			u8(255),
			i8(-128),
			u16(65535),
			i16(-32768),
			u32(4294967295),
			i32(-2147483648),
			u64(9223372036854775807n),
			i64(-(2n ** 63n)),
			f32(1.5),
			f64(Math.PI),
			str("héllo"),
		];

		payloads.forEach((payload, i) => {
			graph.values.put(idOf(i + 1), payload);
		});
		payloads.forEach((payload, i) => {
			expect(graph.values.get(idOf(i + 1))).toEqual(payload);
		});
	});

	it("stores a record with no payload", () => {
		graph.values.put(idOf(1), null);

		expect(graph.values.has(idOf(1))).toBe(true);
		expect(graph.values.get(idOf(1))).toBeNull();
	});

	it("accepts UUID text wherever an id is taken", () => {
		graph.values.put("01010101-0101-0101-0101-010101010101", u32(7));

		expect(graph.values.get(idOf(1))).toEqual(u32(7));
	});

	it("replaces the whole payload on upsert", () => {
		graph.values.put(idOf(1), u32(42));
		graph.values.put(idOf(1), str("forty-two"));

		expect(graph.values.get(idOf(1))).toEqual(str("forty-two"));
		const row = graph
			.getRawDb()
			.prepare<[Buffer], { u32: bigint | null; str: string | null }>(
				"SELECT u32, str FROM `values` WHERE uuid = ?",
			)
			.get(idOf(1));
		expect(row).toEqual({ u32: null, str: "forty-two" });
		expect(graph.values.count()).toBe(1);
	});

	it("rejects an existing id under the insert policy", () => {
		const strict = GraphDB.open({ writePolicy: "insert" });
		try {
			strict.values.put(idOf(1), u32(1));

			expect(() => strict.values.put(idOf(1), u32(2))).toThrow(DuplicateIdentifierError);
			expect(() => strict.values.put(idOf(1), u32(2))).toThrow(
				`Value ${formatIdentifier(idOf(1))} already exists`,
			);
			expect(strict.values.get(idOf(1))).toEqual(u32(1));
		} finally {
			strict.close();
		}
	});

	it("fails reads of unknown ids with NotFound", () => {
		expect(() => graph.values.get(idOf(9))).toThrow(NotFoundError);
		expect(() => graph.values.get(idOf(9))).toThrow(
			"Value 09090909-0909-0909-0909-090909090909 not found",
		);
	});

	it("deletes records and ignores ids that are already gone", () => {
		graph.values.put(idOf(1), u8(1));
		graph.values.delete(idOf(1));
		graph.values.delete(idOf(1));

		expect(graph.values.has(idOf(1))).toBe(false);
		expect(graph.values.count()).toBe(0);
	});

	it("rejects malformed ids before touching the table", () => {
		expect(() => graph.values.put("alpha", u8(1))).toThrow(MalformedIdentifierError);
		expect(() => graph.values.get(new Uint8Array(8))).toThrow(MalformedIdentifierError);
	});

	it("writes nothing when the payload is out of range", () => {
		expect(() => graph.values.put(idOf(1), u8(300))).toThrow(InvalidValueError);
		expect(graph.values.has(idOf(1))).toBe(false);
	});

	it("rejects NaN floats instead of storing an empty payload", () => {
		expect(() => graph.values.put(idOf(1), f64(Number.NaN))).toThrow("f64 cannot be NaN");
		expect(() => graph.values.put(idOf(2), f32(Number.NaN))).toThrow(InvalidValueError);

		expect(graph.values.has(idOf(1))).toBe(false);
		expect(graph.values.has(idOf(2))).toBe(false);
	});

	it("stores negative zero as zero", () => {
		graph.values.put(idOf(1), f64(-0));

		const stored = graph.values.get(idOf(1));
		expect(stored?.type).toBe("f64");
		expect(Object.is(stored?.value, 0)).toBe(true);
	});

	it("finds ids by exact string, ordered by id", () => {
		graph.values.put(idOf(2), str("same"));
		graph.values.put(idOf(1), str("same"));
		graph.values.put(idOf(3), str("other"));

		expect(graph.values.findByString("same")).toEqual([idOf(1), idOf(2)]);
		expect(graph.values.findByString("missing")).toEqual([]);
	});

	it("searches strings with LIKE patterns", () => {
		graph.values.put(idOf(1), str("alpha"));
		graph.values.put(idOf(2), str("Alps"));
		graph.values.put(idOf(3), str("beta"));
		graph.values.put(idOf(4), u32(1));

		expect(graph.values.searchStrings("al%")).toEqual([
			{ id: idOf(2), value: "Alps" },
			{ id: idOf(1), value: "alpha" },
		]);
		expect(graph.values.searchStrings("%", 1)).toEqual([{ id: idOf(2), value: "Alps" }]);
	});

	it("returns the first populated column of a row written by another writer", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		graph
			.getRawDb()
			.prepare("INSERT INTO `values` (uuid, u8, str) VALUES (?, ?, ?)")
			.run(idOf(1), 1, "x");

		expect(graph.values.get(idOf(1))).toEqual(u8(1));
		expect(warn).toHaveBeenCalledWith(
			"⚠️ Value 01010101-0101-0101-0101-010101010101 has more than one payload column; ignoring str",
		);
	});
});
