import { describe, expect, it } from "vitest";
import { InvalidValueError } from "@src/core/errors";
import {
	decodeValue,
	encodeValue,
	f32,
	f64,
	i8,
	i64,
	normalizeValue,
	str,
	u8,
	u32,
	u64,
} from "@src/core/typedValue";

const EMPTY = {
	bool: null,
	u8: null,
	i8: null,
	u16: null,
	i16: null,
	u32: null,
	i32: null,
	u64: null,
	i64: null,
	f32: null,
	f64: null,
	str: null,
};

describe("typed values", () => {
	it("spreads a payload over exactly one column", () => {
		expect(encodeValue(u32(42))).toEqual({ ...EMPTY, u32: 42 });
		expect(encodeValue(str("likes"))).toEqual({ ...EMPTY, str: "likes" });
	});

	it("encodes the empty payload as an all-null row", () => {
		expect(encodeValue(null)).toEqual(EMPTY);
		expect(decodeValue(EMPTY)).toEqual({ value: null, ignored: [] });
	});

	it("rounds f32 payloads to single precision", () => {
		expect(encodeValue(f32(0.1)).f32).toBe(Math.fround(0.1));
	});

	it("rejects NaN floats and folds negative zero", () => {
		expect(() => normalizeValue(f32(Number.NaN))).toThrow("Invalid value: f32 cannot be NaN");
		expect(() => normalizeValue(f64(Number.NaN))).toThrow(InvalidValueError);
		expect(Object.is(encodeValue(f64(-0)).f64, 0)).toBe(true);
		expect(Object.is(encodeValue(f32(-0)).f32, 0)).toBe(true);
	});

	it("rejects integers outside their width", () => {
		expect(() => normalizeValue(u8(256))).toThrow(InvalidValueError);
		expect(() => normalizeValue(i8(-129))).toThrow(InvalidValueError);
		expect(() => normalizeValue(u32(1.5))).toThrow("u32 must be an integer in [0, 4294967295], got 1.5");
	});

	it("limits 64-bit integers to what SQLite stores", () => {
		expect(() => normalizeValue(u64(2n ** 63n))).toThrow(InvalidValueError);
		expect(() => normalizeValue(u64(-1n))).toThrow(InvalidValueError);
		expect(normalizeValue(i64(-(2n ** 63n)))).toEqual({ type: "i64", value: -(2n ** 63n) });
	});

	it("reads back the first populated column and reports the rest", () => {
		const decoded = decodeValue({ ...EMPTY, u8: 1, str: "x" });

		expect(decoded.value).toEqual({ type: "u8", value: 1 });
		expect(decoded.ignored).toEqual(["str"]);
	});

	it("keeps false and zero as populated payloads", () => {
		expect(decodeValue({ ...EMPTY, bool: false }).value).toEqual({ type: "bool", value: false });
		expect(decodeValue({ ...EMPTY, i8: 0 }).value).toEqual({ type: "i8", value: 0 });
	});
});
