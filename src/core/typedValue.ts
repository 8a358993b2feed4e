import { InvalidValueError } from "./errors";

interface ValueTypeMap {
	bool: boolean;
	u8: number;
	i8: number;
	u16: number;
	i16: number;
	u32: number;
	i32: number;
	u64: bigint;
	i64: bigint;
	f32: number;
	f64: number;
	str: string;
}

export type ValueType = keyof ValueTypeMap;

/**
 * One scalar payload. The discriminant is also the name of the column the
 * value is persisted in.
 */
export type TypedValue = {
	[K in ValueType]: { type: K; value: ValueTypeMap[K] };
}[ValueType];

/** Payload of a stored record; `null` is a record with no payload. */
export type StoredValue = TypedValue | null;

/** Column order of the sparse row. */
export const VALUE_COLUMNS = [
	"bool",
	"u8",
	"i8",
	"u16",
	"i16",
	"u32",
	"i32",
	"u64",
	"i64",
	"f32",
	"f64",
	"str",
] as const satisfies readonly ValueType[];

export type ValueColumns = { [K in ValueType]: ValueTypeMap[K] | null };

const INTEGER_RANGES = {
	u8: [0, 0xff],
	i8: [-0x80, 0x7f],
	u16: [0, 0xffff],
	i16: [-0x8000, 0x7fff],
	u32: [0, 0xffffffff],
	i32: [-0x80000000, 0x7fffffff],
} as const;

// SQLite integers are signed 64-bit, so u64 tops out at the i64 maximum.
const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

export const bool = (value: boolean): TypedValue => ({ type: "bool", value });
export const u8 = (value: number): TypedValue => ({ type: "u8", value });
export const i8 = (value: number): TypedValue => ({ type: "i8", value });
export const u16 = (value: number): TypedValue => ({ type: "u16", value });
export const i16 = (value: number): TypedValue => ({ type: "i16", value });
export const u32 = (value: number): TypedValue => ({ type: "u32", value });
export const i32 = (value: number): TypedValue => ({ type: "i32", value });
export const u64 = (value: bigint): TypedValue => ({ type: "u64", value });
export const i64 = (value: bigint): TypedValue => ({ type: "i64", value });
export const f32 = (value: number): TypedValue => ({ type: "f32", value });
export const f64 = (value: number): TypedValue => ({ type: "f64", value });
export const str = (value: string): TypedValue => ({ type: "str", value });

/**
 * Checks the value fits its declared width and returns the form that is
 * written to disk: f32 is rounded to single precision, NaN is rejected and
 * -0 becomes 0.
 * @throws InvalidValueError
 */
export function normalizeValue(value: TypedValue): TypedValue {
	switch (value.type) {
		case "bool":
			if (typeof value.value !== "boolean") {
				throw new InvalidValueError(`bool expects a boolean, got ${typeof value.value}`);
			}
			return value;
		case "u8":
		case "i8":
		case "u16":
		case "i16":
		case "u32":
		case "i32": {
			const [min, max] = INTEGER_RANGES[value.type];
			if (!Number.isInteger(value.value) || value.value < min || value.value > max) {
				throw new InvalidValueError(`${value.type} must be an integer in [${min}, ${max}], got ${value.value}`);
			}
			return value;
		}
		case "u64":
		case "i64": {
			const min = value.type === "u64" ? 0n : I64_MIN;
			if (typeof value.value !== "bigint" || value.value < min || value.value > I64_MAX) {
				throw new InvalidValueError(`${value.type} must be a bigint in [${min}, ${I64_MAX}], got ${String(value.value)}`);
			}
			return value;
		}
		case "f32":
			return { type: "f32", value: normalizeFloat("f32", value.value) };
		case "f64":
			return { type: "f64", value: normalizeFloat("f64", value.value) };
		case "str":
			if (typeof value.value !== "string") {
				throw new InvalidValueError(`str expects a string, got ${typeof value.value}`);
			}
			return value;
	}
}

// SQLite binds NaN as NULL and stores -0 as the integer 0.
function normalizeFloat(type: "f32" | "f64", raw: number): number {
	if (typeof raw !== "number") {
		throw new InvalidValueError(`${type} expects a number, got ${typeof raw}`);
	}
	const value = type === "f32" ? Math.fround(raw) : raw;
	if (Number.isNaN(value)) {
		throw new InvalidValueError(`${type} cannot be NaN`);
	}
	return value === 0 ? 0 : value;
}

function emptyColumns(): ValueColumns {
	return {
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
}

/**
 * Spreads a payload over the sparse row: every column null except the one
 * named by the payload's type.
 */
export function encodeValue(value: StoredValue): ValueColumns {
	const columns = emptyColumns();
	if (value === null) return columns;

	const normalized = normalizeValue(value);
	switch (normalized.type) {
		case "bool":
			columns.bool = normalized.value;
			break;
		case "u64":
		case "i64":
			columns[normalized.type] = normalized.value;
			break;
		case "str":
			columns.str = normalized.value;
			break;
		default:
			columns[normalized.type] = normalized.value;
	}
	return columns;
}

export interface DecodedValue {
	value: StoredValue;
	/** Columns that were populated besides the one returned. */
	ignored: ValueType[];
}

/**
 * Reads a sparse row back. The first populated column in column order wins;
 * any further populated columns are reported in `ignored`.
 */
export function decodeValue(columns: ValueColumns): DecodedValue {
	let value: StoredValue = null;
	const ignored: ValueType[] = [];

	for (const column of VALUE_COLUMNS) {
		const found = pick(columns, column);
		if (found === null) continue;
		if (value === null) {
			value = found;
		} else {
			ignored.push(column);
		}
	}

	return { value, ignored };
}

function pick(columns: ValueColumns, column: ValueType): TypedValue | null {
	switch (column) {
		case "bool":
			return columns.bool === null ? null : { type: "bool", value: columns.bool };
		case "u64":
		case "i64": {
			const raw = columns[column];
			return raw === null ? null : { type: column, value: raw };
		}
		case "str":
			return columns.str === null ? null : { type: "str", value: columns.str };
		default: {
			const raw = columns[column];
			return raw === null ? null : { type: column, value: raw };
		}
	}
}
