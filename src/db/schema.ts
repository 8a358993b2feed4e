import { blob, customType, index, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";

// Column types mirror the declared SQL types of the generation 2 tables.
// Integers arrive as bigint because the connection runs with safe integers.

type IntegerDriverData = number | bigint;

const booleanColumn = customType<{ data: boolean; driverData: IntegerDriverData }>({
	dataType() {
		return "BOOLEAN";
	},
	toDriver(value) {
		return value ? 1 : 0;
	},
	fromDriver(value) {
		return Number(value) !== 0;
	},
});

const fixedInteger = (sqlType: string) =>
	customType<{ data: number; driverData: IntegerDriverData }>({
		dataType() {
			return sqlType;
		},
		fromDriver(value) {
			return Number(value);
		},
	});

const wideInteger = (sqlType: string) =>
	customType<{ data: bigint; driverData: IntegerDriverData }>({
		dataType() {
			return sqlType;
		},
		fromDriver(value) {
			return BigInt(value);
		},
	});

const float = (sqlType: string) =>
	customType<{ data: number; driverData: number }>({
		dataType() {
			return sqlType;
		},
	});

const unsigned1 = fixedInteger("UNSIGNED INT(1)");
const signed1 = fixedInteger("INT(1)");
const unsigned2 = fixedInteger("UNSIGNED INT(2)");
const signed2 = fixedInteger("INT(2)");
const unsigned4 = fixedInteger("UNSIGNED INT(4)");
const signed4 = fixedInteger("INT(4)");
const unsigned8 = wideInteger("UNSIGNED INT(8)");
const signed8 = wideInteger("INT(8)");
const float4 = float("FLOAT(4)");
const float8 = float("FLOAT(8)");

export const values = sqliteTable(
	"values",
	{
		uuid: blob("uuid", { mode: "buffer" }).primaryKey().notNull(),
		bool: booleanColumn("bool"),
		u8: unsigned1("u8"),
		i8: signed1("i8"),
		u16: unsigned2("u16"),
		i16: signed2("i16"),
		u32: unsigned4("u32"),
		i32: signed4("i32"),
		u64: unsigned8("u64"),
		i64: signed8("i64"),
		f32: float4("f32"),
		f64: float8("f64"),
		str: text("str"),
	},
	(t) => ({
		dataId: uniqueIndex("data_id").on(t.uuid),
		dataStrs: index("data_strs").on(t.str),
	}),
);

export const links = sqliteTable(
	"links",
	{
		sourceUuid: blob("source_uuid", { mode: "buffer" }).notNull(),
		keyUuid: blob("key_uuid", { mode: "buffer" }),
		targetUuid: blob("target_uuid", { mode: "buffer" }).notNull(),
	},
	(t) => ({
		source: index("links_source").on(t.sourceUuid),
		key: index("links_key").on(t.keyUuid),
		target: index("links_target").on(t.targetUuid),
		keyed: index("links_keyed").on(t.sourceUuid, t.keyUuid),
	}),
);

export type ValueRow = typeof values.$inferSelect;
export type LinkRow = typeof links.$inferSelect;
