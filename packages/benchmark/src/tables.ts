// ---------------------------------------------------------------------------
// Benchmark table schemas
// ---------------------------------------------------------------------------

import type { ColumnDescriptor } from "@seedline/core";

/** Names of the benchmark tables, in dependency order. */
export const BENCHMARK_TABLE_NAMES = ["region", "nation", "supplier", "customer", "part", "orders"] as const;

/** A single benchmark table name. */
export type BenchmarkTableName = (typeof BENCHMARK_TABLE_NAMES)[number];

/** Type guard for {@link BenchmarkTableName}. */
export function isBenchmarkTableName(value: string): value is BenchmarkTableName {
	return (BENCHMARK_TABLE_NAMES as readonly string[]).includes(value);
}

/** Schemas exposed by the benchmark catalog and the scale factor each one generates. */
export const BENCHMARK_SCHEMAS: Readonly<Record<string, number>> = Object.freeze({
	tiny: 1,
	small: 10,
});

/** Scale factor of a benchmark schema, or `undefined` for any other name. */
export function benchmarkScale(schema: string): number | undefined {
	return Object.hasOwn(BENCHMARK_SCHEMAS, schema) ? BENCHMARK_SCHEMAS[schema] : undefined;
}

/** Shape and size of one benchmark table. */
export interface BenchmarkTable {
	readonly name: BenchmarkTableName;
	readonly columns: ReadonlyArray<ColumnDescriptor>;
	/** Rows generated at the given scale factor. */
	rowCount(scale: number): number;
}

const fixed = (count: number) => () => count;
const scaled = (perScale: number) => (scale: number) => perScale * scale;

/** Every benchmark table, keyed by name. */
export const BENCHMARK_TABLES: Readonly<Record<BenchmarkTableName, BenchmarkTable>> = {
	region: {
		name: "region",
		columns: [
			{ name: "regionkey", type: "bigint" },
			{ name: "name", type: "varchar" },
			{ name: "comment", type: "varchar" },
		],
		rowCount: fixed(5),
	},
	nation: {
		name: "nation",
		columns: [
			{ name: "nationkey", type: "bigint" },
			{ name: "name", type: "varchar" },
			{ name: "regionkey", type: "bigint" },
			{ name: "comment", type: "varchar" },
		],
		rowCount: fixed(25),
	},
	supplier: {
		name: "supplier",
		columns: [
			{ name: "suppkey", type: "bigint" },
			{ name: "name", type: "varchar" },
			{ name: "address", type: "varchar" },
			{ name: "nationkey", type: "bigint" },
			{ name: "phone", type: "varchar" },
			{ name: "acctbal", type: "double" },
			{ name: "comment", type: "varchar" },
		],
		rowCount: scaled(10),
	},
	customer: {
		name: "customer",
		columns: [
			{ name: "custkey", type: "bigint" },
			{ name: "name", type: "varchar" },
			{ name: "address", type: "varchar" },
			{ name: "nationkey", type: "bigint" },
			{ name: "phone", type: "varchar" },
			{ name: "acctbal", type: "double" },
			{ name: "mktsegment", type: "varchar" },
			{ name: "comment", type: "varchar" },
		],
		rowCount: scaled(15),
	},
	part: {
		name: "part",
		columns: [
			{ name: "partkey", type: "bigint" },
			{ name: "name", type: "varchar" },
			{ name: "mfgr", type: "varchar" },
			{ name: "brand", type: "varchar" },
			{ name: "type", type: "varchar" },
			{ name: "size", type: "integer" },
			{ name: "container", type: "varchar" },
			{ name: "retailprice", type: "double" },
			{ name: "comment", type: "varchar" },
		],
		rowCount: scaled(20),
	},
	orders: {
		name: "orders",
		columns: [
			{ name: "orderkey", type: "bigint" },
			{ name: "custkey", type: "bigint" },
			{ name: "orderstatus", type: "varchar" },
			{ name: "totalprice", type: "double" },
			{ name: "orderdate", type: "date" },
			{ name: "orderpriority", type: "varchar" },
			{ name: "clerk", type: "varchar" },
			{ name: "shippriority", type: "integer" },
			{ name: "urgent", type: "boolean" },
			{ name: "updatedat", type: "timestamp" },
			{ name: "comment", type: "varchar" },
		],
		rowCount: scaled(150),
	},
};
