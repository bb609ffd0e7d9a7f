// ---------------------------------------------------------------------------
// Row generation: deterministic, lazily produced rows per table and scale
// ---------------------------------------------------------------------------

import { SeededRandom, seedFor } from "./random";
import { BENCHMARK_TABLES, type BenchmarkTableName } from "./tables";
import { type BenchmarkWords, loadWords } from "./words";

const ORDER_EPOCH_MS = Date.UTC(1992, 0, 1);
const ORDER_DATE_SPAN_DAYS = 2405;
const DAY_MS = 86_400_000;
const ADDRESS_CHARS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789 ,";

type RowBuilder = (key: number, rng: SeededRandom, words: BenchmarkWords, scale: number) => unknown[];

const pad9 = (n: number): string => String(n).padStart(9, "0");

function comment(rng: SeededRandom, words: BenchmarkWords): string {
	const count = rng.int(3, 8);
	const picked: string[] = [];
	for (let i = 0; i < count; i++) picked.push(rng.pick(words.commentWords));
	return picked.join(" ");
}

function address(rng: SeededRandom): string {
	const length = rng.int(10, 25);
	let text = "";
	for (let i = 0; i < length; i++) text += ADDRESS_CHARS.charAt(rng.int(0, ADDRESS_CHARS.length - 1));
	return text.trim();
}

function phone(nationKey: number, rng: SeededRandom): string {
	return `${10 + nationKey}-${rng.int(100, 999)}-${rng.int(100, 999)}-${rng.int(1000, 9999)}`;
}

const ROW_BUILDERS: Record<BenchmarkTableName, RowBuilder> = {
	region: (key, rng, words) => [key, words.regions[key] ?? `REGION ${key}`, comment(rng, words)],

	nation: (key, rng, words) => {
		const nation = words.nations[key];
		return [key, nation?.name ?? `NATION ${key}`, nation?.regionKey ?? 0, comment(rng, words)];
	},

	supplier: (key, rng, words) => {
		const nationKey = rng.int(0, words.nations.length - 1);
		return [
			key,
			`Supplier#${pad9(key)}`,
			address(rng),
			nationKey,
			phone(nationKey, rng),
			rng.amount(-999.99, 9999.99),
			comment(rng, words),
		];
	},

	customer: (key, rng, words) => {
		const nationKey = rng.int(0, words.nations.length - 1);
		return [
			key,
			`Customer#${pad9(key)}`,
			address(rng),
			nationKey,
			phone(nationKey, rng),
			rng.amount(-999.99, 9999.99),
			rng.pick(words.segments),
			comment(rng, words),
		];
	},

	part: (key, rng, words) => {
		const manufacturer = rng.int(1, 5);
		const colors = [rng.pick(words.colors), rng.pick(words.colors), rng.pick(words.colors)];
		return [
			key,
			colors.join(" "),
			`Manufacturer#${manufacturer}`,
			`Brand#${manufacturer}${rng.int(1, 5)}`,
			`${rng.pick(words.typeSizes)} ${rng.pick(words.typeFinishes)} ${rng.pick(words.typeMaterials)}`,
			rng.int(1, 50),
			rng.pick(words.containers),
			(90_000 + (Math.floor(key / 10) % 20_001) + 100 * (key % 1_000)) / 100,
			comment(rng, words),
		];
	},

	orders: (key, rng, words, scale) => {
		const orderDate = ORDER_EPOCH_MS + rng.int(0, ORDER_DATE_SPAN_DAYS) * DAY_MS;
		const priority = rng.pick(words.priorities);
		return [
			key,
			rng.int(1, BENCHMARK_TABLES.customer.rowCount(scale)),
			rng.pick(words.orderStatuses),
			rng.amount(850, 500_000),
			new Date(orderDate),
			priority,
			`Clerk#${pad9(rng.int(1, 1_000 * scale))}`,
			0,
			priority === words.priorities[0],
			new Date(orderDate + rng.int(0, DAY_MS / 1_000 - 1) * 1_000),
			comment(rng, words),
		];
	},
};

/** First key of a table: dimension tables are zero-based, the rest start at 1. */
function firstKey(table: BenchmarkTableName): number {
	return table === "region" || table === "nation" ? 0 : 1;
}

/**
 * Lazily generate every row of `table` at `scale`, values in column order.
 *
 * Rows are a pure function of table and scale: repeated scans yield the
 * same rows in the same order.
 */
export async function* generateRows(
	table: BenchmarkTableName,
	scale: number,
	words: BenchmarkWords = loadWords(),
): AsyncGenerator<unknown[]> {
	const rng = new SeededRandom(seedFor(`${table}:${scale}`));
	const build = ROW_BUILDERS[table];
	const start = firstKey(table);
	const count = BENCHMARK_TABLES[table].rowCount(scale);

	for (let i = 0; i < count; i++) {
		yield build(start + i, rng, words, scale);
	}
}
