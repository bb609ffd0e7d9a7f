import { readFileSync } from "node:fs";

/** Word lists the row generators draw from (`data/words.json`). */
export interface BenchmarkWords {
	readonly regions: ReadonlyArray<string>;
	readonly nations: ReadonlyArray<{ readonly name: string; readonly regionKey: number }>;
	readonly segments: ReadonlyArray<string>;
	readonly priorities: ReadonlyArray<string>;
	readonly orderStatuses: ReadonlyArray<string>;
	readonly containers: ReadonlyArray<string>;
	readonly typeSizes: ReadonlyArray<string>;
	readonly typeFinishes: ReadonlyArray<string>;
	readonly typeMaterials: ReadonlyArray<string>;
	readonly colors: ReadonlyArray<string>;
	readonly commentWords: ReadonlyArray<string>;
}

const WORDS_URL = new URL("./data/words.json", import.meta.url);

const LIST_KEYS = [
	"regions",
	"segments",
	"priorities",
	"orderStatuses",
	"containers",
	"typeSizes",
	"typeFinishes",
	"typeMaterials",
	"colors",
	"commentWords",
] as const;

let cached: BenchmarkWords | null = null;

/** Load and validate the word lists. Cached after the first call. */
export function loadWords(): BenchmarkWords {
	if (!cached) {
		cached = parseWords(JSON.parse(readFileSync(WORDS_URL, "utf-8")));
	}
	return cached;
}

/** Validate a decoded word-list document. Throws on a malformed document. */
export function parseWords(raw: unknown): BenchmarkWords {
	if (typeof raw !== "object" || raw === null) {
		throw new TypeError("Word list must be a JSON object");
	}
	const record: Record<string, unknown> = { ...raw };

	const lists = new Map<string, string[]>();
	for (const key of LIST_KEYS) {
		const value = record[key];
		if (!isNonEmptyStringArray(value)) {
			throw new TypeError(`Word list "${key}" must be a non-empty array of strings`);
		}
		lists.set(key, value);
	}

	const nations = record.nations;
	if (!Array.isArray(nations) || nations.length === 0) {
		throw new TypeError('Word list "nations" must be a non-empty array');
	}
	const regionCount = lists.get("regions")?.length ?? 0;
	const parsedNations = nations.map((nation: unknown, i) => {
		if (typeof nation !== "object" || nation === null || !("name" in nation) || !("regionKey" in nation)) {
			throw new TypeError(`Nation ${i} must have a name and a regionKey`);
		}
		const { name, regionKey } = nation;
		if (
			typeof name !== "string" ||
			typeof regionKey !== "number" ||
			!Number.isInteger(regionKey) ||
			regionKey < 0 ||
			regionKey >= regionCount
		) {
			throw new TypeError(`Nation ${i} must have a name and a regionKey below ${regionCount}`);
		}
		return { name, regionKey };
	});

	const list = (key: (typeof LIST_KEYS)[number]): string[] => lists.get(key) ?? [];
	return Object.freeze({
		regions: list("regions"),
		nations: parsedNations,
		segments: list("segments"),
		priorities: list("priorities"),
		orderStatuses: list("orderStatuses"),
		containers: list("containers"),
		typeSizes: list("typeSizes"),
		typeFinishes: list("typeFinishes"),
		typeMaterials: list("typeMaterials"),
		colors: list("colors"),
		commentWords: list("commentWords"),
	});
}

function isNonEmptyStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === "string");
}
