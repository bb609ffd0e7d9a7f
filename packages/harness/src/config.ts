import { BENCHMARK_SCHEMAS, BENCHMARK_TABLE_NAMES, benchmarkScale, isBenchmarkTableName } from "@seedline/benchmark";
import {
	type CatalogProperties,
	ConfigError,
	CONNECTOR_PROPERTY,
	Err,
	isLogLevel,
	LOG_LEVELS,
	type LogLevel,
	Ok,
	type Result,
} from "@seedline/core";

/** Table descriptions shipped with the harness, as a `file:` URI. */
export const DEFAULT_TABLE_DESCRIPTION_DIRECTORY = new URL("../resources/queryrunner/", import.meta.url).href;

/** Schema the search catalog exposes its tables under. */
export const DEFAULT_SEARCH_SCHEMA = "bench";

/** Properties of the `search` catalog, passed to the connector verbatim. */
export const DEFAULT_CATALOG_PROPERTIES: CatalogProperties = Object.freeze({
	[CONNECTOR_PROPERTY.DEFAULT_SCHEMA]: DEFAULT_SEARCH_SCHEMA,
	[CONNECTOR_PROPERTY.TABLE_DESCRIPTION_DIRECTORY]: DEFAULT_TABLE_DESCRIPTION_DIRECTORY,
	[CONNECTOR_PROPERTY.SCROLL_SIZE]: "1000",
	[CONNECTOR_PROPERTY.SCROLL_TIMEOUT]: "1m",
	[CONNECTOR_PROPERTY.REQUEST_TIMEOUT]: "2m",
	[CONNECTOR_PROPERTY.MAX_REQUEST_RETRIES]: "3",
	[CONNECTOR_PROPERTY.MAX_REQUEST_RETRY_TIME]: "5s",
});

/** Settings of a harness run. */
export interface HarnessConfig {
	/** Query cluster size, coordinator included (default: 2). */
	readonly nodeCount: number;
	/** Benchmark tables to load, lower-cased (default: all of them). */
	readonly tables: ReadonlyArray<string>;
	/** Benchmark schema the rows are read from (default: "tiny"). */
	readonly benchmarkSchema: string;
	/** Documents per bulk request (default: 1000). */
	readonly batchSize: number;
	readonly logLevel: LogLevel;
}

export const DEFAULT_HARNESS_CONFIG: HarnessConfig = Object.freeze({
	nodeCount: 2,
	tables: BENCHMARK_TABLE_NAMES,
	benchmarkSchema: "tiny",
	batchSize: 1000,
	logLevel: "info",
});

/** Environment variables read by {@link loadHarnessConfig}. */
export const HARNESS_ENV = {
	NODE_COUNT: "SEEDLINE_NODE_COUNT",
	BATCH_SIZE: "SEEDLINE_BATCH_SIZE",
	LOG_LEVEL: "SEEDLINE_LOG_LEVEL",
} as const;

/**
 * Build the run configuration from command-line flags, then environment
 * variables, then defaults.
 */
export function loadHarnessConfig(
	flags: Readonly<Record<string, string>>,
	env: Readonly<Record<string, string | undefined>> = process.env,
): Result<HarnessConfig, ConfigError> {
	const nodeCount = positiveInt("--nodes", flags.nodes ?? env[HARNESS_ENV.NODE_COUNT], DEFAULT_HARNESS_CONFIG.nodeCount);
	if (!nodeCount.ok) return nodeCount;

	const batchSize = positiveInt(
		"--batch-size",
		flags["batch-size"] ?? env[HARNESS_ENV.BATCH_SIZE],
		DEFAULT_HARNESS_CONFIG.batchSize,
	);
	if (!batchSize.ok) return batchSize;

	const logLevel = flags["log-level"] ?? env[HARNESS_ENV.LOG_LEVEL] ?? DEFAULT_HARNESS_CONFIG.logLevel;
	if (!isLogLevel(logLevel)) {
		return Err(new ConfigError(`Invalid log level "${logLevel}" (expected one of ${LOG_LEVELS.join(", ")})`));
	}

	const benchmarkSchema = flags.schema ?? DEFAULT_HARNESS_CONFIG.benchmarkSchema;
	if (benchmarkScale(benchmarkSchema) === undefined) {
		return Err(
			new ConfigError(
				`Unknown benchmark schema "${benchmarkSchema}" (expected one of ${Object.keys(BENCHMARK_SCHEMAS).join(", ")})`,
			),
		);
	}

	const tables = flags.tables === undefined ? Ok(DEFAULT_HARNESS_CONFIG.tables) : parseTables(flags.tables);
	if (!tables.ok) return tables;

	return Ok(
		Object.freeze({
			nodeCount: nodeCount.value,
			tables: tables.value,
			benchmarkSchema,
			batchSize: batchSize.value,
			logLevel,
		}),
	);
}

/** Parse a comma-separated table list, lower-casing each name. */
export function parseTables(list: string): Result<string[], ConfigError> {
	const tables: string[] = [];
	for (const entry of list.split(",")) {
		const name = entry.trim().toLowerCase();
		if (name === "") continue;
		if (!isBenchmarkTableName(name)) {
			return Err(
				new ConfigError(`Unknown benchmark table "${entry.trim()}" (expected one of ${BENCHMARK_TABLE_NAMES.join(", ")})`),
			);
		}
		if (!tables.includes(name)) tables.push(name);
	}
	if (tables.length === 0) {
		return Err(new ConfigError("--tables must name at least one table"));
	}
	return Ok(tables);
}

function positiveInt(name: string, raw: string | undefined, fallback: number): Result<number, ConfigError> {
	if (raw === undefined) return Ok(fallback);
	const value = Number(raw);
	if (raw.trim() === "" || !Number.isInteger(value) || value < 1) {
		return Err(new ConfigError(`${name} must be a positive integer, got "${raw}"`));
	}
	return Ok(value);
}
