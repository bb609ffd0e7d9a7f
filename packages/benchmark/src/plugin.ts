import { type CatalogProperties, type ColumnDescriptor, ConfigError, Err, Ok, type Result, toError } from "@seedline/core";
import type { Connector, ConnectorContext, ConnectorFactory, Plugin } from "@seedline/engine";
import { generateRows } from "./generator";
import {
	BENCHMARK_SCHEMAS,
	BENCHMARK_TABLE_NAMES,
	BENCHMARK_TABLES,
	benchmarkScale,
	isBenchmarkTableName,
} from "./tables";
import { type BenchmarkWords, loadWords } from "./words";

/** Connector name the benchmark factory registers under. */
export const BENCHMARK_CONNECTOR = "benchmark";

/** Read-only connector over the generated benchmark tables. */
export class BenchmarkConnector implements Connector {
	constructor(private readonly words: BenchmarkWords) {}

	listSchemas(): string[] {
		return Object.keys(BENCHMARK_SCHEMAS).sort();
	}

	listTables(schema: string): string[] {
		return benchmarkScale(schema) === undefined ? [] : [...BENCHMARK_TABLE_NAMES].sort();
	}

	getColumns(schema: string, table: string): ReadonlyArray<ColumnDescriptor> | undefined {
		if (benchmarkScale(schema) === undefined || !isBenchmarkTableName(table)) return undefined;
		return BENCHMARK_TABLES[table].columns;
	}

	async *scan(schema: string, table: string): AsyncGenerator<unknown[]> {
		const scale = benchmarkScale(schema);
		if (scale === undefined || !isBenchmarkTableName(table)) return;
		yield* generateRows(table, scale, this.words);
	}
}

const benchmarkFactory: ConnectorFactory = {
	name: BENCHMARK_CONNECTOR,
	async create(
		catalogName: string,
		properties: CatalogProperties,
		context: ConnectorContext,
	): Promise<Result<Connector, ConfigError>> {
		const [unknown] = Object.keys(properties);
		if (unknown !== undefined) {
			return Err(new ConfigError(`Unknown benchmark property "${unknown}" for catalog "${catalogName}"`));
		}

		let words: BenchmarkWords;
		try {
			words = loadWords();
		} catch (error) {
			return Err(new ConfigError("Failed to load benchmark word lists", toError(error)));
		}
		context.logger.debug("benchmark connector created", { schemas: Object.keys(BENCHMARK_SCHEMAS) });
		return Ok(new BenchmarkConnector(words));
	},
};

/** Plugin contributing the synthetic benchmark connector. */
export class BenchmarkPlugin implements Plugin {
	readonly name = "benchmark";

	getConnectorFactories(): ReadonlyArray<ConnectorFactory> {
		return [benchmarkFactory];
	}
}
