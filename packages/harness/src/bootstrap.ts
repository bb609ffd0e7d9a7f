// ---------------------------------------------------------------------------
// Cluster bootstrap: search node, query cluster, catalogs and seed data
// ---------------------------------------------------------------------------

import { BENCHMARK_CONNECTOR, BenchmarkPlugin } from "@seedline/benchmark";
import {
	BootstrapError,
	type CatalogProperties,
	ConfigError,
	describeError,
	Err,
	formatDuration,
	type HarnessError,
	LoadError,
	type Logger,
	Ok,
	parseConnectorConfig,
	type Result,
	retryPolicyFromConfig,
	silentLogger,
	toError,
} from "@seedline/core";
import { QueryCluster, type QueryClient, type Session } from "@seedline/engine";
import { type RowsLoaded, SearchLoader } from "@seedline/loader";
import {
	buildIndexMappings,
	ElasticsearchBulkIndexer,
	EmbeddedSearchNode,
	ensureIndex,
	resolveTableDescriptions,
	SEARCH_CONNECTOR,
	SearchPlugin,
} from "@seedline/search";
import { DEFAULT_CATALOG_PROPERTIES, DEFAULT_HARNESS_CONFIG, DEFAULT_SEARCH_SCHEMA } from "./config";
import { ResourceScope } from "./resources";

/** Catalog names registered by {@link buildCluster}. */
export const BENCHMARK_CATALOG = "benchmark";
export const SEARCH_CATALOG = "search";

/** Options for {@link buildCluster}. */
export interface BuildClusterOptions {
	/** Query cluster size, coordinator included (default: 2). */
	nodeCount?: number;
	/** Benchmark tables to load (default: all). Names are lower-cased. */
	tables?: ReadonlyArray<string>;
	/** Benchmark schema the rows are read from (default: "tiny"). */
	benchmarkSchema?: string;
	/** Documents per bulk request (default: 1000). */
	batchSize?: number;
	/** Overrides merged over the default `search` catalog properties. */
	catalogProperties?: CatalogProperties;
	/** Backoff bounds for bulk retries. */
	retryBackoff?: { initialBackoffMs?: number; maxBackoffMs?: number };
	logger?: Logger;
	/** Custom search node factory (for testing) */
	createSearchNode?: (logger: Logger) => EmbeddedSearchNode;
	/** Custom query cluster factory (for testing) */
	createQueryCluster?: (nodeCount: number, logger: Logger) => QueryCluster;
}

/** A bootstrapped cluster with its tables loaded. */
export interface RunningCluster {
	readonly queryCluster: QueryCluster;
	readonly searchNode: EmbeddedSearchNode;
	/** Session over the `search` catalog and its default schema. */
	readonly session: Session;
	/** Query client bound to {@link session}. */
	readonly client: QueryClient;
	/** Base URL of the coordinator endpoint. */
	readonly baseUrl: string;
	/** One entry per loaded table, in load order. */
	readonly loaded: ReadonlyArray<RowsLoaded>;
	/** Stop the query cluster, then the search node. Safe to call more than once. */
	close(): Promise<void>;
}

/** The session integration tests query the search catalog with. */
export function createSession(schema: string = DEFAULT_SEARCH_SCHEMA): Session {
	return Object.freeze({ user: "seedline", catalog: SEARCH_CATALOG, schema });
}

/**
 * Start an embedded search node and a query cluster, register the
 * `benchmark` and `search` catalogs and copy the requested benchmark tables
 * into the search node.
 *
 * The search node starts first. Any failure releases everything acquired so
 * far (query cluster, then search node) before the error is returned; a step
 * that throws is reported as a {@link BootstrapError}. Close failures are
 * logged and attached to the error as suppressed errors. Tables load one
 * after another and the first failure stops the run.
 */
export async function buildCluster(options: BuildClusterOptions = {}): Promise<Result<RunningCluster, HarnessError>> {
	const logger = (options.logger ?? silentLogger).child({ component: "bootstrap" });
	const nodeCount = options.nodeCount ?? DEFAULT_HARNESS_CONFIG.nodeCount;
	const tables = (options.tables ?? DEFAULT_HARNESS_CONFIG.tables).map((t) => t.toLowerCase());
	const benchmarkSchema = options.benchmarkSchema ?? DEFAULT_HARNESS_CONFIG.benchmarkSchema;
	const batchSize = options.batchSize ?? DEFAULT_HARNESS_CONFIG.batchSize;

	if (!Number.isInteger(batchSize) || batchSize < 1) {
		return Err(new ConfigError(`Batch size must be a positive integer, got ${batchSize}`));
	}
	const properties: CatalogProperties = { ...DEFAULT_CATALOG_PROPERTIES, ...options.catalogProperties };
	const config = parseConnectorConfig(properties);
	if (!config.ok) return config;

	const scope = new ResourceScope(logger);
	const fail = async (error: HarnessError): Promise<Result<never, HarnessError>> => {
		logger.error("bootstrap failed", describeError(error));
		await scope.close(error);
		return Err(error);
	};

	try {
		// Search node
		const searchNode = (options.createSearchNode ?? defaultSearchNode)(logger);
		const searchStarted = await searchNode.start();
		if (!searchStarted.ok) return fail(searchStarted.error);
		scope.add("search node", () => searchNode.close());

		// Query cluster
		const queryCluster = (options.createQueryCluster ?? defaultQueryCluster)(nodeCount, logger);
		const clusterStarted = await queryCluster.start();
		if (!clusterStarted.ok) return fail(clusterStarted.error);
		scope.add("query cluster", () => queryCluster.close());

		// Catalogs
		queryCluster.installPlugin(new BenchmarkPlugin());
		const benchmark = await queryCluster.createCatalog(BENCHMARK_CATALOG, BENCHMARK_CONNECTOR);
		if (!benchmark.ok) return fail(benchmark.error);

		const descriptions = await resolveTableDescriptions(config.value, queryCluster.metadata);
		if (!descriptions.ok) return fail(descriptions.error);

		queryCluster.installPlugin(new SearchPlugin({ baseUrl: searchNode.baseUrl, descriptions: descriptions.value }));
		const search = await queryCluster.createCatalog(SEARCH_CATALOG, SEARCH_CONNECTOR, properties);
		if (!search.ok) return fail(search.error);

		// Seed data
		const searchClient = searchNode.client({ requestTimeoutMs: config.value.requestTimeoutMs });
		scope.add("search client", () => searchClient.close());
		const loader = new SearchLoader({
			source: queryCluster.client({ user: "seedline", catalog: BENCHMARK_CATALOG, schema: benchmarkSchema }),
			indexer: new ElasticsearchBulkIndexer(searchClient),
			retryPolicy: retryPolicyFromConfig(config.value, options.retryBackoff),
			batchSize,
			catalog: BENCHMARK_CATALOG,
			schema: benchmarkSchema,
			logger,
		});

		const startedAt = Date.now();
		const loaded: RowsLoaded[] = [];
		for (const table of tables) {
			const descriptor = descriptions.value.get(config.value.defaultSchema, table);
			if (!descriptor) {
				return fail(new ConfigError(`No table description for ${config.value.defaultSchema}.${table}`));
			}

			const created = await ensureIndex(searchClient, descriptor.indexName, buildIndexMappings(descriptor));
			if (!created.ok) {
				return fail(
					new LoadError(`Creating index "${descriptor.indexName}" failed for table ${table}`, { table }, created.error),
				);
			}

			const result = await loader.loadTable(table);
			if (!result.ok) return fail(result.error);
			loaded.push(result.value);
			logger.info("loaded table", {
				table,
				rows: result.value.rows,
				elapsed: formatDuration(result.value.elapsedMs),
			});
		}
		logger.info("loading complete", {
			tables: loaded.length,
			rows: loaded.reduce((sum, l) => sum + l.rows, 0),
			elapsed: formatDuration(Date.now() - startedAt),
		});

		const session = createSession(config.value.defaultSchema);
		let closing: Promise<void> | undefined;
		return Ok({
			queryCluster,
			searchNode,
			session,
			client: queryCluster.client(session),
			baseUrl: queryCluster.baseUrl,
			loaded,
			close() {
				closing ??= scope.close().then(([first]) => {
					if (first) throw first;
				});
				return closing;
			},
		});
	} catch (error) {
		return fail(new BootstrapError("Cluster bootstrap failed", toError(error)));
	}
}

function defaultSearchNode(logger: Logger): EmbeddedSearchNode {
	return new EmbeddedSearchNode({ logger });
}

function defaultQueryCluster(nodeCount: number, logger: Logger): QueryCluster {
	return new QueryCluster({ nodeCount, logger });
}
