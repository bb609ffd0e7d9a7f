import type { Client } from "@elastic/elasticsearch";
import {
	type CatalogProperties,
	type ColumnDescriptor,
	type ConfigError,
	type ConnectorConfig,
	describeError,
	type Logger,
	Ok,
	parseConnectorConfig,
	type Result,
	toError,
} from "@seedline/core";
import type { Connector, ConnectorContext, ConnectorFactory, Plugin } from "@seedline/engine";
import { createSearchClient } from "./client";
import { type TableDescriptionProvider, resolveTableDescriptions } from "./table-descriptions";

/** Connector name the search factory registers under. */
export const SEARCH_CONNECTOR = "search";

/** Options for {@link SearchPlugin}. */
export interface SearchPluginOptions {
	/** Base URL of the search engine. */
	baseUrl: string;
	/**
	 * Pre-resolved table descriptions. When omitted each catalog resolves
	 * its own from `table-description-directory`.
	 */
	descriptions?: TableDescriptionProvider;
}

/**
 * Read-only connector exposing search indices as tables.
 *
 * Tables come from the table descriptions; scans page through the backing
 * index with the scroll API and map each document back to a row in column
 * order. Fields missing from a document read as null.
 */
export class SearchConnector implements Connector {
	constructor(
		private readonly client: Client,
		private readonly config: ConnectorConfig,
		private readonly descriptions: TableDescriptionProvider,
		private readonly logger: Logger,
	) {}

	listSchemas(): string[] {
		return [...new Set([this.config.defaultSchema, ...this.descriptions.schemas()])].sort();
	}

	listTables(schema: string): string[] {
		return this.descriptions.list(schema).map((d) => d.tableName);
	}

	getColumns(schema: string, table: string): ReadonlyArray<ColumnDescriptor> | undefined {
		return this.descriptions.get(schema, table)?.columns;
	}

	async *scan(schema: string, table: string): AsyncGenerator<unknown[]> {
		const descriptor = this.descriptions.get(schema, table);
		if (!descriptor) return;

		const scroll = `${Math.max(1, Math.ceil(this.config.scrollTimeoutMs))}ms`;
		let response = await this.client.search<Record<string, unknown>>({
			index: descriptor.indexName,
			scroll,
			size: this.config.scrollSize,
			query: { match_all: {} },
		});
		let scrollId = response._scroll_id;

		try {
			while (response.hits.hits.length > 0) {
				for (const hit of response.hits.hits) {
					const source = hit._source ?? {};
					yield descriptor.columns.map((column) => source[column.name] ?? null);
				}
				if (scrollId === undefined) break;
				response = await this.client.scroll<Record<string, unknown>>({ scroll_id: scrollId, scroll });
				scrollId = response._scroll_id ?? scrollId;
			}
		} finally {
			if (scrollId !== undefined) {
				await this.clearScroll(scrollId);
			}
		}
	}

	async close(): Promise<void> {
		await this.client.close();
	}

	private async clearScroll(scrollId: string): Promise<void> {
		try {
			await this.client.clearScroll({ scroll_id: scrollId });
		} catch (error) {
			this.logger.warn("failed to clear scroll", { scrollId, ...describeError(toError(error)) });
		}
	}
}

/** Plugin contributing the search connector. */
export class SearchPlugin implements Plugin {
	readonly name = "search";

	constructor(private readonly options: SearchPluginOptions) {}

	getConnectorFactories(): ReadonlyArray<ConnectorFactory> {
		const options = this.options;
		return [
			{
				name: SEARCH_CONNECTOR,
				async create(
					catalogName: string,
					properties: CatalogProperties,
					context: ConnectorContext,
				): Promise<Result<Connector, ConfigError>> {
					const config = parseConnectorConfig(properties);
					if (!config.ok) return config;

					let descriptions = options.descriptions;
					if (!descriptions) {
						const resolved = await resolveTableDescriptions(config.value, context.metadata);
						if (!resolved.ok) return resolved;
						descriptions = resolved.value;
					}

					const client = createSearchClient(options.baseUrl, {
						requestTimeoutMs: config.value.requestTimeoutMs,
					});
					context.logger.info("search connector created", {
						catalog: catalogName,
						tables: descriptions.list().length,
					});
					return Ok(new SearchConnector(client, config.value, descriptions, context.logger));
				},
			},
		];
	}
}
