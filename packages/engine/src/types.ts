import type {
	CatalogProperties,
	ColumnDescriptor,
	ConfigError,
	Logger,
	QueryResultRow,
	Result,
} from "@seedline/core";
import type { MetadataService } from "./metadata";

/** Session defaults used to qualify partially-qualified table names. */
export interface Session {
	readonly user: string;
	readonly catalog?: string;
	readonly schema?: string;
}

/**
 * The outcome of a successfully submitted query.
 *
 * `rows` is a finite, non-restartable stream: iterate it once. Stopping
 * early (`break`, `return()`) releases the underlying scan.
 */
export interface QueryResult {
	readonly columns: ReadonlyArray<ColumnDescriptor>;
	readonly rows: AsyncIterable<QueryResultRow>;
}

/** Services a connector may use while it is being created. */
export interface ConnectorContext {
	readonly metadata: MetadataService;
	readonly logger: Logger;
}

/**
 * A configured data source bound to one catalog.
 *
 * Scans return raw values in the order of the columns the table reports.
 */
export interface Connector {
	/** Schemas exposed by this catalog. */
	listSchemas(): string[];
	/** Tables in a schema, sorted. Empty for unknown schemas. */
	listTables(schema: string): string[];
	/** Columns of a table, or `undefined` when the table does not exist. */
	getColumns(schema: string, table: string): ReadonlyArray<ColumnDescriptor> | undefined;
	/** Stream every row of a table. */
	scan(schema: string, table: string): AsyncIterable<ReadonlyArray<unknown>>;
	/** Release connections held by the connector. */
	close?(): Promise<void>;
}

/** Builds connectors of one kind from catalog properties. */
export interface ConnectorFactory {
	/** Connector name referenced by `createCatalog`. */
	readonly name: string;
	create(
		catalogName: string,
		properties: CatalogProperties,
		context: ConnectorContext,
	): Promise<Result<Connector, ConfigError>>;
}

/** A unit of installation contributing one or more connector factories. */
export interface Plugin {
	readonly name: string;
	getConnectorFactories(): ReadonlyArray<ConnectorFactory>;
}
