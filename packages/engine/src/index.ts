export {
	type ClusterInfo,
	type MaterializedResult,
	QueryClient,
	RemoteQueryClient,
	type StatementResponse,
} from "./client";
export { type MetadataService, type TypeDecoder, TypeRegistry } from "./metadata";
export {
	CATALOG_HEADER,
	type ClusterNode,
	QueryCluster,
	type QueryClusterConfig,
	SCHEMA_HEADER,
} from "./query-cluster";
export {
	type CatalogEntry,
	type CatalogRegistry,
	type ConnectorFactoryRegistry,
	createCatalogRegistry,
	createConnectorFactoryRegistry,
} from "./registry";
export {
	parseStatement,
	QualifiedObjectName,
	qualifyTableReference,
	type SelectList,
	type SelectStatement,
	type TableReference,
} from "./sql";
export type {
	Connector,
	ConnectorContext,
	ConnectorFactory,
	Plugin,
	QueryResult,
	Session,
} from "./types";
