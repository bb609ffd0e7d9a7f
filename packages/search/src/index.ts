export {
	type BulkDocument,
	type BulkIndexer,
	type BulkItemFailure,
	ElasticsearchBulkIndexer,
	ensureIndex,
} from "./bulk-indexer";
export { createSearchClient, type SearchClientOptions } from "./client";
export { SEARCH_CONNECTOR, SearchConnector, SearchPlugin, type SearchPluginOptions } from "./connector";
export {
	type BulkFault,
	type BulkRequestRecord,
	EmbeddedSearchNode,
	type EmbeddedSearchNodeConfig,
} from "./embedded-node";
export { isTransientStatus, toSearchEngineError } from "./errors";
export { acceptsValue, inferFieldType, SearchIndex, type StoredDocument } from "./index-store";
export {
	buildIndexMappings,
	FIELD_TYPES,
	type FieldType,
	fieldTypeFor,
	type IndexMappings,
	isFieldType,
} from "./mapping";
export {
	createTableDescriptionProvider,
	decodeTableDescription,
	resolveDescriptionDirectory,
	resolveTableDescriptions,
	type TableDescriptionProvider,
} from "./table-descriptions";
