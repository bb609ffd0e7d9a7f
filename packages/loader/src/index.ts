export { BatchAccumulator, type BulkIndexBatch } from "./batch";
export { convertValue, type DocumentValue, toDocument } from "./document";
export {
	DEFAULT_BATCH_SIZE,
	type LoaderState,
	type RowSource,
	type RowsLoaded,
	SearchLoader,
	type SearchLoaderConfig,
} from "./loader";
export { type SubmitFailure, type SubmitFailureKind, type SubmitHooks, submitWithRetry } from "./retry";
