export { type ParsedArgs, parseArgs } from "./args";
export {
	BENCHMARK_CATALOG,
	buildCluster,
	type BuildClusterOptions,
	createSession,
	type RunningCluster,
	SEARCH_CATALOG,
} from "./bootstrap";
export {
	DEFAULT_CATALOG_PROPERTIES,
	DEFAULT_HARNESS_CONFIG,
	DEFAULT_SEARCH_SCHEMA,
	DEFAULT_TABLE_DESCRIPTION_DIRECTORY,
	HARNESS_ENV,
	type HarnessConfig,
	loadHarnessConfig,
	parseTables,
} from "./config";
export { ResourceScope } from "./resources";
