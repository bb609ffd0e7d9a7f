export {
	type CatalogProperties,
	CONNECTOR_PROPERTY,
	type ConnectorConfig,
	DEFAULT_CONNECTOR_PROPERTIES,
	parseConnectorConfig,
} from "./connector-config";
export { formatDuration, parseDuration } from "./duration";
export {
	describeError,
	isLogLevel,
	LOG_LEVELS,
	type LogEntry,
	Logger,
	type LogLevel,
	silentLogger,
} from "./logger";
export * from "./result";
export { backoffDelay, type RetryPolicy, retryPolicyFromConfig } from "./retry";
export {
	type ColumnDescriptor,
	type ColumnValue,
	createTableDescriptor,
	isSqlTypeName,
	type QueryResultRow,
	SQL_TYPE_NAMES,
	type SqlTypeName,
	type TableDescriptor,
} from "./types";
export * from "./validation";
