import { parseDuration } from "./duration";
import { ConfigError } from "./result/errors";
import { Err, Ok, type Result } from "./result/result";

/** Catalog property keys understood by the search connector. */
export const CONNECTOR_PROPERTY = {
	DEFAULT_SCHEMA: "default-schema-name",
	TABLE_DESCRIPTION_DIRECTORY: "table-description-directory",
	SCROLL_SIZE: "scroll-size",
	SCROLL_TIMEOUT: "scroll-timeout",
	REQUEST_TIMEOUT: "request-timeout",
	MAX_REQUEST_RETRIES: "max-request-retries",
	MAX_REQUEST_RETRY_TIME: "max-request-retry-time",
} as const;

/** Catalog properties as handed to a connector factory. */
export type CatalogProperties = Readonly<Record<string, string>>;

/** Validated search connector configuration. Immutable once the catalog exists. */
export interface ConnectorConfig {
	/** Schema used when a table description does not name one. */
	readonly defaultSchema: string;
	/** URI (or path) of the directory holding table-description documents. */
	readonly tableDescriptionDirectory: string;
	/** Documents fetched per scroll page when reading from the search engine. */
	readonly scrollSize: number;
	/** How long the search engine keeps a scroll context alive between pages. */
	readonly scrollTimeoutMs: number;
	/** Timeout applied to each individual search engine request. */
	readonly requestTimeoutMs: number;
	/** Attempts made for a request before giving up (at least 1). */
	readonly maxRequestRetries: number;
	/** Total wall-clock time allowed for retrying a single request. */
	readonly maxRequestRetryTimeMs: number;
}

/** Property values used when a key is absent. */
export const DEFAULT_CONNECTOR_PROPERTIES: CatalogProperties = {
	[CONNECTOR_PROPERTY.DEFAULT_SCHEMA]: "default",
	[CONNECTOR_PROPERTY.SCROLL_SIZE]: "1000",
	[CONNECTOR_PROPERTY.SCROLL_TIMEOUT]: "1m",
	[CONNECTOR_PROPERTY.REQUEST_TIMEOUT]: "10s",
	[CONNECTOR_PROPERTY.MAX_REQUEST_RETRIES]: "5",
	[CONNECTOR_PROPERTY.MAX_REQUEST_RETRY_TIME]: "10s",
};

const KNOWN_KEYS = new Set<string>(Object.values(CONNECTOR_PROPERTY));

/**
 * Validate catalog properties into a {@link ConnectorConfig}.
 *
 * Checks:
 * - no unknown keys
 * - `table-description-directory` is present and non-empty
 * - sizes and retry counts are positive integers
 * - timeouts are valid durations greater than zero
 */
export function parseConnectorConfig(properties: CatalogProperties): Result<ConnectorConfig, ConfigError> {
	for (const key of Object.keys(properties)) {
		if (!KNOWN_KEYS.has(key)) {
			return Err(new ConfigError(`Unknown connector property "${key}"`));
		}
	}

	const props: Record<string, string> = { ...DEFAULT_CONNECTOR_PROPERTIES, ...properties };

	const defaultSchema = props[CONNECTOR_PROPERTY.DEFAULT_SCHEMA] ?? "";
	if (defaultSchema.trim().length === 0) {
		return Err(new ConfigError(`"${CONNECTOR_PROPERTY.DEFAULT_SCHEMA}" must be a non-empty string`));
	}

	const directory = props[CONNECTOR_PROPERTY.TABLE_DESCRIPTION_DIRECTORY];
	if (directory === undefined || directory.trim().length === 0) {
		return Err(
			new ConfigError(`"${CONNECTOR_PROPERTY.TABLE_DESCRIPTION_DIRECTORY}" is required`),
		);
	}

	const scrollSize = parsePositiveInt(props, CONNECTOR_PROPERTY.SCROLL_SIZE);
	if (!scrollSize.ok) return scrollSize;
	const maxRetries = parsePositiveInt(props, CONNECTOR_PROPERTY.MAX_REQUEST_RETRIES);
	if (!maxRetries.ok) return maxRetries;

	const scrollTimeout = parsePositiveDuration(props, CONNECTOR_PROPERTY.SCROLL_TIMEOUT);
	if (!scrollTimeout.ok) return scrollTimeout;
	const requestTimeout = parsePositiveDuration(props, CONNECTOR_PROPERTY.REQUEST_TIMEOUT);
	if (!requestTimeout.ok) return requestTimeout;
	const retryTime = parsePositiveDuration(props, CONNECTOR_PROPERTY.MAX_REQUEST_RETRY_TIME);
	if (!retryTime.ok) return retryTime;

	return Ok(
		Object.freeze({
			defaultSchema,
			tableDescriptionDirectory: directory,
			scrollSize: scrollSize.value,
			scrollTimeoutMs: scrollTimeout.value,
			requestTimeoutMs: requestTimeout.value,
			maxRequestRetries: maxRetries.value,
			maxRequestRetryTimeMs: retryTime.value,
		}),
	);
}

function parsePositiveInt(props: Record<string, string>, key: string): Result<number, ConfigError> {
	const raw = props[key] ?? "";
	const value = Number(raw);
	if (raw.trim().length === 0 || !Number.isInteger(value) || value < 1) {
		return Err(new ConfigError(`"${key}" must be a positive integer, got "${raw}"`));
	}
	return Ok(value);
}

function parsePositiveDuration(
	props: Record<string, string>,
	key: string,
): Result<number, ConfigError> {
	const raw = props[key] ?? "";
	const parsed = parseDuration(raw);
	if (!parsed.ok) {
		return Err(new ConfigError(`"${key}": ${parsed.error.message}`, parsed.error));
	}
	if (parsed.value <= 0) {
		return Err(new ConfigError(`"${key}" must be greater than zero, got "${raw}"`));
	}
	return Ok(parsed.value);
}
