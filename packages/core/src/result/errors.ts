/** Base error class for all Seedline errors */
export class HarnessError extends Error {
	readonly code: string;
	override readonly cause?: Error;
	/** Secondary failures raised while cleaning up after this error. */
	readonly suppressed: Error[] = [];

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}

	/** Record a secondary failure without replacing this error as the primary one. */
	addSuppressed(error: Error): void {
		if (error !== this) {
			this.suppressed.push(error);
		}
	}
}

/** Cluster bootstrap failure. Aborts the harness and tears down acquired resources */
export class BootstrapError extends HarnessError {
	constructor(message: string, cause?: Error) {
		super(message, "BOOTSTRAP_FAILED", cause);
	}
}

/** Malformed or unresolvable configuration (catalog properties, table descriptions) */
export class ConfigError extends HarnessError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_INVALID", cause);
	}
}

/** Query submission failure: bad SQL or an unknown catalog, schema or table */
export class QueryError extends HarnessError {
	constructor(message: string, cause?: Error) {
		super(message, "QUERY_FAILED", cause);
	}
}

/** A value that cannot be represented as its column's type */
export class ConversionError extends HarnessError {
	/** Column whose value failed to convert. */
	readonly column: string;

	constructor(column: string, message: string, cause?: Error) {
		super(message, "CONVERSION_FAILED", cause);
		this.column = column;
	}
}

/** Search engine request failure, classified as transient (retryable) or structural */
export class SearchEngineError extends HarnessError {
	/** Whether retrying the same request may succeed. */
	readonly transient: boolean;
	/** HTTP status of the failed request or item, when one was received. */
	readonly status?: number;

	constructor(message: string, options: { transient: boolean; status?: number }, cause?: Error) {
		super(message, "SEARCH_ENGINE_ERROR", cause);
		this.transient = options.transient;
		this.status = options.status;
	}
}

/** Details attached to a {@link LoadError}. */
export interface LoadErrorDetails {
	/** Table (or target index) whose load failed. */
	table: string;
	/** Zero-based index of the batch that failed, when the failure happened during submission. */
	batchIndex?: number;
	/** Zero-based source row position of the offending row, for structural rejections. */
	rowPosition?: number;
	/** Submission attempts made for the failed batch (0 when nothing was submitted). */
	attempts?: number;
}

/** Per-table load failure */
export class LoadError extends HarnessError {
	readonly table: string;
	readonly batchIndex?: number;
	readonly rowPosition?: number;
	readonly attempts: number;

	constructor(message: string, details: LoadErrorDetails, cause?: Error) {
		super(message, "LOAD_FAILED", cause);
		this.table = details.table;
		this.batchIndex = details.batchIndex;
		this.rowPosition = details.rowPosition;
		this.attempts = details.attempts ?? 0;
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
