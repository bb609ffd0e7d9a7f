// ---------------------------------------------------------------------------
// Structured logger: JSON-lines logger shared by every Seedline package
// ---------------------------------------------------------------------------

/** Supported log levels, ordered by severity. */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

/** A single log level. */
export type LogLevel = (typeof LOG_LEVELS)[number];

/** A single structured log entry. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

/** Numeric severity values for level comparison. */
const LEVEL_VALUE: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Type guard for a log level name (e.g. from an env var or CLI flag). */
export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Minimal structured logger that writes JSON lines to stdout.
 *
 * Supports log-level filtering and child loggers with bound context.
 *
 * @example
 * ```ts
 * const logger = new Logger("info");
 * const tableLogger = logger.child({ table: "orders" });
 * tableLogger.info("batch acknowledged", { batchIndex: 3 });
 * // => {"level":"info","msg":"batch acknowledged","ts":"...","table":"orders","batchIndex":3}
 * ```
 */
export class Logger {
	private readonly minLevel: LogLevel;
	private readonly bindings: Record<string, unknown>;

	/** Output function. Defaults to stdout, overridable for testing. */
	private readonly writeFn: (line: string) => void;

	constructor(
		minLevel: LogLevel = "info",
		bindings: Record<string, unknown> = {},
		writeFn?: (line: string) => void,
	) {
		this.minLevel = minLevel;
		this.bindings = bindings;
		this.writeFn = writeFn ?? ((line) => process.stdout.write(`${line}\n`));
	}

	/** Log at debug level. */
	debug(msg: string, data?: Record<string, unknown>): void {
		this.log("debug", msg, data);
	}

	/** Log at info level. */
	info(msg: string, data?: Record<string, unknown>): void {
		this.log("info", msg, data);
	}

	/** Log at warn level. */
	warn(msg: string, data?: Record<string, unknown>): void {
		this.log("warn", msg, data);
	}

	/** Log at error level. */
	error(msg: string, data?: Record<string, unknown>): void {
		this.log("error", msg, data);
	}

	/**
	 * Create a child logger with additional bound context.
	 *
	 * The child inherits the parent's level and write function, plus
	 * merges any parent bindings with the new ones.
	 */
	child(bindings: Record<string, unknown>): Logger {
		return new Logger(this.minLevel, { ...this.bindings, ...bindings }, this.writeFn);
	}

	private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
		if (LEVEL_VALUE[level] < LEVEL_VALUE[this.minLevel]) return;

		const entry: LogEntry = {
			level,
			msg,
			ts: new Date().toISOString(),
			...this.bindings,
			...data,
		};

		this.writeFn(JSON.stringify(entry));
	}
}

/** Logger that discards everything. */
export const silentLogger = new Logger("error", {}, () => {});

/** Serialise an error for a log entry, including its cause chain. */
export function describeError(error: Error): Record<string, unknown> {
	const described: Record<string, unknown> = {
		error: error.message,
		errorName: error.name,
	};
	if ("code" in error && typeof error.code === "string") {
		described.errorCode = error.code;
	}
	if (error.cause instanceof Error) {
		described.cause = error.cause.message;
	}
	return described;
}
