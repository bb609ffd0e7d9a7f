// ---------------------------------------------------------------------------
// SearchLoader: streams query results into a search index
// ---------------------------------------------------------------------------

import {
	ConfigError,
	describeError,
	Err,
	formatDuration,
	LoadError,
	type Logger,
	Ok,
	type Result,
	type RetryPolicy,
	silentLogger,
	toError,
} from "@seedline/core";
import type { QueryClient } from "@seedline/engine";
import type { BulkIndexer } from "@seedline/search";
import { BatchAccumulator, type BulkIndexBatch } from "./batch";
import { toDocument } from "./document";
import { type SubmitFailure, submitWithRetry } from "./retry";

/** Lifecycle of a single load. */
export type LoaderState = "idle" | "querying" | "streaming" | "retrying" | "done" | "failed";

/** Summary of a completed load. */
export interface RowsLoaded {
	readonly table: string;
	readonly index: string;
	/** Rows streamed from the query, all of them acknowledged by the search engine. */
	readonly rows: number;
	readonly batches: number;
	readonly elapsedMs: number;
}

/** Anything that can run a query and stream its rows. */
export type RowSource = Pick<QueryClient, "execute">;

export const DEFAULT_BATCH_SIZE = 1000;

/** Configuration for {@link SearchLoader}. */
export interface SearchLoaderConfig {
	/** Runs source queries, normally bound to the benchmark catalog. */
	source: RowSource;
	indexer: BulkIndexer;
	retryPolicy: RetryPolicy;
	/** Documents per bulk request (default: 1000). */
	batchSize?: number;
	/** Catalog `loadTable` reads from (default: "benchmark"). */
	catalog?: string;
	/** Schema `loadTable` reads from (default: "tiny"). */
	schema?: string;
	/** Refresh the target index after the last batch (default: true). */
	refresh?: boolean;
	logger?: Logger;
	/** Called on every state transition. */
	onStateChange?: (state: LoaderState, previous: LoaderState) => void;
	/** Custom sleep function (for testing) */
	sleepFn?: (ms: number) => Promise<void>;
	/** Custom clock (for testing) */
	now?: () => number;
}

/**
 * Copies the rows of a query into a search index.
 *
 * Rows are read one at a time and converted into documents, which are
 * grouped into batches of `batchSize`. At most one batch is in flight while
 * the next one is being read; batch N+1 is submitted only after batch N was
 * acknowledged. Transient failures are retried under the retry policy; any
 * other failure stops the load, closes the row stream and returns a
 * {@link LoadError}. Documents already acknowledged stay indexed.
 *
 * A loader runs one load at a time.
 */
export class SearchLoader {
	private readonly source: RowSource;
	private readonly indexer: BulkIndexer;
	private readonly retryPolicy: RetryPolicy;
	private readonly batchSize: number;
	private readonly catalog: string;
	private readonly schema: string;
	private readonly refresh: boolean;
	private readonly logger: Logger;
	private readonly onStateChange?: (state: LoaderState, previous: LoaderState) => void;
	private readonly sleepFn: (ms: number) => Promise<void>;
	private readonly now: () => number;
	private current: LoaderState = "idle";
	private running = false;

	constructor(config: SearchLoaderConfig) {
		const batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
		if (!Number.isInteger(batchSize) || batchSize < 1) {
			throw new ConfigError(`Batch size must be a positive integer, got ${batchSize}`);
		}
		this.source = config.source;
		this.indexer = config.indexer;
		this.retryPolicy = config.retryPolicy;
		this.batchSize = batchSize;
		this.catalog = config.catalog ?? "benchmark";
		this.schema = config.schema ?? "tiny";
		this.refresh = config.refresh ?? true;
		this.logger = (config.logger ?? silentLogger).child({ component: "loader" });
		this.onStateChange = config.onStateChange;
		this.sleepFn = config.sleepFn ?? sleep;
		this.now = config.now ?? Date.now;
	}

	/** Current state of the most recent load. */
	get state(): LoaderState {
		return this.current;
	}

	/**
	 * Load the benchmark table `table` into the index of the same name.
	 * The name is lower-cased for both the query and the index.
	 */
	loadTable(table: string): Promise<Result<RowsLoaded, LoadError>> {
		const name = table.toLowerCase();
		return this.run(`SELECT * FROM ${this.catalog}.${this.schema}.${name}`, name, name);
	}

	/** Load every row of `sourceQuery` into `targetIndex`. */
	load(sourceQuery: string, targetIndex: string): Promise<Result<RowsLoaded, LoadError>> {
		return this.run(sourceQuery, targetIndex, targetIndex);
	}

	private async run(sql: string, index: string, table: string): Promise<Result<RowsLoaded, LoadError>> {
		if (this.running) {
			return Err(new LoadError(`Loader is busy; cannot load table ${table}`, { table }));
		}
		this.running = true;
		try {
			return await this.execute(sql, index, table);
		} finally {
			this.running = false;
		}
	}

	private async execute(sql: string, index: string, table: string): Promise<Result<RowsLoaded, LoadError>> {
		const startedAt = this.now();
		const log = this.logger.child({ table, index });

		this.transition("querying");
		const submitted = await this.source.execute(sql);
		if (!submitted.ok) {
			return this.fail(
				new LoadError(`Query for table ${table} failed: ${submitted.error.message}`, { table }, submitted.error),
				log,
			);
		}

		const { columns, rows } = submitted.value;
		this.transition("streaming");

		const accumulator = new BatchAccumulator(index, this.batchSize);
		let inFlight: Promise<Result<number, LoadError>> | undefined;
		const settle = async (): Promise<LoadError | undefined> => {
			if (!inFlight) return undefined;
			const settled = await inFlight;
			inFlight = undefined;
			return settled.ok ? undefined : settled.error;
		};

		let position = 0;
		let failure: LoadError | undefined;
		try {
			for await (const row of rows) {
				const document = toDocument(row, columns);
				if (!document.ok) {
					failure = new LoadError(
						`Cannot convert row ${position} of table ${table}: ${document.error.message}`,
						{ table, batchIndex: accumulator.batchCount, rowPosition: position },
						document.error,
					);
					break;
				}

				const batch = accumulator.add({ position, source: document.value });
				position++;
				if (batch) {
					failure = await settle();
					if (failure) break;
					inFlight = this.submit(batch, table, log);
				}
			}
		} catch (error) {
			failure = new LoadError(
				`Reading rows for table ${table} failed`,
				{ table, batchIndex: accumulator.batchCount },
				toError(error),
			);
		}

		// An earlier batch failing in flight outranks whatever stopped the read.
		const inFlightFailure = await settle();
		if (inFlightFailure) {
			if (failure) inFlightFailure.addSuppressed(failure);
			failure = inFlightFailure;
		}

		if (!failure) {
			const last = accumulator.flush();
			if (last) {
				const settled = await this.submit(last, table, log);
				if (!settled.ok) failure = settled.error;
			}
		}
		if (failure) return this.fail(failure, log);

		const batches = accumulator.batchCount;
		if (this.refresh && batches > 0) {
			const refreshed = await this.indexer.refresh(index);
			if (!refreshed.ok) {
				return this.fail(
					new LoadError(`Refreshing index "${index}" failed for table ${table}`, { table }, refreshed.error),
					log,
				);
			}
		}

		const elapsedMs = this.now() - startedAt;
		this.transition("done");
		log.debug("table loaded", { rows: position, batches, elapsed: formatDuration(elapsedMs) });
		return Ok({ table, index, rows: position, batches, elapsedMs });
	}

	/**
	 * Submit one batch under the retry policy; resolves to the attempts made.
	 * Never rejects, so the batch can stay in flight while rows are read.
	 */
	private async submit(batch: BulkIndexBatch, table: string, log: Logger): Promise<Result<number, LoadError>> {
		let result: Result<number, SubmitFailure>;
		try {
			result = await submitWithRetry(this.indexer, batch, this.retryPolicy, {
				sleep: this.sleepFn,
				now: this.now,
				onRetry: (attempt, delayMs, cause, pending) => {
					this.transition("retrying");
					log.warn("retrying batch", {
						batchIndex: batch.batchIndex,
						attempt,
						delayMs,
						pending,
						...describeError(cause),
					});
				},
			});
		} catch (error) {
			return Err(
				new LoadError(
					`Batch ${batch.batchIndex} of table ${table} could not be submitted`,
					{ table, batchIndex: batch.batchIndex },
					toError(error),
				),
			);
		}

		if (!result.ok) {
			return Err(submitError(result.error, batch, table));
		}
		if (this.current === "retrying") this.transition("streaming");
		log.debug("batch acknowledged", {
			batchIndex: batch.batchIndex,
			documents: batch.documents.length,
			attempts: result.value,
		});
		return Ok(result.value);
	}

	private fail(error: LoadError, log: Logger): Result<never, LoadError> {
		this.transition("failed");
		log.error("table load failed", {
			batchIndex: error.batchIndex,
			rowPosition: error.rowPosition,
			attempts: error.attempts,
			...describeError(error),
		});
		return Err(error);
	}

	private transition(next: LoaderState): void {
		const previous = this.current;
		if (previous === next) return;
		this.current = next;
		this.onStateChange?.(next, previous);
	}
}

function submitError(failure: SubmitFailure, batch: BulkIndexBatch, table: string): LoadError {
	const prefix = `Batch ${batch.batchIndex} of table ${table}`;
	const details = {
		table,
		batchIndex: batch.batchIndex,
		rowPosition: failure.rowPosition,
		attempts: failure.attempts,
	};
	switch (failure.kind) {
		case "structural":
			return new LoadError(
				failure.rowPosition === undefined
					? `${prefix} was rejected: ${failure.cause.message}`
					: `${prefix} was rejected at row ${failure.rowPosition}: ${failure.cause.message}`,
				details,
				failure.cause,
			);
		case "exhausted":
			return new LoadError(
				`${prefix} failed after ${failure.attempts} attempts: ${failure.cause.message}`,
				details,
				failure.cause,
			);
		case "time-limit":
			return new LoadError(
				`${prefix} failed after ${failure.attempts} attempts (retry time limit reached): ${failure.cause.message}`,
				details,
				failure.cause,
			);
	}
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
