// ---------------------------------------------------------------------------
// Batch submission with bounded retries
// ---------------------------------------------------------------------------

import {
	backoffDelay,
	Err,
	Ok,
	type Result,
	type RetryPolicy,
	SearchEngineError,
	toError,
} from "@seedline/core";
import type { BulkDocument, BulkIndexer, BulkItemFailure } from "@seedline/search";
import type { BulkIndexBatch } from "./batch";

/** Why a batch could not be indexed. */
export type SubmitFailureKind =
	/** Rejected in a way resubmitting cannot fix. */
	| "structural"
	/** Still failing after `maxAttempts` attempts. */
	| "exhausted"
	/** Still failing when the retry time budget ran out. */
	| "time-limit";

export interface SubmitFailure {
	readonly kind: SubmitFailureKind;
	readonly attempts: number;
	readonly cause: SearchEngineError;
	/** Source row position of the rejected document, for per-item structural rejections. */
	readonly rowPosition?: number;
}

export interface SubmitHooks {
	sleep(ms: number): Promise<void>;
	now(): number;
	/** Called before waiting out the backoff that precedes attempt `attempt + 1`. */
	onRetry?(attempt: number, delayMs: number, cause: SearchEngineError, pending: number): void;
}

/**
 * Submit a batch, retrying transient failures.
 *
 * A failed request is resubmitted whole; when only some items fail
 * transiently, only those items are resubmitted. Backoff delays are trimmed
 * to what is left of `policy.maxRetryDurationMs`, measured from the first
 * attempt. Resolves to the number of attempts made.
 */
export async function submitWithRetry(
	indexer: BulkIndexer,
	batch: BulkIndexBatch,
	policy: RetryPolicy,
	hooks: SubmitHooks,
): Promise<Result<number, SubmitFailure>> {
	const startedAt = hooks.now();
	let pending: ReadonlyArray<BulkDocument> = batch.documents;
	let attempt = 0;

	for (;;) {
		attempt++;
		const outcome = await submitOnce(indexer, batch.index, pending);

		let cause: SearchEngineError;
		if (!outcome.ok) {
			if (!outcome.error.transient) {
				return Err(failure("structural", attempt, outcome.error));
			}
			cause = outcome.error;
		} else {
			const failures = outcome.value;
			if (failures.length === 0) return Ok(attempt);

			const rejected = failures.find((item) => !item.transient);
			if (rejected) {
				const error = itemError(rejected, failures.length, pending.length);
				return Err(failure("structural", attempt, error, rejected.document.position));
			}
			cause = itemError(failures[0], failures.length, pending.length);
			pending = failures.map((item) => item.document);
		}

		if (attempt >= policy.maxAttempts) {
			return Err(failure("exhausted", attempt, cause));
		}
		const remaining = policy.maxRetryDurationMs - (hooks.now() - startedAt);
		if (remaining <= 0) {
			return Err(failure("time-limit", attempt, cause));
		}

		const delay = Math.min(backoffDelay(policy, attempt), remaining);
		hooks.onRetry?.(attempt, delay, cause, pending.length);
		await hooks.sleep(delay);
	}
}

function failure(
	kind: SubmitFailureKind,
	attempts: number,
	cause: SearchEngineError,
	rowPosition?: number,
): SubmitFailure {
	return { kind, attempts, cause, rowPosition };
}

/** A thrown indexer is reported as a structural failure of the request. */
async function submitOnce(
	indexer: BulkIndexer,
	index: string,
	documents: ReadonlyArray<BulkDocument>,
): Promise<Result<BulkItemFailure[], SearchEngineError>> {
	try {
		return await indexer.submit(index, documents);
	} catch (error) {
		return Err(
			new SearchEngineError(`Bulk submission to index "${index}" threw`, { transient: false }, toError(error)),
		);
	}
}

function itemError(item: BulkItemFailure | undefined, failed: number, submitted: number): SearchEngineError {
	const detail = item ? `${item.type}: ${item.reason}` : "unknown failure";
	return new SearchEngineError(`${failed} of ${submitted} documents rejected (${detail})`, {
		transient: item?.transient ?? false,
		status: item?.status,
	});
}
