import type { ConnectorConfig } from "./connector-config";

/** Bounds applied when retrying a failed request. Shared and read-only. */
export interface RetryPolicy {
	/** Total attempts, including the first (at least 1). */
	readonly maxAttempts: number;
	/** Cap on the cumulative wall-clock time spent retrying. */
	readonly maxRetryDurationMs: number;
	/** Delay before the second attempt. */
	readonly initialBackoffMs: number;
	/** Upper bound for any single delay. */
	readonly maxBackoffMs: number;
}

const DEFAULT_INITIAL_BACKOFF_MS = 100;
const DEFAULT_MAX_BACKOFF_MS = 2_000;

/** Derive the loader's retry policy from the connector's request-retry settings. */
export function retryPolicyFromConfig(
	config: Pick<ConnectorConfig, "maxRequestRetries" | "maxRequestRetryTimeMs">,
	backoff?: { initialBackoffMs?: number; maxBackoffMs?: number },
): RetryPolicy {
	return Object.freeze({
		maxAttempts: Math.max(1, config.maxRequestRetries),
		maxRetryDurationMs: config.maxRequestRetryTimeMs,
		initialBackoffMs: backoff?.initialBackoffMs ?? DEFAULT_INITIAL_BACKOFF_MS,
		maxBackoffMs: backoff?.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS,
	});
}

/**
 * Delay before the attempt following `failedAttempt` (1-based):
 * `min(initialBackoffMs * 2^(failedAttempt - 1), maxBackoffMs)`.
 */
export function backoffDelay(policy: RetryPolicy, failedAttempt: number): number {
	const exponential = policy.initialBackoffMs * 2 ** Math.max(0, failedAttempt - 1);
	return Math.min(exponential, policy.maxBackoffMs);
}
