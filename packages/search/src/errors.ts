import { errors } from "@elastic/elasticsearch";
import { SearchEngineError, toError } from "@seedline/core";

/** Whether an HTTP status from the search engine is worth retrying. */
export function isTransientStatus(status: number): boolean {
	return status === 429 || status >= 500;
}

/**
 * Classify a failed search-engine call.
 *
 * Connection failures, timeouts, 429 and 5xx responses are transient;
 * everything else (other 4xx responses, serialization problems, an
 * unsupported product) is structural.
 */
export function toSearchEngineError(error: unknown, action: string): SearchEngineError {
	const cause = toError(error);

	if (
		error instanceof errors.ConnectionError ||
		error instanceof errors.TimeoutError ||
		error instanceof errors.NoLivingConnectionsError
	) {
		return new SearchEngineError(`${action} failed: ${cause.message}`, { transient: true }, cause);
	}

	if (error instanceof errors.ResponseError) {
		const status = error.statusCode ?? 0;
		return new SearchEngineError(
			`${action} failed with status ${status}: ${cause.message}`,
			{ transient: isTransientStatus(status), status },
			cause,
		);
	}

	return new SearchEngineError(`${action} failed: ${cause.message}`, { transient: false }, cause);
}
