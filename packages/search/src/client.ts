import { Client } from "@elastic/elasticsearch";

/** Options for {@link createSearchClient}. */
export interface SearchClientOptions {
	/** Per-request timeout (default 30s). */
	requestTimeoutMs?: number;
}

/**
 * Create a client for a search node.
 *
 * Transport-level retries are disabled: callers that retry own the policy.
 */
export function createSearchClient(baseUrl: string, options: SearchClientOptions = {}): Client {
	return new Client({
		node: baseUrl,
		maxRetries: 0,
		requestTimeout: options.requestTimeoutMs ?? 30_000,
		sniffOnStart: false,
	});
}
