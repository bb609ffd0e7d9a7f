import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { Client } from "@elastic/elasticsearch";
import {
	BootstrapError,
	describeError,
	Err,
	type Logger,
	Ok,
	parseDuration,
	type Result,
	silentLogger,
	toError,
} from "@seedline/core";
import { createSearchClient, type SearchClientOptions } from "./client";
import { type SearchErrorCause, SearchIndex, type StoredDocument } from "./index-store";
import type { IndexMappings } from "./mapping";

// ---------------------------------------------------------------------------
// Configuration and fault injection
// ---------------------------------------------------------------------------

/** Configuration for an {@link EmbeddedSearchNode}. */
export interface EmbeddedSearchNodeConfig {
	/** Port to listen on (default 0, an ephemeral port). */
	port?: number;
	/** Host to bind (default "127.0.0.1"). */
	host?: string;
	/** Cluster name reported by `GET /` (default "seedline"). */
	clusterName?: string;
	logger?: Logger;
}

/**
 * A fault applied to the next bulk request. Faults queue up and each bulk
 * request consumes at most one.
 */
export type BulkFault =
	/** Fail the whole request with `status`. Nothing is indexed. */
	| { kind: "request"; status: number; type?: string; reason?: string }
	/** Reject the items at `positions` (all items when omitted) with `status`. */
	| { kind: "items"; status: number; positions?: number[]; type?: string; reason?: string }
	/** Destroy the connection without responding. Nothing is indexed. */
	| { kind: "disconnect" }
	/** Wait before handling the request normally. */
	| { kind: "delay"; ms: number };

/** What the node observed for one bulk request. */
export interface BulkRequestRecord {
	/** Index named in the URL, if any. */
	readonly index?: string;
	/** Number of actions in the request. */
	readonly items: number;
	/** The fault applied to this request, if any. */
	readonly fault?: BulkFault["kind"];
}

interface ScrollContext {
	readonly index: string;
	readonly docs: ReadonlyArray<StoredDocument>;
	position: number;
	readonly size: number;
	expiresAt: number;
}

interface BulkOperation {
	action: "index" | "create" | "delete";
	index?: string;
	id?: string;
	source?: unknown;
}

const DEFAULT_SEARCH_SIZE = 10;
const MAX_RESULT_WINDOW = 10_000;
const VERSION = "8.11.0";
const INDEX_NAME_RE = /^[a-z0-9][a-z0-9_.+-]*$/;

// ---------------------------------------------------------------------------
// EmbeddedSearchNode
// ---------------------------------------------------------------------------

/**
 * A single-node, in-memory search engine that speaks the subset of the
 * Elasticsearch REST API the harness uses.
 *
 * Start it with {@link start}, talk to it through {@link client} (the
 * official client over HTTP), and inspect it in-process with
 * {@link documents} and {@link bulkRequests}. {@link injectBulkFault} queues
 * failures for subsequent bulk requests.
 */
export class EmbeddedSearchNode {
	private readonly config: Required<Omit<EmbeddedSearchNodeConfig, "logger">>;
	private readonly logger: Logger;
	private readonly indices = new Map<string, SearchIndex>();
	private readonly scrolls = new Map<string, ScrollContext>();
	private readonly faults: BulkFault[] = [];
	private readonly bulkLog: BulkRequestRecord[] = [];
	private readonly nodeId = randomUUID();
	private httpServer: Server | null = null;
	private resolvedPort = 0;
	private cachedClient: Client | null = null;

	constructor(config: EmbeddedSearchNodeConfig = {}) {
		this.config = {
			port: config.port ?? 0,
			host: config.host ?? "127.0.0.1",
			clusterName: config.clusterName ?? "seedline",
		};
		this.logger = (config.logger ?? silentLogger).child({ component: "search-node" });
	}

	/** Start listening. Fails with {@link BootstrapError} when the port cannot be bound. */
	async start(): Promise<Result<void, BootstrapError>> {
		if (this.httpServer) return Ok(undefined);

		const server = createServer((req, res) => {
			void this.handleRequest(req, res);
		});

		try {
			await new Promise<void>((resolve, reject) => {
				server.once("error", reject);
				server.listen(this.config.port, this.config.host, () => {
					server.off("error", reject);
					resolve();
				});
			});
		} catch (error) {
			return Err(new BootstrapError("Failed to start embedded search node", toError(error)));
		}

		const addr = server.address();
		if (addr && typeof addr === "object") {
			this.resolvedPort = addr.port;
		}
		this.httpServer = server;
		this.logger.info("search node started", { baseUrl: this.baseUrl });
		return Ok(undefined);
	}

	/** Base URL of the REST endpoint. Empty until started. */
	get baseUrl(): string {
		return this.httpServer ? `http://${this.config.host}:${this.resolvedPort}` : "";
	}

	/** Whether the node is listening. */
	get isRunning(): boolean {
		return this.httpServer !== null;
	}

	/**
	 * A search client bound to this node. The default client is created once
	 * and closed with the node; passing options creates a fresh client the
	 * caller owns.
	 */
	client(options?: SearchClientOptions): Client {
		if (!this.httpServer) {
			throw new BootstrapError("Embedded search node is not running");
		}
		if (options) return createSearchClient(this.baseUrl, options);
		if (!this.cachedClient) {
			this.cachedClient = createSearchClient(this.baseUrl);
		}
		return this.cachedClient;
	}

	/** Stop listening, close the cached client and discard every index. */
	async close(): Promise<void> {
		const client = this.cachedClient;
		this.cachedClient = null;
		if (client) await client.close();

		const server = this.httpServer;
		if (server) {
			this.httpServer = null;
			await new Promise<void>((resolve) => {
				server.close(() => resolve());
				server.closeAllConnections();
			});
			this.logger.info("search node stopped");
		}
		this.indices.clear();
		this.scrolls.clear();
		this.faults.length = 0;
	}

	// -----------------------------------------------------------------------
	// In-process inspection and fault injection
	// -----------------------------------------------------------------------

	/** Names of existing indices, sorted. */
	indexNames(): string[] {
		return [...this.indices.keys()].sort();
	}

	/** Sources of every document in `index`, in insertion order. */
	documents(index: string): Record<string, unknown>[] {
		return this.indices.get(index)?.documents().map((d) => d.source) ?? [];
	}

	/** Current mappings of `index`. */
	mappings(index: string): IndexMappings | undefined {
		return this.indices.get(index)?.mappings();
	}

	/** Every bulk request received so far, in arrival order. */
	bulkRequests(): ReadonlyArray<BulkRequestRecord> {
		return [...this.bulkLog];
	}

	/** Number of scroll contexts not yet cleared. */
	openScrolls(): number {
		return this.scrolls.size;
	}

	/** Queue a fault for the next bulk request that has none applied. */
	injectBulkFault(fault: BulkFault): void {
		this.faults.push(fault);
	}

	// -----------------------------------------------------------------------
	// HTTP routing
	// -----------------------------------------------------------------------

	private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
		const url = new URL(req.url ?? "/", "http://localhost");
		const method = req.method ?? "GET";
		const segments = url.pathname.split("/").filter(Boolean).map(decodeURIComponent);

		try {
			const raw = await readBody(req);
			this.logger.debug("request", { method, path: url.pathname, bytes: raw.length });

			const [first, second, third] = segments;

			if (first === undefined) {
				if (method === "HEAD") return sendHead(res, 200);
				if (method === "GET") return sendJson(res, 200, this.info());
			} else if (first === "_cluster" && second === "health" && method === "GET") {
				return sendJson(res, 200, this.health());
			} else if (first === "_bulk" && second === undefined && (method === "POST" || method === "PUT")) {
				return await this.bulk(res, raw, undefined);
			} else if (first === "_search" && second === "scroll" && third === undefined) {
				const body = parseJsonBody(raw);
				if (!body.ok) return sendError(res, 400, body.error);
				if (method === "DELETE") return this.clearScroll(res, url, body.value);
				if (method === "GET" || method === "POST") return this.scroll(res, url, body.value);
			} else if (!first.startsWith("_") && third === undefined) {
				return await this.handleIndexRequest(res, method, first, second, url, raw);
			}

			sendError(res, 400, {
				type: "illegal_argument_exception",
				reason: `request [${url.pathname}] contains unrecognized method or path: [${method}]`,
			});
		} catch (error) {
			const err = toError(error);
			this.logger.error("search node request failed", { path: url.pathname, ...describeError(err) });
			if (!res.headersSent) {
				sendError(res, 500, { type: "exception", reason: err.message });
			} else {
				res.end();
			}
		}
	}

	private async handleIndexRequest(
		res: ServerResponse,
		method: string,
		indexName: string,
		endpoint: string | undefined,
		url: URL,
		raw: string,
	): Promise<void> {
		if (endpoint === "_bulk" && (method === "POST" || method === "PUT")) {
			return this.bulk(res, raw, indexName);
		}

		const body = parseJsonBody(raw);
		if (!body.ok) return sendError(res, 400, body.error);

		if (endpoint === undefined) {
			switch (method) {
				case "PUT":
					return this.createIndex(res, indexName, body.value);
				case "HEAD":
					return sendHead(res, this.indices.has(indexName) ? 200 : 404);
				case "DELETE":
					return this.deleteIndex(res, indexName);
				case "GET": {
					const index = this.indices.get(indexName);
					if (!index) return sendIndexNotFound(res, indexName);
					return sendJson(res, 200, { [indexName]: { mappings: index.mappings() } });
				}
			}
		}

		const index = this.indices.get(indexName);
		switch (endpoint) {
			case "_count":
				if (method !== "GET" && method !== "POST") break;
				if (!index) return sendIndexNotFound(res, indexName);
				if (!isMatchAll(body.value)) return sendUnsupportedQuery(res);
				return sendJson(res, 200, { count: index.size, _shards: SHARDS });
			case "_refresh":
				if (method !== "GET" && method !== "POST") break;
				if (!index) return sendIndexNotFound(res, indexName);
				return sendJson(res, 200, { _shards: SHARDS });
			case "_search":
				if (method !== "GET" && method !== "POST") break;
				if (!index) return sendIndexNotFound(res, indexName);
				return this.search(res, index, url, body.value);
			case "_mapping":
				if (method !== "GET") break;
				if (!index) return sendIndexNotFound(res, indexName);
				return sendJson(res, 200, { [indexName]: { mappings: index.mappings() } });
		}

		sendError(res, 400, {
			type: "illegal_argument_exception",
			reason: `request [${url.pathname}] contains unrecognized method or path: [${method}]`,
		});
	}

	// -----------------------------------------------------------------------
	// Endpoints
	// -----------------------------------------------------------------------

	private info(): Record<string, unknown> {
		return {
			name: "seedline-node-0",
			cluster_name: this.config.clusterName,
			cluster_uuid: this.nodeId,
			version: {
				number: VERSION,
				build_flavor: "default",
				build_type: "embedded",
				lucene_version: "9.8.0",
				minimum_wire_compatibility_version: "7.17.0",
				minimum_index_compatibility_version: "7.0.0",
			},
			tagline: "You Know, for Search",
		};
	}

	private health(): Record<string, unknown> {
		return {
			cluster_name: this.config.clusterName,
			status: "green",
			timed_out: false,
			number_of_nodes: 1,
			number_of_data_nodes: 1,
			active_primary_shards: this.indices.size,
			active_shards: this.indices.size,
			relocating_shards: 0,
			initializing_shards: 0,
			unassigned_shards: 0,
		};
	}

	private createIndex(res: ServerResponse, name: string, body: Record<string, unknown>): void {
		if (!INDEX_NAME_RE.test(name)) {
			return sendError(res, 400, invalidIndexName(name), { index: name });
		}
		if (this.indices.has(name)) {
			return sendError(
				res,
				400,
				{ type: "resource_already_exists_exception", reason: `index [${name}] already exists` },
				{ index: name },
			);
		}
		const created = SearchIndex.create(name, body.mappings);
		if (!created.ok) return sendError(res, 400, created.error);

		this.indices.set(name, created.index);
		this.logger.debug("index created", { index: name });
		sendJson(res, 200, { acknowledged: true, shards_acknowledged: true, index: name });
	}

	private deleteIndex(res: ServerResponse, name: string): void {
		if (!this.indices.delete(name)) return sendIndexNotFound(res, name);
		sendJson(res, 200, { acknowledged: true });
	}

	private async bulk(res: ServerResponse, raw: string, defaultIndex: string | undefined): Promise<void> {
		const started = Date.now();
		const parsed = parseBulkBody(raw);
		if (!parsed.ok) {
			this.bulkLog.push({ index: defaultIndex, items: 0 });
			return sendError(res, 400, parsed.error);
		}
		const operations = parsed.value;
		const fault = this.faults.shift();
		this.bulkLog.push({ index: defaultIndex, items: operations.length, fault: fault?.kind });

		if (fault?.kind === "delay") {
			await new Promise((resolve) => setTimeout(resolve, fault.ms));
		}
		if (fault?.kind === "disconnect") {
			res.socket?.destroy();
			return;
		}
		if (fault?.kind === "request") {
			return sendError(res, fault.status, {
				type: fault.type ?? defaultFaultType(fault.status),
				reason: fault.reason ?? "injected request failure",
			});
		}

		const rejected = fault?.kind === "items" ? new Set(fault.positions ?? operations.map((_, i) => i)) : null;
		let errors = false;
		const items = operations.map((op, position) => {
			const index = op.index ?? defaultIndex;
			if (rejected && fault?.kind === "items" && rejected.has(position)) {
				errors = true;
				return itemError(op, index ?? "", op.id ?? "", fault.status, {
					type: fault.type ?? defaultFaultType(fault.status),
					reason: fault.reason ?? "injected item rejection",
				});
			}
			const item = this.applyOperation(op, index);
			const result = item[op.action];
			if (result && "error" in result) errors = true;
			return item;
		});

		sendJson(res, 200, { took: Date.now() - started, errors, items });
	}

	private applyOperation(op: BulkOperation, indexName: string | undefined): Record<string, Record<string, unknown>> {
		if (indexName === undefined) {
			return itemError(op, "", op.id ?? "", 400, {
				type: "action_request_validation_exception",
				reason: "Validation Failed: 1: index is missing;",
			});
		}
		if (!INDEX_NAME_RE.test(indexName)) {
			return itemError(op, indexName, op.id ?? "", 400, invalidIndexName(indexName));
		}

		let index = this.indices.get(indexName);
		if (op.action === "delete") {
			const found = index?.delete(op.id ?? "") ?? false;
			return {
				delete: {
					_index: indexName,
					_id: op.id ?? "",
					result: found ? "deleted" : "not_found",
					status: found ? 200 : 404,
				},
			};
		}

		if (!index) {
			const created = SearchIndex.create(indexName);
			if (!created.ok) return itemError(op, indexName, op.id ?? "", 400, created.error);
			index = created.index;
			this.indices.set(indexName, index);
		}

		const outcome = index.index(op.source, op.id, op.action);
		if (!outcome.ok) {
			return itemError(op, indexName, outcome.id, outcome.status, outcome.error);
		}
		return {
			[op.action]: {
				_index: indexName,
				_id: outcome.id,
				_version: outcome.version,
				result: outcome.created ? "created" : "updated",
				_shards: { total: 1, successful: 1, failed: 0 },
				_seq_no: outcome.seqNo,
				_primary_term: 1,
				status: outcome.created ? 201 : 200,
			},
		};
	}

	private search(res: ServerResponse, index: SearchIndex, url: URL, body: Record<string, unknown>): void {
		if (!isMatchAll(body)) return sendUnsupportedQuery(res);

		const size = numberParam(body.size, url.searchParams.get("size"), DEFAULT_SEARCH_SIZE);
		const from = numberParam(body.from, url.searchParams.get("from"), 0);
		const scroll = url.searchParams.get("scroll") ?? stringValue(body.scroll);

		if (size < 0 || from < 0 || from + size > MAX_RESULT_WINDOW) {
			return sendError(res, 400, {
				type: "illegal_argument_exception",
				reason: `Result window is too large, from + size must be less than or equal to: [${MAX_RESULT_WINDOW}] but was [${from + size}].`,
			});
		}

		const docs = index.documents();
		let scrollId: string | undefined;
		if (scroll !== undefined) {
			const keepAlive = parseDuration(scroll);
			if (!keepAlive.ok) {
				return sendError(res, 400, {
					type: "illegal_argument_exception",
					reason: `failed to parse setting [scroll] with value [${scroll}] as a time value`,
				});
			}
			scrollId = randomUUID();
			this.scrolls.set(scrollId, {
				index: index.name,
				docs,
				position: from + size,
				size,
				expiresAt: Date.now() + keepAlive.value,
			});
		}

		sendJson(res, 200, searchResponse(index.name, docs, from, size, scrollId));
	}

	private scroll(res: ServerResponse, url: URL, body: Record<string, unknown>): void {
		const scrollId = url.searchParams.get("scroll_id") ?? stringValue(body.scroll_id);
		const keepAliveText = url.searchParams.get("scroll") ?? stringValue(body.scroll);
		const context = scrollId === undefined ? undefined : this.scrolls.get(scrollId);

		if (scrollId === undefined || !context || context.expiresAt < Date.now()) {
			if (scrollId !== undefined) this.scrolls.delete(scrollId);
			return sendError(res, 404, {
				type: "search_context_missing_exception",
				reason: `No search context found for id [${scrollId ?? ""}]`,
			});
		}

		if (keepAliveText !== undefined) {
			const keepAlive = parseDuration(keepAliveText);
			if (!keepAlive.ok) {
				return sendError(res, 400, {
					type: "illegal_argument_exception",
					reason: `failed to parse setting [scroll] with value [${keepAliveText}] as a time value`,
				});
			}
			context.expiresAt = Date.now() + keepAlive.value;
		}

		const response = searchResponse(context.index, context.docs, context.position, context.size, scrollId);
		context.position += context.size;
		sendJson(res, 200, response);
	}

	private clearScroll(res: ServerResponse, url: URL, body: Record<string, unknown>): void {
		const requested = body.scroll_id ?? url.searchParams.get("scroll_id") ?? undefined;
		const ids = Array.isArray(requested) ? requested : [requested];
		let freed = 0;
		for (const id of ids) {
			if (typeof id === "string" && this.scrolls.delete(id)) freed++;
		}
		sendJson(res, 200, { succeeded: true, num_freed: freed });
	}
}

// ---------------------------------------------------------------------------
// Request parsing
// ---------------------------------------------------------------------------

const SHARDS = { total: 1, successful: 1, skipped: 0, failed: 0 };

function parseJsonBody(raw: string): { ok: true; value: Record<string, unknown> } | { ok: false; error: SearchErrorCause } {
	if (raw.trim() === "") return { ok: true, value: {} };
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		return { ok: false, error: { type: "parse_exception", reason: toError(error).message } };
	}
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		return { ok: false, error: { type: "parse_exception", reason: "request body must be an object" } };
	}
	return { ok: true, value: { ...parsed } };
}

/** Parse an NDJSON bulk body into operations. */
function parseBulkBody(raw: string): { ok: true; value: BulkOperation[] } | { ok: false; error: SearchErrorCause } {
	const lines = raw.split("\n").filter((line) => line.trim() !== "");
	const operations: BulkOperation[] = [];
	if (lines.length === 0) {
		return {
			ok: false,
			error: { type: "action_request_validation_exception", reason: "Validation Failed: 1: no requests added;" },
		};
	}

	for (let i = 0; i < lines.length; i++) {
		const header = parseJsonBody(lines[i] ?? "");
		const [action, ...others] = header.ok ? Object.keys(header.value) : [];
		if (!header.ok || others.length > 0 || (action !== "index" && action !== "create" && action !== "delete")) {
			return {
				ok: false,
				error: {
					type: "illegal_argument_exception",
					reason: `Malformed action/metadata line [${i + 1}], expected one of [create, delete, index, update] but found [${action ?? ""}]`,
				},
			};
		}

		const metadata = header.value[action];
		const op: BulkOperation = { action };
		if (typeof metadata === "object" && metadata !== null) {
			if ("_index" in metadata && typeof metadata._index === "string") op.index = metadata._index;
			if ("_id" in metadata && typeof metadata._id === "string") op.id = metadata._id;
		}

		if (action !== "delete") {
			i++;
			const sourceLine = lines[i];
			if (sourceLine === undefined) {
				return {
					ok: false,
					error: { type: "illegal_argument_exception", reason: "The bulk request must be terminated by a newline [\\n]" },
				};
			}
			try {
				op.source = JSON.parse(sourceLine);
			} catch (error) {
				return { ok: false, error: { type: "x_content_parse_exception", reason: toError(error).message } };
			}
		}
		operations.push(op);
	}
	return { ok: true, value: operations };
}

function isMatchAll(body: Record<string, unknown>): boolean {
	const query = body.query;
	if (query === undefined) return true;
	return typeof query === "object" && query !== null && Object.keys(query).length === 1 && "match_all" in query;
}

function numberParam(fromBody: unknown, fromQuery: string | null, fallback: number): number {
	if (typeof fromBody === "number") return fromBody;
	if (fromQuery !== null && /^\d+$/.test(fromQuery)) return Number.parseInt(fromQuery, 10);
	return fallback;
}

function stringValue(value: unknown): string | undefined {
	return typeof value === "string" ? value : undefined;
}

/** Read the full request body as a string. */
function readBody(req: IncomingMessage): Promise<string> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		req.on("data", (chunk: Buffer) => chunks.push(chunk));
		req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
		req.on("error", reject);
	});
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

const RESPONSE_HEADERS = {
	"Content-Type": "application/json; charset=UTF-8",
	"X-Elastic-Product": "Elasticsearch",
};

function sendJson(res: ServerResponse, status: number, body: unknown): void {
	res.writeHead(status, RESPONSE_HEADERS);
	res.end(JSON.stringify(body));
}

function sendHead(res: ServerResponse, status: number): void {
	res.writeHead(status, { ...RESPONSE_HEADERS, "Content-Length": "0" });
	res.end();
}

function sendError(
	res: ServerResponse,
	status: number,
	cause: SearchErrorCause,
	extra: Record<string, unknown> = {},
): void {
	const error = { ...cause, ...extra };
	sendJson(res, status, { error: { root_cause: [error], ...error }, status });
}

function sendIndexNotFound(res: ServerResponse, index: string): void {
	sendError(
		res,
		404,
		{ type: "index_not_found_exception", reason: `no such index [${index}]` },
		{ "resource.type": "index_or_alias", "resource.id": index, index },
	);
}

function sendUnsupportedQuery(res: ServerResponse): void {
	sendError(res, 400, { type: "parsing_exception", reason: "only [match_all] queries are supported" });
}

function invalidIndexName(name: string): SearchErrorCause {
	return {
		type: "invalid_index_name_exception",
		reason: `Invalid index name [${name}], must be lowercase and must not start with '_', '-' or '+'`,
	};
}

function defaultFaultType(status: number): string {
	if (status === 429) return "es_rejected_execution_exception";
	if (status >= 500) return "unavailable_shards_exception";
	return "illegal_argument_exception";
}

function itemError(
	op: BulkOperation,
	index: string,
	id: string,
	status: number,
	error: SearchErrorCause,
): Record<string, Record<string, unknown>> {
	return { [op.action]: { _index: index, _id: id, status, error } };
}

function searchResponse(
	index: string,
	docs: ReadonlyArray<StoredDocument>,
	from: number,
	size: number,
	scrollId: string | undefined,
): Record<string, unknown> {
	const hits = docs.slice(from, from + size).map((doc) => ({
		_index: index,
		_id: doc.id,
		_score: 1,
		_source: doc.source,
	}));
	const response: Record<string, unknown> = {
		took: 0,
		timed_out: false,
		_shards: SHARDS,
		hits: {
			total: { value: docs.length, relation: "eq" },
			max_score: hits.length > 0 ? 1 : null,
			hits,
		},
	};
	if (scrollId !== undefined) response._scroll_id = scrollId;
	return response;
}
