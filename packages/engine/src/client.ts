import {
	type ColumnDescriptor,
	Err,
	isSqlTypeName,
	Ok,
	QueryError,
	type QueryResultRow,
	type Result,
	toError,
} from "@seedline/core";
import type { QueryCluster } from "./query-cluster";
import type { QueryResult, Session } from "./types";

/** A fully materialised query result. */
export interface MaterializedResult {
	readonly columns: ReadonlyArray<ColumnDescriptor>;
	readonly rows: QueryResultRow[];
}

/** Runs queries against a cluster with a fixed session. */
export class QueryClient {
	constructor(
		private readonly cluster: QueryCluster,
		readonly session: Session,
	) {}

	/** Submit a query and return its row stream. */
	execute(sql: string): Promise<Result<QueryResult, QueryError>> {
		return this.cluster.execute(this.session, sql);
	}

	/** Submit a query and collect every row. */
	async executeAll(sql: string): Promise<Result<MaterializedResult, QueryError>> {
		const result = await this.execute(sql);
		if (!result.ok) return result;

		const rows: QueryResultRow[] = [];
		try {
			for await (const row of result.value.rows) {
				rows.push(row);
			}
		} catch (error) {
			return Err(new QueryError(`Query failed while reading rows: ${sql}`, toError(error)));
		}
		return Ok({ columns: result.value.columns, rows });
	}
}

/** Response body of `POST /v1/statement`. */
export interface StatementResponse {
	columns: ColumnDescriptor[];
	data: unknown[][];
}

/** Response body of `GET /v1/info`. */
export interface ClusterInfo {
	nodeId: string;
	nodeCount: number;
	catalogs: string[];
	uptimeMs: number;
}

/** Queries a running coordinator over HTTP. */
export class RemoteQueryClient {
	private readonly baseUrl: string;

	constructor(
		baseUrl: string,
		readonly session: Session,
	) {
		this.baseUrl = baseUrl.replace(/\/$/, "");
	}

	/** Fetch coordinator information. */
	async info(): Promise<Result<ClusterInfo, QueryError>> {
		return this.request("/v1/info", { method: "GET" }, isClusterInfo);
	}

	/** Submit a statement and return its columns and row values. */
	async statement(sql: string): Promise<Result<StatementResponse, QueryError>> {
		const headers: Record<string, string> = { "Content-Type": "text/plain" };
		if (this.session.catalog) headers["X-Seedline-Catalog"] = this.session.catalog;
		if (this.session.schema) headers["X-Seedline-Schema"] = this.session.schema;
		return this.request("/v1/statement", { method: "POST", headers, body: sql }, isStatementResponse);
	}

	private async request<T>(
		path: string,
		init: RequestInit,
		isExpected: (body: unknown) => body is T,
	): Promise<Result<T, QueryError>> {
		let response: Response;
		try {
			response = await fetch(`${this.baseUrl}${path}`, init);
		} catch (error) {
			return Err(new QueryError(`Request to ${path} failed`, toError(error)));
		}

		let body: unknown;
		try {
			body = await response.json();
		} catch (error) {
			return Err(new QueryError(`Response from ${path} is not JSON (status ${response.status})`, toError(error)));
		}
		if (!response.ok) {
			return Err(new QueryError(errorMessage(body) ?? `Request to ${path} failed with status ${response.status}`));
		}
		if (!isExpected(body)) {
			return Err(new QueryError(`Unexpected response body from ${path}`));
		}
		return Ok(body);
	}
}

function errorMessage(body: unknown): string | undefined {
	if (typeof body !== "object" || body === null || !("error" in body)) return undefined;
	const error = body.error;
	if (typeof error !== "object" || error === null || !("message" in error)) return undefined;
	return typeof error.message === "string" ? error.message : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isClusterInfo(body: unknown): body is ClusterInfo {
	return (
		isRecord(body) &&
		typeof body.nodeId === "string" &&
		typeof body.nodeCount === "number" &&
		Array.isArray(body.catalogs) &&
		body.catalogs.every((catalog) => typeof catalog === "string") &&
		typeof body.uptimeMs === "number"
	);
}

function isStatementResponse(body: unknown): body is StatementResponse {
	return (
		isRecord(body) &&
		Array.isArray(body.columns) &&
		body.columns.every(
			(column) => isRecord(column) && typeof column.name === "string" && typeof column.type === "string" && isSqlTypeName(column.type),
		) &&
		Array.isArray(body.data) &&
		body.data.every((row) => Array.isArray(row))
	);
}
