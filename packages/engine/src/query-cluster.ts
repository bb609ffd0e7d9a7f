import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import {
	BootstrapError,
	type CatalogProperties,
	type ColumnDescriptor,
	ConfigError,
	describeError,
	Err,
	type Logger,
	Ok,
	QueryError,
	type QueryResultRow,
	type Result,
	silentLogger,
	toError,
} from "@seedline/core";
import { QueryClient } from "./client";
import { type MetadataService, TypeRegistry } from "./metadata";
import {
	type CatalogRegistry,
	type ConnectorFactoryRegistry,
	createCatalogRegistry,
	createConnectorFactoryRegistry,
} from "./registry";
import { parseStatement, type QualifiedObjectName, qualifyTableReference, type SelectList } from "./sql";
import type { Connector, Plugin, QueryResult, Session } from "./types";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configuration for an in-process query cluster. */
export interface QueryClusterConfig {
	/** Total node count, coordinator included (default 1). */
	nodeCount?: number;
	/** Port for the coordinator endpoint (default 0, an ephemeral port). */
	port?: number;
	/** Host the coordinator binds to (default "127.0.0.1"). */
	host?: string;
	logger?: Logger;
}

/** A node participating in the cluster. */
export interface ClusterNode {
	readonly nodeId: string;
	readonly coordinator: boolean;
}

/** Header naming the session catalog on `POST /v1/statement`. */
export const CATALOG_HEADER = "x-seedline-catalog";
/** Header naming the session schema on `POST /v1/statement`. */
export const SCHEMA_HEADER = "x-seedline-schema";

// ---------------------------------------------------------------------------
// QueryCluster
// ---------------------------------------------------------------------------

/**
 * In-process query cluster: a coordinator plus worker nodes, a plugin
 * registry and a catalog registry.
 *
 * Catalogs are resolved once, when {@link createCatalog} is called; queries
 * look them up by name and stream rows straight from the connector scan.
 * The coordinator serves `GET /v1/info` and `POST /v1/statement`.
 */
export class QueryCluster {
	readonly nodes: ReadonlyArray<ClusterNode>;
	readonly metadata: MetadataService;

	private readonly config: Required<Omit<QueryClusterConfig, "logger">>;
	private readonly logger: Logger;
	private readonly types = new TypeRegistry();
	private factories: ConnectorFactoryRegistry = createConnectorFactoryRegistry();
	private catalogs: CatalogRegistry = createCatalogRegistry();
	private httpServer: Server | null = null;
	private resolvedPort = 0;
	private startedAt = 0;

	constructor(config: QueryClusterConfig = {}) {
		this.config = {
			nodeCount: config.nodeCount ?? 1,
			port: config.port ?? 0,
			host: config.host ?? "127.0.0.1",
		};
		this.logger = (config.logger ?? silentLogger).child({ component: "query-cluster" });
		this.nodes = Array.from({ length: Math.max(1, this.config.nodeCount) }, (_, i) => ({
			nodeId: i === 0 ? "coordinator" : `worker-${i}`,
			coordinator: i === 0,
		}));

		const types = this.types;
		const catalogNames = () => this.catalogs.list().map((c) => c.name);
		this.metadata = {
			types,
			listCatalogs: catalogNames,
		};
	}

	/** Start the coordinator endpoint. */
	async start(): Promise<Result<void, BootstrapError>> {
		if (this.config.nodeCount < 1 || !Number.isInteger(this.config.nodeCount)) {
			return Err(new BootstrapError(`Node count must be a positive integer, got ${this.config.nodeCount}`));
		}
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
			return Err(new BootstrapError("Failed to start query cluster coordinator", toError(error)));
		}

		const addr = server.address();
		if (addr && typeof addr === "object") {
			this.resolvedPort = addr.port;
		}
		this.httpServer = server;
		this.startedAt = Date.now();
		this.logger.info("query cluster started", { nodeCount: this.nodes.length, baseUrl: this.baseUrl });
		return Ok(undefined);
	}

	/** Base URL of the coordinator endpoint. Empty until started. */
	get baseUrl(): string {
		return this.httpServer ? `http://${this.config.host}:${this.resolvedPort}` : "";
	}

	/** Whether the coordinator endpoint is listening. */
	get isRunning(): boolean {
		return this.httpServer !== null;
	}

	/** Register every connector factory a plugin contributes. */
	installPlugin(plugin: Plugin): void {
		for (const factory of plugin.getConnectorFactories()) {
			this.factories = this.factories.with(factory);
		}
		this.logger.debug("plugin installed", { plugin: plugin.name });
	}

	/**
	 * Create a catalog named `catalogName` backed by the connector `connectorName`.
	 *
	 * The connector is constructed immediately from `properties`; the catalog
	 * is unavailable if construction fails.
	 */
	async createCatalog(
		catalogName: string,
		connectorName: string,
		properties: CatalogProperties = {},
	): Promise<Result<void, ConfigError>> {
		if (this.catalogs.get(catalogName)) {
			return Err(new ConfigError(`Catalog "${catalogName}" already exists`));
		}
		const factory = this.factories.get(connectorName);
		if (!factory) {
			return Err(
				new ConfigError(
					`No connector factory "${connectorName}" (installed: ${this.factories.names().join(", ") || "none"})`,
				),
			);
		}

		const connector = await factory.create(catalogName, properties, {
			metadata: this.metadata,
			logger: this.logger.child({ catalog: catalogName }),
		});
		if (!connector.ok) return connector;

		this.catalogs = this.catalogs.with({
			name: catalogName,
			connectorName,
			connector: connector.value,
			properties,
		});
		this.logger.info("catalog created", { catalog: catalogName, connector: connectorName });
		return Ok(undefined);
	}

	/** Submit a query. Resolution errors are reported before any row is produced. */
	async execute(session: Session, sql: string): Promise<Result<QueryResult, QueryError>> {
		const statement = parseStatement(sql);
		if (!statement.ok) return statement;

		const name = qualifyTableReference(statement.value.from, session);
		if (!name.ok) return name;

		const resolved = this.resolveTable(name.value);
		if (!resolved.ok) return resolved;

		const { connector, columns } = resolved.value;
		const projection = project(statement.value.select, columns, name.value);
		if (!projection.ok) return projection;

		const rows = streamRows(
			connector,
			name.value,
			projection.value.positions,
			projection.value.columns,
			statement.value.select.kind === "count",
			statement.value.limit,
		);
		return Ok({ columns: projection.value.columns, rows });
	}

	/** A client whose queries run with the given session. */
	client(session: Session): QueryClient {
		return new QueryClient(this, session);
	}

	/** Stop the coordinator and close every catalog's connector. */
	async close(): Promise<void> {
		const errors: Error[] = [];
		for (const catalog of this.catalogs.list()) {
			try {
				await catalog.connector.close?.();
			} catch (error) {
				errors.push(toError(error));
			}
		}
		this.catalogs = createCatalogRegistry();

		const server = this.httpServer;
		if (server) {
			this.httpServer = null;
			await new Promise<void>((resolve) => {
				server.close(() => resolve());
				server.closeAllConnections();
			});
			this.logger.info("query cluster stopped");
		}

		const [first] = errors;
		if (first) throw first;
	}

	private resolveTable(
		name: QualifiedObjectName,
	): Result<{ connector: Connector; columns: ReadonlyArray<ColumnDescriptor> }, QueryError> {
		const catalog = this.catalogs.get(name.catalog);
		if (!catalog) {
			return Err(new QueryError(`Catalog "${name.catalog}" does not exist`));
		}
		if (!catalog.connector.listSchemas().includes(name.schema)) {
			return Err(new QueryError(`Schema "${name.catalog}.${name.schema}" does not exist`));
		}
		const columns = catalog.connector.getColumns(name.schema, name.table);
		if (!columns) {
			return Err(new QueryError(`Table "${name.toString()}" does not exist`));
		}
		return Ok({ connector: catalog.connector, columns });
	}

	// -----------------------------------------------------------------------
	// Coordinator endpoint
	// -----------------------------------------------------------------------

	private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
		const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

		try {
			if (req.method === "GET" && pathname === "/v1/info") {
				sendJson(res, {
					nodeId: "coordinator",
					nodeCount: this.nodes.length,
					catalogs: this.metadata.listCatalogs(),
					uptimeMs: Date.now() - this.startedAt,
				});
				return;
			}

			if (req.method === "POST" && pathname === "/v1/statement") {
				await this.handleStatement(req, res);
				return;
			}

			sendJson(res, { error: { code: "NOT_FOUND", message: `No route for ${req.method} ${pathname}` } }, 404);
		} catch (error) {
			const err = toError(error);
			this.logger.error("coordinator request failed", { path: pathname, ...describeError(err) });
			if (!res.headersSent) {
				sendJson(res, { error: { code: "INTERNAL_ERROR", message: err.message } }, 500);
			} else {
				res.end();
			}
		}
	}

	private async handleStatement(req: IncomingMessage, res: ServerResponse): Promise<void> {
		const sql = await readBody(req);
		const session: Session = {
			user: "coordinator",
			catalog: headerValue(req, CATALOG_HEADER),
			schema: headerValue(req, SCHEMA_HEADER),
		};

		const result = await this.execute(session, sql);
		if (!result.ok) {
			sendJson(res, { error: { code: result.error.code, message: result.error.message } }, 400);
			return;
		}

		const data: unknown[][] = [];
		for await (const row of result.value.rows) {
			data.push(row.map((cell) => cell.value));
		}
		sendJson(res, { columns: result.value.columns, data });
	}
}

// ---------------------------------------------------------------------------
// Execution helpers
// ---------------------------------------------------------------------------

function project(
	select: SelectList,
	columns: ReadonlyArray<ColumnDescriptor>,
	name: QualifiedObjectName,
): Result<{ columns: ColumnDescriptor[]; positions: number[] }, QueryError> {
	switch (select.kind) {
		case "all":
			return Ok({ columns: [...columns], positions: columns.map((_, i) => i) });
		case "count":
			return Ok({ columns: [{ name: "_col0", type: "bigint" }], positions: [] });
		case "columns": {
			const projected: ColumnDescriptor[] = [];
			const positions: number[] = [];
			for (const wanted of select.columns) {
				const position = columns.findIndex((c) => c.name === wanted);
				const column = columns[position];
				if (!column) {
					return Err(new QueryError(`Column "${wanted}" cannot be resolved in ${name.toString()}`));
				}
				projected.push(column);
				positions.push(position);
			}
			return Ok({ columns: projected, positions });
		}
	}
}

async function* streamRows(
	connector: Connector,
	name: QualifiedObjectName,
	positions: number[],
	columns: ReadonlyArray<ColumnDescriptor>,
	count: boolean,
	limit: number | undefined,
): AsyncGenerator<QueryResultRow> {
	if (limit === 0 && !count) return;

	let produced = 0;
	for await (const values of connector.scan(name.schema, name.table)) {
		produced++;
		if (!count) {
			yield positions.map((position, i) => ({ column: columns[i]?.name ?? "", value: values[position] ?? null }));
			if (limit !== undefined && produced >= limit) return;
		}
	}

	if (count && limit !== 0) {
		yield [{ column: "_col0", value: produced }];
	}
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
	const value = req.headers[name];
	return typeof value === "string" && value.length > 0 ? value : undefined;
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

/** Send a JSON response. */
function sendJson(res: ServerResponse, body: unknown, status = 200): void {
	res.writeHead(status, { "Content-Type": "application/json" });
	res.end(JSON.stringify(body));
}
