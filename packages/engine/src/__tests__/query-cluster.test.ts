import { type ColumnDescriptor, ConfigError, Err, Ok } from "@seedline/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RemoteQueryClient } from "../client";
import { QueryCluster } from "../query-cluster";
import type { Connector, Plugin } from "../types";

// ---------------------------------------------------------------------------
// In-memory connector fixture
// ---------------------------------------------------------------------------

const NATION_COLUMNS: ColumnDescriptor[] = [
	{ name: "nationkey", type: "bigint" },
	{ name: "name", type: "varchar" },
];

const NATION_ROWS = [
	[0, "ALGERIA"],
	[1, "ARGENTINA"],
	[2, "BRAZIL"],
];

interface MemoryConnector extends Connector {
	scansReleased: number;
	closed: number;
}

function memoryConnector(): MemoryConnector {
	const connector: MemoryConnector = {
		scansReleased: 0,
		closed: 0,
		listSchemas: () => ["tiny"],
		listTables: (schema) => (schema === "tiny" ? ["nation"] : []),
		getColumns: (schema, table) => (schema === "tiny" && table === "nation" ? NATION_COLUMNS : undefined),
		scan: async function* () {
			try {
				for (const row of NATION_ROWS) yield row;
			} finally {
				connector.scansReleased++;
			}
		},
		close: async () => {
			connector.closed++;
		},
	};
	return connector;
}

function memoryPlugin(connector: MemoryConnector): Plugin {
	return {
		name: "memory",
		getConnectorFactories: () => [
			{
				name: "memory",
				create: async (_catalog, properties) =>
					properties.fail ? Err(new ConfigError(`bad catalog: ${properties.fail}`)) : Ok(connector),
			},
		],
	};
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("QueryCluster", () => {
	let cluster: QueryCluster;
	let connector: MemoryConnector;
	const session = { user: "tester", catalog: "mem", schema: "tiny" };

	beforeEach(async () => {
		connector = memoryConnector();
		cluster = new QueryCluster({ nodeCount: 3 });
		cluster.installPlugin(memoryPlugin(connector));
		const created = await cluster.createCatalog("mem", "memory");
		expect(created.ok).toBe(true);
	});

	afterEach(async () => {
		await cluster.close();
	});

	describe("catalogs", () => {
		it("lists created catalogs", () => {
			expect(cluster.metadata.listCatalogs()).toEqual(["mem"]);
		});

		it("rejects an unknown connector", async () => {
			const result = await cluster.createCatalog("other", "nope");
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message).toBe('No connector factory "nope" (installed: memory)');
			}
		});

		it("rejects a duplicate catalog name", async () => {
			const result = await cluster.createCatalog("mem", "memory");
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message).toBe('Catalog "mem" already exists');
			}
		});

		it("leaves the catalog unavailable when the factory fails", async () => {
			const result = await cluster.createCatalog("broken", "memory", { fail: "yes" });
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message).toBe("bad catalog: yes");
			}
			expect(cluster.metadata.listCatalogs()).toEqual(["mem"]);
		});
	});

	describe("execute", () => {
		it("streams every column for SELECT *", async () => {
			const result = await cluster.client(session).executeAll("SELECT * FROM nation");
			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value.columns).toEqual(NATION_COLUMNS);
			expect(result.value.rows[0]).toEqual([
				{ column: "nationkey", value: 0 },
				{ column: "name", value: "ALGERIA" },
			]);
			expect(result.value.rows).toHaveLength(3);
		});

		it("projects named columns", async () => {
			const result = await cluster.client(session).executeAll("SELECT name FROM mem.tiny.nation LIMIT 2");
			expect(result.ok && result.value.rows).toEqual([
				[{ column: "name", value: "ALGERIA" }],
				[{ column: "name", value: "ARGENTINA" }],
			]);
		});

		it("counts rows", async () => {
			const result = await cluster.client(session).executeAll("SELECT count(*) FROM nation");
			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value.columns).toEqual([{ name: "_col0", type: "bigint" }]);
			expect(result.value.rows).toEqual([[{ column: "_col0", value: 3 }]]);
		});

		it("reports resolution errors before producing rows", async () => {
			const messages: string[] = [];
			for (const sql of [
				"SELECT * FROM other.tiny.nation",
				"SELECT * FROM mem.nope.nation",
				"SELECT * FROM region",
				"SELECT x FROM nation",
			]) {
				const result = await cluster.execute(session, sql);
				if (!result.ok) messages.push(result.error.message);
			}
			expect(messages).toEqual([
				'Catalog "other" does not exist',
				'Schema "mem.nope" does not exist',
				'Table "mem.tiny.region" does not exist',
				'Column "x" cannot be resolved in mem.tiny.nation',
			]);
			expect(connector.scansReleased).toBe(0);
		});

		it("releases the scan when the consumer stops early", async () => {
			const result = await cluster.execute(session, "SELECT * FROM nation");
			if (!result.ok) throw result.error;
			for await (const _row of result.value.rows) {
				break;
			}
			expect(connector.scansReleased).toBe(1);
		});
	});

	describe("coordinator endpoint", () => {
		it("serves cluster info", async () => {
			const started = await cluster.start();
			expect(started.ok).toBe(true);
			expect(cluster.baseUrl).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);

			const info = await new RemoteQueryClient(cluster.baseUrl, session).info();
			expect(info.ok).toBe(true);
			if (!info.ok) return;
			expect(info.value.nodeId).toBe("coordinator");
			expect(info.value.nodeCount).toBe(3);
			expect(info.value.catalogs).toEqual(["mem"]);
		});

		it("executes statements with session headers", async () => {
			await cluster.start();
			const client = new RemoteQueryClient(cluster.baseUrl, session);

			const result = await client.statement("SELECT name FROM nation LIMIT 1");
			expect(result).toEqual({
				ok: true,
				value: { columns: [{ name: "name", type: "varchar" }], data: [["ALGERIA"]] },
			});
		});

		it("returns query errors as 400 responses", async () => {
			await cluster.start();
			const client = new RemoteQueryClient(cluster.baseUrl, session);

			const result = await client.statement("SELECT * FROM region");
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message).toBe('Table "mem.tiny.region" does not exist');
			}
		});
	});

	describe("lifecycle", () => {
		it("rejects a non-positive node count", async () => {
			const invalid = new QueryCluster({ nodeCount: 0 });
			const result = await invalid.start();
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.code).toBe("BOOTSTRAP_FAILED");
				expect(result.error.message).toBe("Node count must be a positive integer, got 0");
			}
			expect(invalid.isRunning).toBe(false);
		});

		it("names one coordinator and the remaining nodes as workers", () => {
			expect(cluster.nodes.map((n) => n.nodeId)).toEqual(["coordinator", "worker-1", "worker-2"]);
		});

		it("closes connectors and stops the endpoint", async () => {
			await cluster.start();
			await cluster.close();
			expect(connector.closed).toBe(1);
			expect(cluster.isRunning).toBe(false);
			expect(cluster.metadata.listCatalogs()).toEqual([]);
		});
	});
});
