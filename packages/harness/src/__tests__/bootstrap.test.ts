import { BootstrapError, LoadError, Logger, SearchEngineError } from "@seedline/core";
import { QueryCluster, RemoteQueryClient } from "@seedline/engine";
import { EmbeddedSearchNode } from "@seedline/search";
import { afterEach, describe, expect, it, vi } from "vitest";
import { buildCluster, createSession, type RunningCluster } from "../bootstrap";

describe("buildCluster", () => {
	const opened: Array<{ close(): Promise<void> }> = [];

	afterEach(async () => {
		for (const resource of opened.splice(0).reverse()) {
			await resource.close();
		}
	});

	it("loads the requested tables and serves queries over them", async () => {
		const built = await buildCluster({ nodeCount: 1, tables: ["region", "NATION"], batchSize: 10 });
		expect(built.ok).toBe(true);
		if (!built.ok) return;
		const cluster: RunningCluster = built.value;
		opened.push(cluster);

		expect(cluster.loaded.map((l) => [l.table, l.index, l.rows, l.batches])).toEqual([
			["region", "region", 5, 1],
			["nation", "nation", 25, 3],
		]);
		expect(cluster.searchNode.indexNames()).toEqual(["nation", "region"]);
		expect(cluster.session).toEqual({ user: "seedline", catalog: "search", schema: "bench" });

		const regions = await cluster.client.executeAll("SELECT * FROM region");
		expect(regions.ok && regions.value.rows).toHaveLength(5);

		const remote = new RemoteQueryClient(cluster.baseUrl, createSession());
		const count = await remote.statement("SELECT count(*) FROM nation");
		expect(count.ok && count.value.data).toEqual([[25]]);
	});

	it("stops both servers on close and tolerates a second close", async () => {
		const built = await buildCluster({ nodeCount: 1, tables: ["region"] });
		expect(built.ok).toBe(true);
		if (!built.ok) return;

		await built.value.close();
		await built.value.close();
		expect(built.value.queryCluster.isRunning).toBe(false);
		expect(built.value.searchNode.isRunning).toBe(false);
	});

	it("never starts the query cluster when the search node cannot start", async () => {
		const occupant = new EmbeddedSearchNode();
		await occupant.start();
		opened.push(occupant);
		const port = Number(new URL(occupant.baseUrl).port);

		let searchNode: EmbeddedSearchNode | undefined;
		const createQueryCluster = vi.fn((nodeCount: number) => new QueryCluster({ nodeCount }));
		const built = await buildCluster({
			tables: ["region"],
			createSearchNode: (logger) => {
				searchNode = new EmbeddedSearchNode({ port, logger });
				return searchNode;
			},
			createQueryCluster,
		});

		expect(built.ok).toBe(false);
		if (built.ok) return;
		expect(built.error.code).toBe("BOOTSTRAP_FAILED");
		expect(built.error.message).toBe("Failed to start embedded search node");
		expect(createQueryCluster).not.toHaveBeenCalled();
		expect(searchNode?.isRunning).toBe(false);
	});

	it("closes the search node when the query cluster cannot start", async () => {
		let searchNode: EmbeddedSearchNode | undefined;
		const entries: Array<Record<string, unknown>> = [];
		const built = await buildCluster({
			tables: ["region"],
			logger: new Logger("debug", {}, (line) => entries.push(JSON.parse(line))),
			createSearchNode: (logger) => {
				searchNode = new EmbeddedSearchNode({ logger });
				return searchNode;
			},
			createQueryCluster: () => new QueryCluster({ nodeCount: 0 }),
		});

		expect(!built.ok && built.error.message).toBe("Node count must be a positive integer, got 0");
		expect(searchNode?.isRunning).toBe(false);
		expect(entries.find((e) => e.msg === "bootstrap failed")).toMatchObject({
			level: "error",
			component: "bootstrap",
			errorCode: "BOOTSTRAP_FAILED",
		});
	});

	it("closes everything when a table fails to load", async () => {
		let searchNode: EmbeddedSearchNode | undefined;
		let queryCluster: QueryCluster | undefined;
		const built = await buildCluster({
			nodeCount: 1,
			tables: ["region"],
			createSearchNode: (logger) => {
				searchNode = new EmbeddedSearchNode({ logger });
				searchNode.injectBulkFault({ kind: "request", status: 400 });
				return searchNode;
			},
			createQueryCluster: (nodeCount, logger) => {
				queryCluster = new QueryCluster({ nodeCount, logger });
				return queryCluster;
			},
		});

		expect(built.ok).toBe(false);
		if (built.ok) return;
		expect(built.error.code).toBe("LOAD_FAILED");
		expect(built.error.message).toMatch(/^Batch 0 of table region was rejected: /);
		expect(searchNode?.isRunning).toBe(false);
		expect(queryCluster?.isRunning).toBe(false);
	});

	it("closes both servers when a setup step throws", async () => {
		let searchNode: EmbeddedSearchNode | undefined;
		let queryCluster: QueryCluster | undefined;
		const built = await buildCluster({
			nodeCount: 1,
			tables: ["region"],
			createSearchNode: (logger) => {
				searchNode = new EmbeddedSearchNode({ logger });
				return searchNode;
			},
			createQueryCluster: (nodeCount, logger) => {
				queryCluster = new QueryCluster({ nodeCount, logger });
				queryCluster.installPlugin = () => {
					throw new Error("plugin failed to load");
				};
				return queryCluster;
			},
		});

		expect(built.ok).toBe(false);
		if (built.ok) return;
		expect(built.error).toBeInstanceOf(BootstrapError);
		expect(built.error.message).toBe("Cluster bootstrap failed");
		expect(built.error.cause?.message).toBe("plugin failed to load");
		expect({ search: searchNode?.isRunning, cluster: queryCluster?.isRunning }).toEqual({
			search: false,
			cluster: false,
		});
	});

	it("gives up on bulk requests that exceed the request timeout", async () => {
		let searchNode: EmbeddedSearchNode | undefined;
		const built = await buildCluster({
			nodeCount: 1,
			tables: ["region"],
			catalogProperties: {
				"request-timeout": "50ms",
				"max-request-retries": "2",
				"max-request-retry-time": "1s",
			},
			retryBackoff: { initialBackoffMs: 10, maxBackoffMs: 10 },
			createSearchNode: (logger) => {
				searchNode = new EmbeddedSearchNode({ logger });
				searchNode.injectBulkFault({ kind: "delay", ms: 400 });
				searchNode.injectBulkFault({ kind: "delay", ms: 400 });
				return searchNode;
			},
		});

		expect(built.ok).toBe(false);
		if (built.ok) return;
		expect(built.error).toBeInstanceOf(LoadError);
		expect(built.error.message).toMatch(/^Batch 0 of table region failed after 2 attempts: /);
		expect(built.error.cause).toBeInstanceOf(SearchEngineError);
		expect(searchNode?.bulkRequests().map((r) => r.fault)).toEqual(["delay", "delay"]);
		expect(searchNode?.isRunning).toBe(false);
	});

	it("rejects an unknown catalog property before starting anything", async () => {
		const createSearchNode = vi.fn(() => new EmbeddedSearchNode());
		const built = await buildCluster({ catalogProperties: { "scroll-sise": "10" }, createSearchNode });

		expect(!built.ok && built.error.message).toBe('Unknown connector property "scroll-sise"');
		expect(createSearchNode).not.toHaveBeenCalled();
	});
});
