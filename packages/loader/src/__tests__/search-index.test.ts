import { BENCHMARK_CONNECTOR, BenchmarkPlugin } from "@seedline/benchmark";
import { retryPolicyFromConfig } from "@seedline/core";
import { QueryCluster } from "@seedline/engine";
import { ElasticsearchBulkIndexer, EmbeddedSearchNode } from "@seedline/search";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SearchLoader } from "../loader";
import { fakeClock } from "./test-helpers";

describe("SearchLoader against the embedded search node", () => {
	let cluster: QueryCluster;
	let node: EmbeddedSearchNode;
	let loader: SearchLoader;
	let clock: ReturnType<typeof fakeClock>;

	beforeEach(async () => {
		cluster = new QueryCluster();
		cluster.installPlugin(new BenchmarkPlugin());
		expect((await cluster.createCatalog("benchmark", BENCHMARK_CONNECTOR)).ok).toBe(true);

		node = new EmbeddedSearchNode();
		expect((await node.start()).ok).toBe(true);

		clock = fakeClock();
		loader = new SearchLoader({
			source: cluster.client({ user: "tester" }),
			indexer: new ElasticsearchBulkIndexer(node.client()),
			retryPolicy: retryPolicyFromConfig({ maxRequestRetries: 3, maxRequestRetryTimeMs: 5_000 }),
			batchSize: 2,
			sleepFn: clock.sleepFn,
		});
	});

	afterEach(async () => {
		await cluster.close();
		await node.close();
	});

	it("indexes every row of a benchmark table", async () => {
		const result = await loader.loadTable("region");

		expect(result.ok && result.value.rows).toBe(5);
		expect(result.ok && result.value.batches).toBe(3);
		expect(node.bulkRequests().map((r) => r.items)).toEqual([2, 2, 1]);
		const documents = node.documents("region");
		expect(documents).toHaveLength(5);
		expect(documents[0]).toMatchObject({ regionkey: 0, name: "NORTHREACH" });
	});

	it("duplicates documents when a table is loaded twice", async () => {
		expect((await loader.loadTable("region")).ok).toBe(true);
		expect((await loader.loadTable("region")).ok).toBe(true);
		expect(node.documents("region")).toHaveLength(10);
	});

	it("retries a bulk request the node turns away", async () => {
		node.injectBulkFault({ kind: "request", status: 503 });
		const result = await loader.loadTable("region");

		expect(result.ok && result.value.rows).toBe(5);
		expect(node.bulkRequests().map((r) => r.fault)).toEqual(["request", undefined, undefined, undefined]);
		expect(node.documents("region")).toHaveLength(5);
		expect(clock.sleeps).toEqual([100]);
	});
});
