import { createServer, type Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RemoteQueryClient } from "../client";

const session = { user: "test", catalog: "mem", schema: "tiny" };

describe("RemoteQueryClient", () => {
	let server: Server;
	let baseUrl: string;
	let reply: { status: number; body: string };

	beforeEach(async () => {
		reply = { status: 200, body: "{}" };
		server = createServer((_req, res) => {
			res.writeHead(reply.status, { "Content-Type": "application/json" });
			res.end(reply.body);
		});
		await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
		const addr = server.address();
		baseUrl = addr && typeof addr === "object" ? `http://127.0.0.1:${addr.port}` : "";
	});

	afterEach(async () => {
		await new Promise<void>((resolve) => {
			server.close(() => resolve());
			server.closeAllConnections();
		});
	});

	it("reports a body that is not JSON", async () => {
		reply = { status: 502, body: "<html>bad gateway</html>" };
		const result = await new RemoteQueryClient(baseUrl, session).statement("SELECT * FROM nation");

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("QUERY_FAILED");
		expect(result.error.message).toBe("Response from /v1/statement is not JSON (status 502)");
	});

	it("reports a statement response of the wrong shape", async () => {
		reply = { status: 200, body: JSON.stringify({ columns: [{ name: "id", type: "uuid" }], data: [] }) };
		const result = await new RemoteQueryClient(baseUrl, session).statement("SELECT * FROM nation");

		expect(!result.ok && result.error.message).toBe("Unexpected response body from /v1/statement");
	});

	it("reports cluster info of the wrong shape", async () => {
		reply = { status: 200, body: JSON.stringify({ nodeId: "coordinator", nodeCount: "3" }) };
		const result = await new RemoteQueryClient(baseUrl, session).info();

		expect(!result.ok && result.error.message).toBe("Unexpected response body from /v1/info");
	});

	it("uses the error message of a failed response", async () => {
		reply = { status: 400, body: JSON.stringify({ error: { code: "QUERY_FAILED", message: "no such table" } }) };
		const result = await new RemoteQueryClient(baseUrl, session).statement("SELECT * FROM nowhere");

		expect(!result.ok && result.error.message).toBe("no such table");
	});

	it("returns a well-formed statement response", async () => {
		const body = { columns: [{ name: "name", type: "varchar" }], data: [["ALGERIA"]] };
		reply = { status: 200, body: JSON.stringify(body) };
		const result = await new RemoteQueryClient(baseUrl, session).statement("SELECT name FROM nation");

		expect(result).toEqual({ ok: true, value: body });
	});
});
