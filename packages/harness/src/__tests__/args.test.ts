import { describe, expect, it } from "vitest";
import { parseArgs } from "../args";

describe("parseArgs", () => {
	it("parses --flag value pairs", () => {
		const result = parseArgs(["node", "seedline", "--nodes", "2", "--tables", "region,nation"]);
		expect(result.flags).toEqual({ nodes: "2", tables: "region,nation" });
		expect(result.positional).toEqual([]);
	});

	it("parses --flag=value syntax", () => {
		const result = parseArgs(["node", "seedline", "--batch-size=500", "--log-level=debug"]);
		expect(result.flags).toEqual({ "batch-size": "500", "log-level": "debug" });
	});

	it("parses boolean flags (no value)", () => {
		const result = parseArgs(["node", "seedline", "--help", "--nodes", "1"]);
		expect(result.flags).toEqual({ help: "true", nodes: "1" });
	});

	it("parses short flags", () => {
		const result = parseArgs(["node", "seedline", "-v"]);
		expect(result.flags).toEqual({ v: "true" });
	});

	it("collects positional arguments", () => {
		const result = parseArgs(["node", "seedline", "extra", "--schema", "small", "more"]);
		expect(result.flags).toEqual({ schema: "small" });
		expect(result.positional).toEqual(["extra", "more"]);
	});

	it("handles empty arguments", () => {
		expect(parseArgs(["node", "seedline"])).toEqual({ flags: {}, positional: [] });
	});
});
