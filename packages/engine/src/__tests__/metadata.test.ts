import { ConfigError, Err } from "@seedline/core";
import { describe, expect, it } from "vitest";
import { TypeRegistry } from "../metadata";
import { createCatalogRegistry, createConnectorFactoryRegistry } from "../registry";
import type { Connector, ConnectorFactory } from "../types";

describe("TypeRegistry", () => {
	const types = new TypeRegistry();

	it("resolves built-in type names case-insensitively", () => {
		expect(types.resolve("BIGINT")).toEqual({ ok: true, value: "bigint" });
		expect(types.resolve("timestamp")).toEqual({ ok: true, value: "timestamp" });
	});

	it("ignores type parameters", () => {
		expect(types.resolve("varchar(25)")).toEqual({ ok: true, value: "varchar" });
		expect(types.resolve("VARCHAR (117)")).toEqual({ ok: true, value: "varchar" });
	});

	it("resolves aliases", () => {
		expect(types.resolve("int")).toEqual({ ok: true, value: "integer" });
		expect(types.resolve("double precision")).toEqual({ ok: true, value: "double" });
		expect(types.resolve("text")).toEqual({ ok: true, value: "varchar" });
	});

	it("rejects unknown types", () => {
		const result = types.resolve("decimal(10,2)");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("CONFIG_INVALID");
			expect(result.error.message).toBe('Unknown type: "decimal(10,2)"');
		}
	});

	it("exposes a bound decoder", () => {
		const decode = types.decoder();
		expect(decode("bool")).toEqual({ ok: true, value: "boolean" });
	});
});

function stubFactory(name: string): ConnectorFactory {
	return {
		name,
		create: async () => Err(new ConfigError("unused")),
	};
}

const emptyConnector: Connector = {
	listSchemas: () => [],
	listTables: () => [],
	getColumns: () => undefined,
	scan: async function* () {},
};

describe("ConnectorFactoryRegistry", () => {
	it("returns a new registry from with() and leaves the original untouched", () => {
		const empty = createConnectorFactoryRegistry();
		const withSearch = empty.with(stubFactory("search"));

		expect(empty.get("search")).toBeUndefined();
		expect(withSearch.get("search")?.name).toBe("search");
	});

	it("lists names sorted", () => {
		const registry = createConnectorFactoryRegistry([stubFactory("search"), stubFactory("benchmark")]);
		expect(registry.names()).toEqual(["benchmark", "search"]);
	});
});

describe("CatalogRegistry", () => {
	it("lists catalogs sorted by name", () => {
		const registry = createCatalogRegistry()
			.with({ name: "search", connectorName: "search", connector: emptyConnector, properties: {} })
			.with({ name: "benchmark", connectorName: "benchmark", connector: emptyConnector, properties: {} });

		expect(registry.list().map((c) => c.name)).toEqual(["benchmark", "search"]);
	});

	it("freezes stored properties", () => {
		const properties: Record<string, string> = { "scroll-size": "10" };
		const registry = createCatalogRegistry().with({
			name: "search",
			connectorName: "search",
			connector: emptyConnector,
			properties,
		});
		properties["scroll-size"] = "20";

		const entry = registry.get("search");
		expect(entry?.properties["scroll-size"]).toBe("10");
		expect(Object.isFrozen(entry?.properties)).toBe(true);
	});
});
