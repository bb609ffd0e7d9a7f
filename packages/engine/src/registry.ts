// ---------------------------------------------------------------------------
// Registries: immutable lookups for connector factories and catalogs
// ---------------------------------------------------------------------------

import type { CatalogProperties } from "@seedline/core";
import type { Connector, ConnectorFactory } from "./types";

/** Immutable registry mapping connector names to {@link ConnectorFactory} instances. */
export interface ConnectorFactoryRegistry {
	/** Look up a factory by connector name. */
	get(name: string): ConnectorFactory | undefined;
	/** Names of all registered connectors, sorted. */
	names(): string[];
	/** Create a new registry with an additional or replaced factory. */
	with(factory: ConnectorFactory): ConnectorFactoryRegistry;
}

/** Create an immutable {@link ConnectorFactoryRegistry}. */
export function createConnectorFactoryRegistry(
	factories: ReadonlyArray<ConnectorFactory> = [],
): ConnectorFactoryRegistry {
	return buildFactoryRegistry(new Map(factories.map((f) => [f.name, f])));
}

function buildFactoryRegistry(map: Map<string, ConnectorFactory>): ConnectorFactoryRegistry {
	return {
		get(name: string): ConnectorFactory | undefined {
			return map.get(name);
		},
		names(): string[] {
			return [...map.keys()].sort();
		},
		with(factory: ConnectorFactory): ConnectorFactoryRegistry {
			const next = new Map(map);
			next.set(factory.name, factory);
			return buildFactoryRegistry(next);
		},
	};
}

/** A catalog resolved at registration time: its connector and the properties it was built from. */
export interface CatalogEntry {
	readonly name: string;
	readonly connectorName: string;
	readonly connector: Connector;
	readonly properties: CatalogProperties;
}

/** Immutable registry of catalogs keyed by catalog name. */
export interface CatalogRegistry {
	get(name: string): CatalogEntry | undefined;
	/** All catalogs, sorted by name. */
	list(): CatalogEntry[];
	/** Create a new registry with an additional or replaced catalog. */
	with(entry: CatalogEntry): CatalogRegistry;
}

/** Create an immutable {@link CatalogRegistry}. */
export function createCatalogRegistry(entries: ReadonlyArray<CatalogEntry> = []): CatalogRegistry {
	return buildCatalogRegistry(new Map(entries.map((e) => [e.name, e])));
}

function buildCatalogRegistry(map: Map<string, CatalogEntry>): CatalogRegistry {
	return {
		get(name: string): CatalogEntry | undefined {
			return map.get(name);
		},
		list(): CatalogEntry[] {
			return [...map.values()].sort((a, b) => a.name.localeCompare(b.name));
		},
		with(entry: CatalogEntry): CatalogRegistry {
			const next = new Map(map);
			next.set(entry.name, Object.freeze({ ...entry, properties: Object.freeze({ ...entry.properties }) }));
			return buildCatalogRegistry(next);
		},
	};
}
