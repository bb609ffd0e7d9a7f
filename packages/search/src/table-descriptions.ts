// ---------------------------------------------------------------------------
// Table descriptions: JSON documents binding tables to search indices
// ---------------------------------------------------------------------------

import { readdir, readFile } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
	type ColumnDescriptor,
	ConfigError,
	type ConnectorConfig,
	createTableDescriptor,
	Err,
	Ok,
	type Result,
	type TableDescriptor,
	toError,
} from "@seedline/core";
import type { MetadataService, TypeDecoder } from "@seedline/engine";

/** Lookup over resolved table descriptors. */
export interface TableDescriptionProvider {
	/** Descriptor for `schema.table`. Matching is exact, case as stored. */
	get(schema: string, table: string): TableDescriptor | undefined;
	/** Descriptors sorted by table name, optionally limited to one schema. */
	list(schema?: string): TableDescriptor[];
	/** Schemas that have at least one descriptor, sorted. */
	schemas(): string[];
}

/** Build a provider over already-decoded descriptors. */
export function createTableDescriptionProvider(
	descriptors: ReadonlyArray<TableDescriptor>,
): Result<TableDescriptionProvider, ConfigError> {
	const byKey = new Map<string, TableDescriptor>();
	for (const descriptor of descriptors) {
		const key = `${descriptor.schemaName}.${descriptor.tableName}`;
		if (byKey.has(key)) {
			return Err(new ConfigError(`Duplicate table description for ${key}`));
		}
		byKey.set(key, descriptor);
	}

	const sorted = [...byKey.values()].sort((a, b) => a.tableName.localeCompare(b.tableName));
	return Ok({
		get: (schema, table) => byKey.get(`${schema}.${table}`),
		list: (schema) => (schema === undefined ? [...sorted] : sorted.filter((d) => d.schemaName === schema)),
		schemas: () => [...new Set(sorted.map((d) => d.schemaName))].sort(),
	});
}

/**
 * Decode one table-description document.
 *
 * ```json
 * { "tableName": "orders", "schemaName": "bench", "index": "orders",
 *   "columns": [{ "name": "orderkey", "type": "bigint" }] }
 * ```
 *
 * `schemaName` falls back to `defaultSchema`; `index`, when present, must
 * equal the lower-cased table name.
 */
export function decodeTableDescription(
	raw: unknown,
	options: { decodeType: TypeDecoder; defaultSchema: string; source: string },
): Result<TableDescriptor, ConfigError> {
	const fail = (detail: string, cause?: Error) =>
		Err(new ConfigError(`Malformed table description ${options.source}: ${detail}`, cause));

	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		return fail("expected a JSON object");
	}

	const tableName = "tableName" in raw ? raw.tableName : undefined;
	if (typeof tableName !== "string" || tableName.trim() === "") {
		return fail('"tableName" must be a non-empty string');
	}

	const schemaName = "schemaName" in raw ? raw.schemaName : options.defaultSchema;
	if (typeof schemaName !== "string" || schemaName.trim() === "") {
		return fail('"schemaName" must be a non-empty string');
	}

	const index = "index" in raw ? raw.index : undefined;
	if (index !== undefined && index !== tableName.toLowerCase()) {
		return fail(`declared index "${String(index)}" does not match derived index "${tableName.toLowerCase()}"`);
	}

	const rawColumns = "columns" in raw ? raw.columns : undefined;
	if (!Array.isArray(rawColumns) || rawColumns.length === 0) {
		return fail('"columns" must be a non-empty array');
	}

	const items: unknown[] = rawColumns;
	const columns: ColumnDescriptor[] = [];
	const seen = new Set<string>();
	for (const [i, column] of items.entries()) {
		if (typeof column !== "object" || column === null || !("name" in column) || !("type" in column)) {
			return fail(`column ${i} must have "name" and "type"`);
		}
		const { name, type } = column;
		if (typeof name !== "string" || name === "" || typeof type !== "string") {
			return fail(`column ${i} must have a non-empty string "name" and a string "type"`);
		}
		if (seen.has(name)) {
			return fail(`duplicate column "${name}"`);
		}
		seen.add(name);

		const decoded = options.decodeType(type);
		if (!decoded.ok) {
			return fail(`column "${name}": ${decoded.error.message}`, decoded.error);
		}
		columns.push({ name, type: decoded.value });
	}

	return Ok(createTableDescriptor(schemaName, tableName, columns));
}

/** Resolve a `file:` URI or a filesystem path to a directory path. */
export function resolveDescriptionDirectory(location: string): Result<string, ConfigError> {
	if (location.startsWith("file:")) {
		try {
			return Ok(fileURLToPath(location));
		} catch (error) {
			return Err(new ConfigError(`Invalid table description location "${location}"`, toError(error)));
		}
	}
	if (/^[a-z][a-z0-9+.-]*:\/\//i.test(location)) {
		return Err(
			new ConfigError(
				`Unsupported table description location "${location}": expected a file: URI or a path`,
			),
		);
	}
	return Ok(resolve(location));
}

/**
 * Read every `*.json` document in the configured table-description
 * directory and build a provider over them. Any unreadable, malformed or
 * duplicate document fails the whole resolution.
 */
export async function resolveTableDescriptions(
	config: Pick<ConnectorConfig, "tableDescriptionDirectory" | "defaultSchema">,
	metadata: Pick<MetadataService, "types">,
): Promise<Result<TableDescriptionProvider, ConfigError>> {
	const directory = resolveDescriptionDirectory(config.tableDescriptionDirectory);
	if (!directory.ok) return directory;

	let files: string[];
	try {
		const entries = await readdir(directory.value, { withFileTypes: true });
		files = entries
			.filter((entry) => entry.isFile() && extname(entry.name) === ".json")
			.map((entry) => entry.name)
			.sort();
	} catch (error) {
		return Err(
			new ConfigError(`Cannot read table description directory "${directory.value}"`, toError(error)),
		);
	}

	const decodeType = metadata.types.decoder();
	const descriptors: TableDescriptor[] = [];
	for (const file of files) {
		const path = join(directory.value, file);
		let text: string;
		try {
			text = await readFile(path, "utf-8");
		} catch (error) {
			return Err(new ConfigError(`Cannot read table description ${file}`, toError(error)));
		}

		let raw: unknown;
		try {
			raw = JSON.parse(text);
		} catch (error) {
			return Err(new ConfigError(`Malformed table description ${file}: invalid JSON`, toError(error)));
		}

		const descriptor = decodeTableDescription(raw, {
			decodeType,
			defaultSchema: config.defaultSchema,
			source: file,
		});
		if (!descriptor.ok) return descriptor;
		descriptors.push(descriptor.value);
	}

	return createTableDescriptionProvider(descriptors);
}
