// ---------------------------------------------------------------------------
// Bulk indexing: submit documents and report which ones the engine refused
// ---------------------------------------------------------------------------

import type { Client, estypes } from "@elastic/elasticsearch";
import { Err, Ok, type Result, type SearchEngineError } from "@seedline/core";
import { isTransientStatus, toSearchEngineError } from "./errors";
import type { FieldType, IndexMappings } from "./mapping";

/** A document and the source row position it was built from. */
export interface BulkDocument {
	readonly position: number;
	readonly source: Readonly<Record<string, unknown>>;
}

/** A document the engine refused. */
export interface BulkItemFailure {
	readonly document: BulkDocument;
	readonly status: number;
	/** Whether resubmitting the document may succeed. */
	readonly transient: boolean;
	readonly type: string;
	readonly reason: string;
}

/**
 * Submits documents to the search engine.
 *
 * `submit` resolves to `Err` when the request as a whole failed (nothing can
 * be assumed indexed) and to `Ok` with the refused documents otherwise; an
 * empty list means every document was acknowledged.
 */
export interface BulkIndexer {
	submit(
		index: string,
		documents: ReadonlyArray<BulkDocument>,
	): Promise<Result<BulkItemFailure[], SearchEngineError>>;
	/** Make indexed documents visible to search. */
	refresh(index: string): Promise<Result<void, SearchEngineError>>;
}

/** {@link BulkIndexer} backed by the official search client. */
export class ElasticsearchBulkIndexer implements BulkIndexer {
	constructor(private readonly client: Client) {}

	async submit(
		index: string,
		documents: ReadonlyArray<BulkDocument>,
	): Promise<Result<BulkItemFailure[], SearchEngineError>> {
		if (documents.length === 0) return Ok([]);

		const operations: Array<estypes.BulkOperationContainer | Readonly<Record<string, unknown>>> = [];
		for (const document of documents) {
			operations.push({ index: { _index: index } }, document.source);
		}

		let response: estypes.BulkResponse;
		try {
			response = await this.client.bulk({ operations });
		} catch (error) {
			return Err(toSearchEngineError(error, `Bulk request to index "${index}"`));
		}

		if (!response.errors) return Ok([]);

		const failures: BulkItemFailure[] = [];
		response.items.forEach((item, i) => {
			const result = item.index ?? item.create;
			const document = documents[i];
			if (!result || !document) return;
			if (!result.error && result.status < 300) return;
			failures.push({
				document,
				status: result.status,
				transient: isTransientStatus(result.status),
				type: result.error?.type ?? "unknown",
				reason: result.error?.reason ?? `status ${result.status}`,
			});
		});
		return Ok(failures);
	}

	async refresh(index: string): Promise<Result<void, SearchEngineError>> {
		try {
			await this.client.indices.refresh({ index });
			return Ok(undefined);
		} catch (error) {
			return Err(toSearchEngineError(error, `Refresh of index "${index}"`));
		}
	}
}

const MAPPING_PROPERTIES: Record<FieldType, estypes.MappingProperty> = {
	long: { type: "long" },
	integer: { type: "integer" },
	short: { type: "short" },
	byte: { type: "byte" },
	double: { type: "double" },
	float: { type: "float" },
	keyword: { type: "keyword" },
	text: { type: "text" },
	boolean: { type: "boolean" },
	date: { type: "date" },
	object: { type: "object" },
};

/**
 * Create `index` with explicit mappings unless it already exists.
 * Resolves to whether the index was created.
 */
export async function ensureIndex(
	client: Client,
	index: string,
	mappings: IndexMappings,
): Promise<Result<boolean, SearchEngineError>> {
	try {
		if (await client.indices.exists({ index })) return Ok(false);
		const properties: Record<string, estypes.MappingProperty> = {};
		for (const [field, def] of Object.entries(mappings.properties)) {
			properties[field] = MAPPING_PROPERTIES[def.type];
		}
		await client.indices.create({ index, mappings: { dynamic: mappings.dynamic, properties } });
		return Ok(true);
	} catch (error) {
		return Err(toSearchEngineError(error, `Creating index "${index}"`));
	}
}
