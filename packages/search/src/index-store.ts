// ---------------------------------------------------------------------------
// In-memory index: mappings, field validation and document storage
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import { type FieldType, type IndexMappings, isFieldType } from "./mapping";

/** A structured error as the search REST API reports it. */
export interface SearchErrorCause {
	type: string;
	reason: string;
}

/** A stored document. */
export interface StoredDocument {
	readonly id: string;
	readonly source: Record<string, unknown>;
	readonly version: number;
	readonly seqNo: number;
}

/** Outcome of indexing one document. */
export type IndexOutcome =
	| { ok: true; id: string; created: boolean; version: number; seqNo: number }
	| { ok: false; id: string; status: number; error: SearchErrorCause };

const INTEGER_RANGES: Partial<Record<FieldType, readonly [bigint, bigint]>> = {
	long: [-(2n ** 63n), 2n ** 63n - 1n],
	integer: [-(2n ** 31n), 2n ** 31n - 1n],
	short: [-32_768n, 32_767n],
	byte: [-128n, 127n],
};

const INTEGER_TEXT_RE = /^-?\d+$/;
const DATE_TEXT_RE = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * A single index: field mappings plus documents in insertion order.
 *
 * Unmapped fields are added on first sight unless the mapping is strict.
 * Documents are visible to count and search as soon as they are indexed.
 */
export class SearchIndex {
	private readonly fields = new Map<string, FieldType>();
	private readonly dynamic: boolean | "strict";
	private readonly docs = new Map<string, StoredDocument>();
	private seqNo = 0;

	private constructor(
		readonly name: string,
		mappings: IndexMappings | undefined,
	) {
		this.dynamic = mappings?.dynamic ?? true;
		for (const [field, def] of Object.entries(mappings?.properties ?? {})) {
			this.fields.set(field, def.type);
		}
	}

	/** Create an index, validating its declared mappings. */
	static create(name: string, mappings?: unknown): { ok: true; index: SearchIndex } | { ok: false; error: SearchErrorCause } {
		const parsed = parseMappings(mappings);
		if (!parsed.ok) return parsed;
		return { ok: true, index: new SearchIndex(name, parsed.mappings) };
	}

	/** Current mappings. */
	mappings(): IndexMappings {
		const properties: Record<string, { type: FieldType }> = {};
		for (const [field, type] of this.fields) properties[field] = { type };
		return { dynamic: this.dynamic, properties };
	}

	get size(): number {
		return this.docs.size;
	}

	/** Documents in insertion order. */
	documents(): StoredDocument[] {
		return [...this.docs.values()];
	}

	/** Remove a document. Returns whether it existed. */
	delete(id: string): boolean {
		return this.docs.delete(id);
	}

	/** Validate and store a document. `create` refuses to overwrite an existing id. */
	index(source: unknown, id: string | undefined, mode: "index" | "create"): IndexOutcome {
		const docId = id ?? randomUUID();
		if (typeof source !== "object" || source === null || Array.isArray(source)) {
			return reject(docId, 400, "mapper_parsing_exception", "failed to parse, document is empty");
		}
		const document: Record<string, unknown> = { ...source };

		const existing = this.docs.get(docId);
		if (mode === "create" && existing) {
			return reject(
				docId,
				409,
				"version_conflict_engine_exception",
				`[${docId}]: version conflict, document already exists (current version [${existing.version}])`,
			);
		}

		const newFields = new Map<string, FieldType>();
		for (const [field, value] of Object.entries(document)) {
			if (value === null || value === undefined) continue;

			const mapped = this.fields.get(field) ?? newFields.get(field);
			if (mapped) {
				if (!acceptsValue(mapped, value)) {
					return reject(
						docId,
						400,
						"mapper_parsing_exception",
						`failed to parse field [${field}] of type [${mapped}] in document with id '${docId}'. Preview of field's value: '${preview(value)}'`,
					);
				}
				continue;
			}

			if (this.dynamic === "strict") {
				return reject(
					docId,
					400,
					"strict_dynamic_mapping_exception",
					`[1:2] mapping set to strict, dynamic introduction of [${field}] within [_doc] is not allowed`,
				);
			}
			if (this.dynamic) {
				const inferred = inferFieldType(value);
				if (inferred) newFields.set(field, inferred);
			}
		}

		for (const [field, type] of newFields) this.fields.set(field, type);

		const stored: StoredDocument = {
			id: docId,
			source: document,
			version: (existing?.version ?? 0) + 1,
			seqNo: this.seqNo++,
		};
		this.docs.set(docId, stored);
		return { ok: true, id: docId, created: !existing, version: stored.version, seqNo: stored.seqNo };
	}
}

function reject(id: string, status: number, type: string, reason: string): IndexOutcome {
	return { ok: false, id, status, error: { type, reason } };
}

function preview(value: unknown): string {
	const text = typeof value === "string" ? value : JSON.stringify(value);
	return text.length > 20 ? `${text.slice(0, 20)}...` : text;
}

/** Whether a value can be stored in a field of the given type. Arrays are checked element-wise. */
export function acceptsValue(type: FieldType, value: unknown): boolean {
	if (Array.isArray(value)) {
		return value.every((element) => element === null || acceptsValue(type, element));
	}

	switch (type) {
		case "long":
		case "integer":
		case "short":
		case "byte":
			return acceptsInteger(type, value);
		case "double":
		case "float":
			if (typeof value === "number") return Number.isFinite(value);
			return typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value));
		case "keyword":
		case "text":
			return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
		case "boolean":
			return typeof value === "boolean" || value === "true" || value === "false";
		case "date":
			if (typeof value === "number") return Number.isInteger(value);
			return typeof value === "string" && DATE_TEXT_RE.test(value) && !Number.isNaN(Date.parse(value));
		case "object":
			return typeof value === "object" && value !== null;
	}
}

function acceptsInteger(type: FieldType, value: unknown): boolean {
	let integral: bigint;
	if (typeof value === "number") {
		if (!Number.isFinite(value)) return false;
		integral = BigInt(Math.trunc(value));
	} else if (typeof value === "string" && INTEGER_TEXT_RE.test(value)) {
		integral = BigInt(value);
	} else {
		return false;
	}
	const range = INTEGER_RANGES[type];
	return range !== undefined && integral >= range[0] && integral <= range[1];
}

/** Field type assigned to a previously unseen field. */
export function inferFieldType(value: unknown): FieldType | undefined {
	if (Array.isArray(value)) {
		const first = value.find((element) => element !== null && element !== undefined);
		return first === undefined ? undefined : inferFieldType(first);
	}
	switch (typeof value) {
		case "boolean":
			return "boolean";
		case "number":
			return Number.isInteger(value) ? "long" : "float";
		case "string":
			return DATE_TEXT_RE.test(value) && !Number.isNaN(Date.parse(value)) ? "date" : "text";
		case "object":
			return value === null ? undefined : "object";
		default:
			return undefined;
	}
}

function parseMappings(
	raw: unknown,
): { ok: true; mappings: IndexMappings | undefined } | { ok: false; error: SearchErrorCause } {
	if (raw === undefined || raw === null) return { ok: true, mappings: undefined };
	if (typeof raw !== "object") {
		return { ok: false, error: { type: "mapper_parsing_exception", reason: "Mappings must be an object" } };
	}

	const rawDynamic = "dynamic" in raw ? raw.dynamic : undefined;
	let dynamic: boolean | "strict" | undefined;
	if (rawDynamic === true || rawDynamic === "true") dynamic = true;
	else if (rawDynamic === false || rawDynamic === "false") dynamic = false;
	else if (rawDynamic === "strict") dynamic = "strict";
	else if (rawDynamic !== undefined) {
		return {
			ok: false,
			error: { type: "mapper_parsing_exception", reason: `Unsupported dynamic setting [${String(rawDynamic)}]` },
		};
	}

	const rawProperties = "properties" in raw ? raw.properties : undefined;
	const properties: Record<string, { type: FieldType }> = {};
	if (typeof rawProperties === "object" && rawProperties !== null) {
		for (const [field, def] of Object.entries(rawProperties)) {
			const type: unknown = typeof def === "object" && def !== null && "type" in def ? def.type : "object";
			if (typeof type !== "string" || !isFieldType(type)) {
				return {
					ok: false,
					error: {
						type: "mapper_parsing_exception",
						reason: `No handler for type [${String(type)}] declared on field [${field}]`,
					},
				};
			}
			properties[field] = { type };
		}
	}
	return { ok: true, mappings: { dynamic, properties } };
}
