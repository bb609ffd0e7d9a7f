// ---------------------------------------------------------------------------
// Row-to-document conversion
// ---------------------------------------------------------------------------

import {
	type ColumnDescriptor,
	ConversionError,
	Err,
	Ok,
	type QueryResultRow,
	type Result,
	type SqlTypeName,
} from "@seedline/core";

/** A field value as it is written to the search engine. */
export type DocumentValue = string | number | boolean;

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

const INTEGER_RE = /^[+-]?\d+$/;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Build a document from a result row.
 *
 * Field names are the column names verbatim; values are converted by the
 * type of the column at the same position. Null and undefined values are
 * left out of the document.
 */
export function toDocument(
	row: QueryResultRow,
	columns: ReadonlyArray<ColumnDescriptor>,
): Result<Record<string, DocumentValue>, ConversionError> {
	const document: Record<string, DocumentValue> = {};
	for (const [i, { column, value }] of row.entries()) {
		if (value === null || value === undefined) continue;

		const type = columns[i]?.type;
		if (type === undefined) {
			return Err(new ConversionError(column, `No type known for column "${column}" at position ${i}`));
		}

		const converted = convertValue(value, type);
		if (converted === undefined) {
			return Err(new ConversionError(column, `Cannot convert ${preview(value)} to ${type} for column "${column}"`));
		}
		document[column] = converted;
	}
	return Ok(document);
}

/** Convert a non-null value to its document representation, or `undefined` if it does not fit `type`. */
export function convertValue(value: unknown, type: SqlTypeName): DocumentValue | undefined {
	switch (type) {
		case "bigint":
			return toInteger(value);
		case "integer": {
			const converted = toInteger(value);
			return typeof converted === "number" && converted >= INT32_MIN && converted <= INT32_MAX
				? converted
				: undefined;
		}
		case "double":
			return toDouble(value);
		case "varchar":
			if (typeof value === "string") return value;
			if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
				return String(value);
			}
			return undefined;
		case "boolean":
			return typeof value === "boolean" ? value : undefined;
		case "date":
			return toDate(value);
		case "timestamp":
			return toTimestamp(value);
	}
}

/** Integers outside the safe range are written as decimal strings. */
function toInteger(value: unknown): number | string | undefined {
	if (typeof value === "bigint") {
		return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value.toString();
	}
	if (typeof value === "number") {
		if (!Number.isInteger(value)) return undefined;
		return Number.isSafeInteger(value) ? value : BigInt(value).toString();
	}
	if (typeof value === "string" && INTEGER_RE.test(value.trim())) {
		return toInteger(BigInt(value.trim()));
	}
	return undefined;
}

function toDouble(value: unknown): number | undefined {
	if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
	if (typeof value === "bigint") return Number(value);
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
}

function toDate(value: unknown): string | undefined {
	if (value instanceof Date) {
		return Number.isNaN(value.getTime()) ? undefined : value.toISOString().slice(0, 10);
	}
	if (typeof value === "string") {
		const match = DATE_RE.exec(value);
		if (!match) return undefined;
		const parsed = new Date(`${value}T00:00:00.000Z`);
		return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value) ? value : undefined;
	}
	return undefined;
}

function toTimestamp(value: unknown): string | undefined {
	const date =
		value instanceof Date
			? value
			: typeof value === "string" || typeof value === "number"
				? new Date(value)
				: undefined;
	if (!date || Number.isNaN(date.getTime())) return undefined;
	return date.toISOString();
}

function preview(value: unknown): string {
	if (typeof value === "string") return JSON.stringify(value);
	if (value instanceof Date) return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
	if (typeof value === "object") return Object.prototype.toString.call(value);
	return String(value);
}
