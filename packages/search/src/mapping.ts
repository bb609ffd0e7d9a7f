import type { SqlTypeName, TableDescriptor } from "@seedline/core";

/** Field types the embedded search node understands. */
export const FIELD_TYPES = [
	"long",
	"integer",
	"short",
	"byte",
	"double",
	"float",
	"keyword",
	"text",
	"boolean",
	"date",
	"object",
] as const;

/** A single field type. */
export type FieldType = (typeof FIELD_TYPES)[number];

/** Type guard for {@link FieldType}. */
export function isFieldType(value: string): value is FieldType {
	return (FIELD_TYPES as readonly string[]).includes(value);
}

/** Index mappings as sent to `PUT /{index}`. */
export interface IndexMappings {
	dynamic?: boolean | "strict";
	properties: Record<string, { type: FieldType }>;
}

const FIELD_TYPE_BY_SQL_TYPE: Record<SqlTypeName, FieldType> = {
	bigint: "long",
	integer: "integer",
	double: "double",
	varchar: "keyword",
	boolean: "boolean",
	date: "date",
	timestamp: "date",
};

/** Field type that stores values of a column type. */
export function fieldTypeFor(type: SqlTypeName): FieldType {
	return FIELD_TYPE_BY_SQL_TYPE[type];
}

/** Explicit mappings for the index backing a table. */
export function buildIndexMappings(table: TableDescriptor): IndexMappings {
	const properties: Record<string, { type: FieldType }> = {};
	for (const column of table.columns) {
		properties[column.name] = { type: fieldTypeFor(column.type) };
	}
	return { properties };
}
