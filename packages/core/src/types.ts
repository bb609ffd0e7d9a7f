// ---------------------------------------------------------------------------
// Shared data model: column types, table descriptors and result rows
// ---------------------------------------------------------------------------

/** Semantic type tags understood by the query engine. */
export const SQL_TYPE_NAMES = [
	"bigint",
	"integer",
	"double",
	"varchar",
	"boolean",
	"date",
	"timestamp",
] as const;

/** A single semantic type tag. */
export type SqlTypeName = (typeof SQL_TYPE_NAMES)[number];

/** Type guard for {@link SqlTypeName}. */
export function isSqlTypeName(value: string): value is SqlTypeName {
	return (SQL_TYPE_NAMES as readonly string[]).includes(value);
}

/** A named, typed column. */
export interface ColumnDescriptor {
	readonly name: string;
	readonly type: SqlTypeName;
}

/**
 * Binds a logical table to the physical search index that stores it.
 *
 * `indexName` is always the lower-cased `tableName`.
 */
export interface TableDescriptor {
	readonly tableName: string;
	readonly indexName: string;
	readonly schemaName: string;
	readonly columns: ReadonlyArray<ColumnDescriptor>;
}

/** Build a frozen {@link TableDescriptor}, deriving the index name from the table name. */
export function createTableDescriptor(
	schemaName: string,
	tableName: string,
	columns: ReadonlyArray<ColumnDescriptor>,
): TableDescriptor {
	return Object.freeze({
		tableName,
		indexName: tableName.toLowerCase(),
		schemaName,
		columns: Object.freeze(columns.map((c) => Object.freeze({ name: c.name, type: c.type }))),
	});
}

/** One column's value within a result row. */
export interface ColumnValue {
	readonly column: string;
	readonly value: unknown;
}

/** A single query result row, in the result's column order. */
export type QueryResultRow = ReadonlyArray<ColumnValue>;
