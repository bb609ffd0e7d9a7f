// ---------------------------------------------------------------------------
// Statement parsing for the SELECT subset the harness and its tests issue
// ---------------------------------------------------------------------------
//
//   SELECT * | count(*) | col [, col]* FROM [[catalog.]schema.]table [LIMIT n] [;]

import { Err, normalizeIdentifier, Ok, QueryError, type Result } from "@seedline/core";
import type { Session } from "./types";

/** A fully qualified `catalog.schema.table` name. */
export class QualifiedObjectName {
	constructor(
		readonly catalog: string,
		readonly schema: string,
		readonly table: string,
	) {}

	toString(): string {
		return `${this.catalog}.${this.schema}.${this.table}`;
	}
}

/** Projection of a SELECT statement. */
export type SelectList =
	| { kind: "all" }
	| { kind: "count" }
	| { kind: "columns"; columns: string[] };

/** A table reference as written, possibly partially qualified. */
export interface TableReference {
	catalog?: string;
	schema?: string;
	table: string;
}

/** A parsed SELECT statement. */
export interface SelectStatement {
	select: SelectList;
	from: TableReference;
	limit?: number;
}

type Token =
	| { kind: "word"; text: string }
	| { kind: "number"; text: string }
	| { kind: "symbol"; text: string };

const TOKEN_RE = /\s*(?:([A-Za-z_][A-Za-z0-9_]*)|(\d+)|([*,.();]))/y;

function tokenize(sql: string): Result<Token[], QueryError> {
	const tokens: Token[] = [];
	TOKEN_RE.lastIndex = 0;
	let position = 0;

	while (position < sql.length) {
		if (sql.slice(position).trim().length === 0) break;

		TOKEN_RE.lastIndex = position;
		const match = TOKEN_RE.exec(sql);
		if (!match) {
			const offending = sql.slice(position).trimStart().charAt(0);
			return Err(new QueryError(`Unexpected character "${offending}" in query: ${sql}`));
		}

		const [, word, number, symbol] = match;
		if (word !== undefined) tokens.push({ kind: "word", text: word });
		else if (number !== undefined) tokens.push({ kind: "number", text: number });
		else if (symbol !== undefined) tokens.push({ kind: "symbol", text: symbol });
		position = TOKEN_RE.lastIndex;
	}

	return Ok(tokens);
}

/** Recursive-descent cursor over a token list. */
class Parser {
	private index = 0;

	constructor(
		private readonly tokens: Token[],
		private readonly sql: string,
	) {}

	parse(): Result<SelectStatement, QueryError> {
		const select = this.expectKeyword("select");
		if (!select.ok) return select;

		const list = this.parseSelectList();
		if (!list.ok) return list;

		const from = this.expectKeyword("from");
		if (!from.ok) return from;

		const table = this.parseTableReference();
		if (!table.ok) return table;

		const statement: SelectStatement = { select: list.value, from: table.value };

		if (this.peekKeyword("limit")) {
			this.index++;
			const next = this.tokens[this.index];
			if (next?.kind !== "number") {
				return this.error("LIMIT requires a non-negative integer");
			}
			statement.limit = Number.parseInt(next.text, 10);
			this.index++;
		}

		if (this.peekSymbol(";")) this.index++;

		const trailing = this.tokens[this.index];
		if (trailing) {
			return this.error(`Unexpected "${trailing.text}"`);
		}
		return Ok(statement);
	}

	private parseSelectList(): Result<SelectList, QueryError> {
		if (this.peekSymbol("*")) {
			this.index++;
			return Ok({ kind: "all" });
		}

		if (this.peekKeyword("count") && this.tokens[this.index + 1]?.text === "(") {
			this.index += 2;
			for (const expected of ["*", ")"]) {
				if (!this.peekSymbol(expected)) return this.error("Only count(*) is supported");
				this.index++;
			}
			return Ok({ kind: "count" });
		}

		const columns: string[] = [];
		for (;;) {
			const column = this.expectIdentifier();
			if (!column.ok) return column;
			columns.push(column.value);
			if (!this.peekSymbol(",")) break;
			this.index++;
		}
		return Ok({ kind: "columns", columns });
	}

	private parseTableReference(): Result<TableReference, QueryError> {
		const parts: string[] = [];
		for (;;) {
			const part = this.expectIdentifier();
			if (!part.ok) return part;
			parts.push(part.value);
			if (!this.peekSymbol(".")) break;
			this.index++;
		}

		const [first, second, third] = parts;
		if (parts.length === 1 && first !== undefined) return Ok({ table: first });
		if (parts.length === 2 && first !== undefined && second !== undefined) {
			return Ok({ schema: first, table: second });
		}
		if (parts.length === 3 && first !== undefined && second !== undefined && third !== undefined) {
			return Ok({ catalog: first, schema: second, table: third });
		}
		return this.error(`Too many parts in table name "${parts.join(".")}"`);
	}

	/** Unquoted identifiers fold to lower case. */
	private expectIdentifier(): Result<string, QueryError> {
		const token = this.tokens[this.index];
		if (token?.kind !== "word") {
			return this.error(`Expected identifier but found ${token ? `"${token.text}"` : "end of query"}`);
		}
		const name = normalizeIdentifier(token.text);
		if (!name.ok) return name;
		this.index++;
		return name;
	}

	private expectKeyword(keyword: string): Result<void, QueryError> {
		if (!this.peekKeyword(keyword)) {
			const token = this.tokens[this.index];
			return this.error(
				`Expected ${keyword.toUpperCase()} but found ${token ? `"${token.text}"` : "end of query"}`,
			);
		}
		this.index++;
		return Ok(undefined);
	}

	private peekKeyword(keyword: string): boolean {
		const token = this.tokens[this.index];
		return token?.kind === "word" && token.text.toLowerCase() === keyword;
	}

	private peekSymbol(symbol: string): boolean {
		const token = this.tokens[this.index];
		return token?.kind === "symbol" && token.text === symbol;
	}

	private error(message: string): Result<never, QueryError> {
		return Err(new QueryError(`${message} in query: ${this.sql}`));
	}
}

/** Parse a SELECT statement. */
export function parseStatement(sql: string): Result<SelectStatement, QueryError> {
	const tokens = tokenize(sql);
	if (!tokens.ok) return tokens;
	if (tokens.value.length === 0) {
		return Err(new QueryError("Query is empty"));
	}
	return new Parser(tokens.value, sql).parse();
}

/** Qualify a table reference with the session's catalog and schema. */
export function qualifyTableReference(
	reference: TableReference,
	session: Session,
): Result<QualifiedObjectName, QueryError> {
	const catalog = reference.catalog ?? session.catalog;
	const schema = reference.schema ?? session.schema;
	if (catalog === undefined) {
		return Err(new QueryError(`Catalog must be specified when session catalog is not set`));
	}
	if (schema === undefined) {
		return Err(new QueryError(`Schema must be specified when session schema is not set`));
	}
	return Ok(new QualifiedObjectName(catalog, schema, reference.table));
}
