import { QueryError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";

/** Unquoted catalog, schema, table or column name. */
const IDENTIFIER_RE = /^[a-zA-Z_][a-zA-Z0-9_]{0,63}$/;

/** Whether `name` can appear unquoted in a query. */
export function isValidIdentifier(name: string): boolean {
	return IDENTIFIER_RE.test(name);
}

/**
 * Validate an identifier read from a query and fold it to lower case.
 * Catalog, schema and table names are case-insensitive.
 */
export function normalizeIdentifier(name: string): Result<string, QueryError> {
	if (!isValidIdentifier(name)) {
		return Err(new QueryError(`Invalid identifier "${name}"`));
	}
	return Ok(name.toLowerCase());
}
