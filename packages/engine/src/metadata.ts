import { ConfigError, Err, isSqlTypeName, Ok, type Result, type SqlTypeName } from "@seedline/core";

/** Alternate spellings accepted for the built-in types. */
const TYPE_ALIASES: Record<string, SqlTypeName> = {
	int: "integer",
	long: "bigint",
	"double precision": "double",
	float: "double",
	string: "varchar",
	text: "varchar",
	bool: "boolean",
};

/** Strips a parameter list such as `(25)` or `(3)` from a type signature. */
const PARAMETERS_RE = /\s*\([\d\s,]*\)\s*$/;

/** Decodes a type signature (e.g. `"varchar(25)"`) into a semantic type tag. */
export type TypeDecoder = (signature: string) => Result<SqlTypeName, ConfigError>;

/**
 * Resolves type signatures against the engine's semantic type system.
 */
export class TypeRegistry {
	private readonly aliases: ReadonlyMap<string, SqlTypeName>;

	constructor(aliases: Record<string, SqlTypeName> = TYPE_ALIASES) {
		this.aliases = new Map(Object.entries(aliases));
	}

	/** Resolve a signature. Matching is case-insensitive and ignores type parameters. */
	resolve(signature: string): Result<SqlTypeName, ConfigError> {
		const base = signature.trim().toLowerCase().replace(PARAMETERS_RE, "");
		if (isSqlTypeName(base)) {
			return Ok(base);
		}
		const aliased = this.aliases.get(base);
		if (aliased) {
			return Ok(aliased);
		}
		return Err(new ConfigError(`Unknown type: "${signature}"`));
	}

	/** A {@link TypeDecoder} bound to this registry. */
	decoder(): TypeDecoder {
		return (signature) => this.resolve(signature);
	}
}

/** Read-only view of the engine's metadata handed to connectors and harness code. */
export interface MetadataService {
	/** The engine's type system. */
	readonly types: TypeRegistry;
	/** Names of registered catalogs, sorted. */
	listCatalogs(): string[];
}
