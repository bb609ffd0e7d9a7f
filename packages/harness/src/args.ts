/** Parsed command-line arguments. */
export interface ParsedArgs {
	/** Named flags (e.g. --nodes 3 becomes { nodes: "3" }) */
	flags: Record<string, string>;
	/** Arguments that are not flags or flag values */
	positional: string[];
}

/**
 * Parse process.argv into flags and positional args.
 *
 * Supports:
 * - `--flag value` style options
 * - `--flag=value` style options
 * - `-h` style short flags
 * - bare flags, recorded as `"true"`
 */
export function parseArgs(argv: string[]): ParsedArgs {
	// Skip node binary and script path
	const args = argv.slice(2);

	const flags: Record<string, string> = {};
	const positional: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";

		if (arg.startsWith("--")) {
			const equalIdx = arg.indexOf("=");
			if (equalIdx !== -1) {
				flags[arg.slice(2, equalIdx)] = arg.slice(equalIdx + 1);
				continue;
			}
			const key = arg.slice(2);
			const nextArg = args[i + 1];
			if (nextArg !== undefined && !nextArg.startsWith("-")) {
				flags[key] = nextArg;
				i++;
			} else {
				flags[key] = "true";
			}
		} else if (arg.startsWith("-") && arg.length === 2) {
			flags[arg.slice(1)] = "true";
		} else {
			positional.push(arg);
		}
	}

	return { flags, positional };
}
