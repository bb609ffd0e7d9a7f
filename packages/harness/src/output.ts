/** Print a message to stdout. */
export function print(message: string): void {
	process.stdout.write(`${message}\n`);
}

/** Print an error to stderr and exit with code 1. */
export function fatal(message: string): never {
	process.stderr.write(`Error: ${message}\n`);
	process.exit(1);
}

/** Print a warning to stderr. */
export function warn(message: string): void {
	process.stderr.write(`Warning: ${message}\n`);
}

/** Print a key-value table to stdout. */
export function printTable(rows: Array<Record<string, string | number | boolean | undefined>>): void {
	const [first] = rows;
	if (!first) {
		print("(none)");
		return;
	}

	const keys = Object.keys(first);
	const widths = keys.map((key) => Math.max(key.length, ...rows.map((row) => String(row[key] ?? "").length)));
	const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd();

	print(line(keys));
	print(line(widths.map((w) => "-".repeat(w))));
	for (const row of rows) {
		print(line(keys.map((key) => String(row[key] ?? ""))));
	}
}
