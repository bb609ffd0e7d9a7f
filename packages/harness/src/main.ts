import { Logger } from "@seedline/core";
import { parseArgs } from "./args";
import { buildCluster, type BuildClusterOptions } from "./bootstrap";
import { loadHarnessConfig } from "./config";
import { fatal, print, printTable, warn } from "./output";

export const VERSION = "0.1.0";

export const HELP = `seedline: query cluster and search node seeded with benchmark data

Usage: seedline [options]

Options:
  --nodes <n>              Query cluster size (or SEEDLINE_NODE_COUNT env, default: 2)
  --tables <a,b,...>       Benchmark tables to load (default: all)
  --schema <tiny|small>    Benchmark schema to read from (default: tiny)
  --batch-size <n>         Documents per bulk request (or SEEDLINE_BATCH_SIZE env, default: 1000)
  --log-level <level>      debug, info, warn or error (or SEEDLINE_LOG_LEVEL env, default: info)

General:
  --help, -h               Show this help message
  --version, -v            Show version

Examples:
  seedline
  seedline --nodes 1 --tables region,nation
  seedline --schema small --batch-size 500 --log-level debug
`;

/** Resolve once the process is asked to stop. */
export function waitForShutdown(): Promise<NodeJS.Signals> {
	return new Promise((resolve) => {
		const onSignal = (signal: NodeJS.Signals) => {
			process.off("SIGINT", onSignal);
			process.off("SIGTERM", onSignal);
			resolve(signal);
		};
		process.once("SIGINT", onSignal);
		process.once("SIGTERM", onSignal);
	});
}

/**
 * Run the harness: build the cluster, print its coordinator URL and the
 * loaded tables, then keep it up until `shutdown` resolves.
 */
export async function main(
	argv: string[],
	env: Readonly<Record<string, string | undefined>>,
	options: { shutdown?: () => Promise<unknown>; overrides?: BuildClusterOptions } = {},
): Promise<void> {
	const { flags, positional } = parseArgs(argv);

	if (flags.version === "true" || flags.v === "true") {
		print(VERSION);
		return;
	}
	if (flags.help === "true" || flags.h === "true") {
		print(HELP);
		return;
	}
	if (positional.length > 0) {
		warn(`Ignoring unexpected arguments: ${positional.join(" ")}`);
	}

	const config = loadHarnessConfig(flags, env);
	if (!config.ok) fatal(config.error.message);

	const logger = new Logger(config.value.logLevel, { service: "seedline" });
	const built = await buildCluster({
		nodeCount: config.value.nodeCount,
		tables: config.value.tables,
		benchmarkSchema: config.value.benchmarkSchema,
		batchSize: config.value.batchSize,
		logger,
		...options.overrides,
	});
	if (!built.ok) {
		logger.error("harness failed", { code: built.error.code, error: built.error.message });
		fatal(built.error.message);
	}

	const cluster = built.value;
	printTable(
		cluster.loaded.map((l) => ({ table: l.table, index: l.index, rows: l.rows, batches: l.batches })),
	);
	print(`Query cluster ready at ${cluster.baseUrl}`);

	await (options.shutdown ?? waitForShutdown)();
	logger.info("shutting down");
	await cluster.close();
}
