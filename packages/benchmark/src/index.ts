export { generateRows } from "./generator";
export { BENCHMARK_CONNECTOR, BenchmarkConnector, BenchmarkPlugin } from "./plugin";
export { SeededRandom, seedFor } from "./random";
export {
	BENCHMARK_SCHEMAS,
	BENCHMARK_TABLE_NAMES,
	BENCHMARK_TABLES,
	type BenchmarkTable,
	type BenchmarkTableName,
	benchmarkScale,
	isBenchmarkTableName,
} from "./tables";
export { type BenchmarkWords, loadWords, parseWords } from "./words";
