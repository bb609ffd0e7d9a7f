import { describe, expect, it } from "vitest";
import { describeError, isLogLevel, type LogEntry, Logger, type LogLevel } from "../logger";
import { LoadError } from "../result/errors";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Collect log output into an array of parsed entries. */
function createTestLogger(level: LogLevel = "info") {
	const lines: LogEntry[] = [];
	const writeFn = (line: string) => {
		lines.push(JSON.parse(line));
	};
	const logger = new Logger(level, {}, writeFn);
	return { logger, lines };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Logger", () => {
	it("outputs valid JSON lines", () => {
		const { logger, lines } = createTestLogger();
		logger.info("hello world");

		expect(lines).toHaveLength(1);
		expect(lines[0]?.level).toBe("info");
		expect(lines[0]?.msg).toBe("hello world");
		const ts = String(lines[0]?.ts);
		expect(new Date(ts).toISOString()).toBe(ts);
	});

	it("includes extra data in the log entry", () => {
		const { logger, lines } = createTestLogger();
		logger.info("batch acknowledged", { batchIndex: 5, table: "orders" });

		expect(lines[0]?.batchIndex).toBe(5);
		expect(lines[0]?.table).toBe("orders");
	});

	it("filters messages below the minimum level", () => {
		const { logger, lines } = createTestLogger("warn");
		logger.debug("should not appear");
		logger.info("should not appear");
		logger.warn("should appear");
		logger.error("should appear");

		expect(lines.map((l) => l.level)).toEqual(["warn", "error"]);
	});

	it("debug level allows all messages", () => {
		const { logger, lines } = createTestLogger("debug");
		logger.debug("d");
		logger.info("i");
		logger.warn("w");
		logger.error("e");

		expect(lines).toHaveLength(4);
	});

	describe("child()", () => {
		it("merges child bindings with extra data", () => {
			const { logger, lines } = createTestLogger();
			const child = logger.child({ table: "nation", component: "loader" });
			child.info("loaded", { rows: 25 });

			expect(lines[0]?.table).toBe("nation");
			expect(lines[0]?.component).toBe("loader");
			expect(lines[0]?.rows).toBe(25);
		});

		it("child inherits level filtering from parent", () => {
			const { logger, lines } = createTestLogger("warn");
			const child = logger.child({ table: "nation" });
			child.info("should not appear");
			child.warn("should appear");

			expect(lines).toHaveLength(1);
			expect(lines[0]?.level).toBe("warn");
		});

		it("supports nested children", () => {
			const { logger, lines } = createTestLogger();
			logger.child({ catalog: "benchmark" }).child({ table: "region" }).info("nested");

			expect(lines[0]?.catalog).toBe("benchmark");
			expect(lines[0]?.table).toBe("region");
		});
	});
});

describe("isLogLevel", () => {
	it("accepts known levels only", () => {
		expect(isLogLevel("debug")).toBe(true);
		expect(isLogLevel("error")).toBe(true);
		expect(isLogLevel("trace")).toBe(false);
	});
});

describe("describeError", () => {
	it("includes code and cause message", () => {
		const error = new LoadError("Load failed", { table: "orders" }, new Error("socket hang up"));

		expect(describeError(error)).toEqual({
			error: "Load failed",
			errorName: "LoadError",
			errorCode: "LOAD_FAILED",
			cause: "socket hang up",
		});
	});

	it("omits code and cause for plain errors", () => {
		expect(describeError(new Error("plain"))).toEqual({ error: "plain", errorName: "Error" });
	});
});
