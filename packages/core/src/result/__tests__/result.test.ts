import { describe, expect, it } from "vitest";
import {
	BootstrapError,
	ConfigError,
	ConversionError,
	Err,
	HarnessError,
	LoadError,
	Ok,
	QueryError,
	SearchEngineError,
	toError,
} from "../../result";

describe("Result", () => {
	it("Ok/Err have correct discriminants", () => {
		const ok = Ok(42);
		const err = Err(new HarnessError("fail", "TEST"));

		expect(ok.ok).toBe(true);
		if (ok.ok) expect(ok.value).toBe(42);
		expect(err.ok).toBe(false);
		if (!err.ok) expect(err.error).toBeInstanceOf(HarnessError);
	});

	it("toError wraps non-Error values", () => {
		const original = new Error("kept");
		expect(toError(original)).toBe(original);
		expect(toError("plain").message).toBe("plain");
	});
});

describe("error taxonomy", () => {
	it("all errors are instanceof HarnessError", () => {
		expect(new BootstrapError("boot")).toBeInstanceOf(HarnessError);
		expect(new ConfigError("config")).toBeInstanceOf(HarnessError);
		expect(new QueryError("query")).toBeInstanceOf(HarnessError);
		expect(new ConversionError("col", "conversion")).toBeInstanceOf(HarnessError);
		expect(new SearchEngineError("search", { transient: true })).toBeInstanceOf(HarnessError);
		expect(new LoadError("load", { table: "orders" })).toBeInstanceOf(HarnessError);
	});

	it("error codes are correct strings", () => {
		expect(new BootstrapError("").code).toBe("BOOTSTRAP_FAILED");
		expect(new ConfigError("").code).toBe("CONFIG_INVALID");
		expect(new QueryError("").code).toBe("QUERY_FAILED");
		expect(new ConversionError("c", "").code).toBe("CONVERSION_FAILED");
		expect(new SearchEngineError("", { transient: false }).code).toBe("SEARCH_ENGINE_ERROR");
		expect(new LoadError("", { table: "t" }).code).toBe("LOAD_FAILED");
	});

	it("name matches the subclass", () => {
		expect(new BootstrapError("x").name).toBe("BootstrapError");
		expect(new LoadError("x", { table: "t" }).name).toBe("LoadError");
	});

	it("LoadError carries table, batch, row position and attempts", () => {
		const cause = new SearchEngineError("rejected", { transient: false, status: 400 });
		const error = new LoadError(
			"Load failed",
			{ table: "orders", batchIndex: 2, rowPosition: 9, attempts: 1 },
			cause,
		);

		expect(error.table).toBe("orders");
		expect(error.batchIndex).toBe(2);
		expect(error.rowPosition).toBe(9);
		expect(error.attempts).toBe(1);
		expect(error.cause).toBe(cause);
	});

	it("LoadError defaults attempts to zero", () => {
		expect(new LoadError("x", { table: "t" }).attempts).toBe(0);
	});

	it("addSuppressed keeps the primary error and ignores self-suppression", () => {
		const primary = new BootstrapError("primary");
		const secondary = new Error("close failed");

		primary.addSuppressed(secondary);
		primary.addSuppressed(primary);

		expect(primary.message).toBe("primary");
		expect(primary.suppressed).toEqual([secondary]);
	});
});
