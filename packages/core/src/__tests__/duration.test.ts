import { describe, expect, it } from "vitest";
import { formatDuration, parseDuration } from "../duration";
import { ConfigError } from "../result/errors";

describe("parseDuration", () => {
	it.each([
		["5s", 5_000],
		["1m", 60_000],
		["2m", 120_000],
		["250ms", 250],
		["1.5h", 5_400_000],
		["1d", 86_400_000],
		[" 10 s ", 10_000],
	])("parses %s", (text, expected) => {
		expect(parseDuration(text)).toEqual({ ok: true, value: expected });
	});

	it("rejects a missing unit", () => {
		const result = parseDuration("30");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConfigError);
			expect(result.error.message).toContain('"30"');
		}
	});

	it("rejects an unknown unit", () => {
		const result = parseDuration("3w");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toContain('unknown unit "w"');
	});

	it("rejects negative values", () => {
		expect(parseDuration("-1s").ok).toBe(false);
	});
});

describe("formatDuration", () => {
	it("uses the most succinct unit", () => {
		expect(formatDuration(1_500)).toBe("1.50s");
		expect(formatDuration(250)).toBe("250.00ms");
		expect(formatDuration(90_000)).toBe("1.50m");
		expect(formatDuration(0.25)).toBe("250.00us");
	});

	it("formats zero", () => {
		expect(formatDuration(0)).toBe("0.00ns");
	});
});
