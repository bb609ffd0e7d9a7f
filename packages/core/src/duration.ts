import { ConfigError } from "./result/errors";
import { Err, Ok, type Result } from "./result/result";

/** Milliseconds per supported duration unit. */
const UNIT_MS: Record<string, number> = {
	ns: 1e-6,
	us: 1e-3,
	ms: 1,
	s: 1_000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
};

/** Units used by {@link formatDuration}, largest first. */
const SUCCINCT_UNITS = ["d", "h", "m", "s", "ms", "us", "ns"] as const;

const DURATION_RE = /^\s*(\d+(?:\.\d+)?)\s*([a-z]+)\s*$/;

/**
 * Parse a duration string such as `"5s"`, `"1m"` or `"1.5h"` into milliseconds.
 *
 * Accepted units: `ns`, `us`, `ms`, `s`, `m`, `h`, `d`.
 */
export function parseDuration(text: string): Result<number, ConfigError> {
	const match = DURATION_RE.exec(text);
	const amount = match?.[1];
	const unit = match?.[2];
	if (amount === undefined || unit === undefined) {
		return Err(new ConfigError(`Invalid duration "${text}": expected <number><unit>, e.g. "5s"`));
	}

	const factor = UNIT_MS[unit];
	if (factor === undefined) {
		return Err(
			new ConfigError(
				`Invalid duration "${text}": unknown unit "${unit}" (expected one of ${Object.keys(UNIT_MS).join(", ")})`,
			),
		);
	}

	return Ok(Number.parseFloat(amount) * factor);
}

/**
 * Format milliseconds using the largest unit whose value is at least 1,
 * with two decimals (e.g. `1500` → `"1.50s"`).
 */
export function formatDuration(ms: number): string {
	for (const unit of SUCCINCT_UNITS) {
		const factor = UNIT_MS[unit] ?? 1;
		if (ms >= factor) {
			return `${(ms / factor).toFixed(2)}${unit}`;
		}
	}
	return "0.00ns";
}
