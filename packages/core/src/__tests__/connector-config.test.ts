import { describe, expect, it } from "vitest";
import { CONNECTOR_PROPERTY, parseConnectorConfig } from "../connector-config";
import { ConfigError } from "../result/errors";
import { backoffDelay, retryPolicyFromConfig } from "../retry";

const properties = {
	"default-schema-name": "bench",
	"table-description-directory": "file:///tmp/queryrunner",
	"scroll-size": "1000",
	"scroll-timeout": "1m",
	"request-timeout": "2m",
	"max-request-retries": "3",
	"max-request-retry-time": "5s",
};

describe("parseConnectorConfig", () => {
	it("parses a complete property map", () => {
		const result = parseConnectorConfig(properties);

		expect(result).toEqual({
			ok: true,
			value: {
				defaultSchema: "bench",
				tableDescriptionDirectory: "file:///tmp/queryrunner",
				scrollSize: 1000,
				scrollTimeoutMs: 60_000,
				requestTimeoutMs: 120_000,
				maxRequestRetries: 3,
				maxRequestRetryTimeMs: 5_000,
			},
		});
	});

	it("returns a frozen config", () => {
		const result = parseConnectorConfig(properties);
		expect(result.ok && Object.isFrozen(result.value)).toBe(true);
	});

	it("fills defaults for absent keys", () => {
		const result = parseConnectorConfig({ "table-description-directory": "/tmp/descriptions" });

		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.defaultSchema).toBe("default");
			expect(result.value.scrollSize).toBe(1000);
			expect(result.value.maxRequestRetries).toBe(5);
		}
	});

	it("requires the table description directory", () => {
		const result = parseConnectorConfig({ "scroll-size": "10" });

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConfigError);
			expect(result.error.message).toBe('"table-description-directory" is required');
		}
	});

	it("rejects unknown keys", () => {
		const result = parseConnectorConfig({ ...properties, "scroll-sise": "10" });

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe('Unknown connector property "scroll-sise"');
	});

	it.each([
		[CONNECTOR_PROPERTY.SCROLL_SIZE, "0"],
		[CONNECTOR_PROPERTY.SCROLL_SIZE, "1.5"],
		[CONNECTOR_PROPERTY.MAX_REQUEST_RETRIES, "-1"],
		[CONNECTOR_PROPERTY.MAX_REQUEST_RETRIES, "three"],
	])("rejects %s=%s", (key, value) => {
		const result = parseConnectorConfig({ ...properties, [key]: value });

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe(`"${key}" must be a positive integer, got "${value}"`);
		}
	});

	it("rejects malformed and zero durations", () => {
		const malformed = parseConnectorConfig({ ...properties, "scroll-timeout": "soon" });
		expect(malformed.ok).toBe(false);
		if (!malformed.ok) expect(malformed.error.message).toContain('"scroll-timeout"');

		const zero = parseConnectorConfig({ ...properties, "request-timeout": "0s" });
		expect(zero.ok).toBe(false);
		if (!zero.ok) {
			expect(zero.error.message).toBe('"request-timeout" must be greater than zero, got "0s"');
		}
	});
});

describe("retryPolicyFromConfig", () => {
	it("maps request retries and retry time", () => {
		const policy = retryPolicyFromConfig({ maxRequestRetries: 3, maxRequestRetryTimeMs: 5_000 });

		expect(policy).toEqual({
			maxAttempts: 3,
			maxRetryDurationMs: 5_000,
			initialBackoffMs: 100,
			maxBackoffMs: 2_000,
		});
	});

	it("accepts backoff overrides", () => {
		const policy = retryPolicyFromConfig(
			{ maxRequestRetries: 2, maxRequestRetryTimeMs: 1_000 },
			{ initialBackoffMs: 0, maxBackoffMs: 0 },
		);

		expect(policy.initialBackoffMs).toBe(0);
		expect(policy.maxBackoffMs).toBe(0);
	});
});

describe("backoffDelay", () => {
	const policy = { maxAttempts: 6, maxRetryDurationMs: 60_000, initialBackoffMs: 100, maxBackoffMs: 500 };

	it("doubles per failed attempt up to the cap", () => {
		expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(policy, attempt))).toEqual([
			100, 200, 400, 500, 500,
		]);
	});
});
