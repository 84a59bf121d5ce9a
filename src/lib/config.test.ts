import { describe, expect, it } from "vitest";
import { getEnvInt, resolveCollectorConfig } from "./config";
import { ConfigError } from "./errors";

describe("resolveCollectorConfig", () => {
	it("requires a token", () => {
		expect(() => resolveCollectorConfig({})).toThrow(ConfigError);
		expect(() => resolveCollectorConfig({ GITHUB_TOKEN: "   " })).toThrow(
			"GITHUB_TOKEN missing",
		);
	});

	it("fills in defaults", () => {
		const cfg = resolveCollectorConfig({ GITHUB_TOKEN: "test-token" });
		expect(cfg.token).toBe("test-token");
		expect(cfg.baseQuery).toBe("is:public stars:>=100");
		expect(cfg.maxRepos).toBe(5000);
		expect(cfg.startDate.toISOString()).toBe("2014-01-01T00:00:00.000Z");
		expect(cfg.timeoutMs).toBe(30000);
		expect(cfg.deadlineMs).toBeUndefined();
		expect(cfg.maxThrottleWaits).toBe(20);
		expect(cfg.exportsDir).toBe("./exports");
		expect(cfg.debug).toBe(false);
	});

	it("reads env and lets overrides win", () => {
		const env = {
			GITHUB_TOKEN: "test-token",
			SEARCH_QUERY: "language:rust",
			SEARCH_MAX_REPOS: "300",
			SEARCH_START_DATE: "2020-06-01",
			SEARCH_DEADLINE_MS: "60000",
			EXPORTS_DIR: "/tmp/out",
		};
		const fromEnv = resolveCollectorConfig(env);
		expect(fromEnv.baseQuery).toBe("language:rust");
		expect(fromEnv.maxRepos).toBe(300);
		expect(fromEnv.deadlineMs).toBe(60000);
		expect(fromEnv.exportsDir).toBe("/tmp/out");

		const cfg = resolveCollectorConfig(env, {
			token: "other-token",
			baseQuery: "topic:cli",
			maxRepos: 25,
			startDate: "2022-02-02",
		});
		expect(cfg.token).toBe("other-token");
		expect(cfg.baseQuery).toBe("topic:cli");
		expect(cfg.maxRepos).toBe(25);
		expect(cfg.startDate.toISOString()).toBe("2022-02-02T00:00:00.000Z");
	});

	it("rejects malformed settings before anything runs", () => {
		const base = { GITHUB_TOKEN: "test-token" };
		expect(() =>
			resolveCollectorConfig({ ...base, SEARCH_START_DATE: "01/01/2014" }),
		).toThrow(ConfigError);
		expect(() =>
			resolveCollectorConfig({ ...base, SEARCH_MAX_REPOS: "lots" }),
		).toThrow("SEARCH_MAX_REPOS must be a non-negative integer");
		expect(() => resolveCollectorConfig(base, { maxRepos: -1 })).toThrow(
			"--max must be a non-negative integer",
		);
		expect(() =>
			resolveCollectorConfig(base, { maxRepos: Number.NaN }),
		).toThrow("--max must be a non-negative integer");
	});

	it("treats a blank start date like the other blank settings", () => {
		const cfg = resolveCollectorConfig({
			GITHUB_TOKEN: "test-token",
			SEARCH_START_DATE: "  ",
		});
		expect(cfg.startDate.toISOString()).toBe("2014-01-01T00:00:00.000Z");
	});
});

describe("getEnvInt", () => {
	it("falls back on blank values", () => {
		expect(getEnvInt({ X: " " }, "X", 7)).toBe(7);
		expect(getEnvInt({}, "X")).toBeUndefined();
		expect(getEnvInt({ X: "42" }, "X", 7)).toBe(42);
	});
});
