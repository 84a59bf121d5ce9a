import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type CollectServiceOpts, createCollectService } from "@features/collect";
import { resolveCollectorConfig } from "@lib/config";
import { ConfigError } from "@lib/errors";
import type { SearchParams } from "@lib/types";
import { describe, expect, it, vi } from "vitest";
import { describeSearch, makeItems } from "../__test__/github-fakes";
import { makeCaptureLog } from "../__test__/helpers/log";
import { runCollectCore } from "./collect";
import { writeTableFile } from "./utils";

const END = new Date("2024-01-25T00:00:00Z");

/** One window (2024-01-01..2024-01-25) with 120 results over two pages. */
function makeDeps(env: Record<string, string | undefined>) {
	const exec = vi.fn(async (_url: string, params: SearchParams) => {
		const { page } = describeSearch(params);
		if (page === 1) return { items: makeItems(100, { prefix: "a" }) };
		if (page === 2) return { items: makeItems(20, { prefix: "b" }) };
		return { items: [] };
	});
	const create = vi.fn((opts: CollectServiceOpts) =>
		createCollectService({ ...opts, exec, endDate: END }),
	);
	return {
		exec,
		create,
		deps: {
			createCollectService: create,
			resolveConfig: resolveCollectorConfig,
			writeTableFile,
			env,
		},
	};
}

describe("runCollectCore", () => {
	it("writes the collected rows to a CSV file", async () => {
		const dir = mkdtempSync(join(tmpdir(), "collect-core-"));
		const out = join(dir, "nested", "repos.csv");
		const { log, captured } = makeCaptureLog();
		const { deps, create } = makeDeps({
			GITHUB_TOKEN: "test-token",
			SEARCH_START_DATE: "2024-01-01",
		});

		const summary = await runCollectCore({ max: 110, out }, log, deps);

		expect(create.mock.calls[0][0].token).toBe("test-token");
		const lines = readFileSync(out, "utf8").split("\n");
		expect(lines[0]).toBe("name,full_name,stargazers_count,language,created_at");
		expect(lines[1]).toBe("a-0,owner/a-0,10000,TypeScript,2024-01-05T12:00:00Z");
		expect(lines.length).toBe(112);
		expect(lines[111]).toBe("");
		expect(summary).toEqual({
			rows: 110,
			file: out,
			windows: 1,
			pages: 2,
			truncatedWindows: 0,
			failedWindows: 0,
			throttleWaits: 0,
			stopReason: "target",
		});
		expect(captured.spinnerSucceeds).toEqual([
			"Collected data for 110 repositories",
		]);
		expect(captured.success).toEqual([`Wrote 110 rows → ${out}`]);
	});

	it("writes into EXPORTS_DIR by default", async () => {
		const dir = mkdtempSync(join(tmpdir(), "collect-exports-"));
		const { log } = makeCaptureLog();
		const { deps } = makeDeps({
			GITHUB_TOKEN: "test-token",
			SEARCH_START_DATE: "2024-01-01",
			EXPORTS_DIR: dir,
		});

		const summary = await runCollectCore({ max: 5 }, log, deps);

		expect(summary.file).toBe(join(dir, "repositories.csv"));
		expect(readFileSync(join(dir, "repositories.csv"), "utf8")).toContain(
			"a-4,owner/a-4,9996,Go,2024-01-05T12:00:00Z\n",
		);
	});

	it("prints JSON instead of writing a file with --json", async () => {
		const { log, captured } = makeCaptureLog();
		const { deps } = makeDeps({
			GITHUB_TOKEN: "test-token",
			SEARCH_START_DATE: "2024-01-01",
		});
		const write = vi.fn();

		const summary = await runCollectCore({ max: 2, json: true }, log, {
			...deps,
			writeTableFile: write,
		});

		expect(write).not.toHaveBeenCalled();
		expect(summary.file).toBeUndefined();
		expect(captured.json).toEqual([
			[
				{
					name: "a-0",
					full_name: "owner/a-0",
					stargazers_count: 10000,
					language: "TypeScript",
					created_at: "2024-01-05T12:00:00Z",
				},
				{
					name: "a-1",
					full_name: "owner/a-1",
					stargazers_count: 9999,
					language: "Go",
					created_at: "2024-01-05T12:00:00Z",
				},
			],
		]);
	});

	it("fails with ConfigError before any request when the token is missing", async () => {
		const { log } = makeCaptureLog();
		const { deps, create, exec } = makeDeps({});

		await expect(runCollectCore({}, log, deps)).rejects.toBeInstanceOf(
			ConfigError,
		);
		expect(create).not.toHaveBeenCalled();
		expect(exec).not.toHaveBeenCalled();
	});

	it("rejects a preview count that is not a whole number", async () => {
		const { log } = makeCaptureLog();
		const { deps, create } = makeDeps({ GITHUB_TOKEN: "test-token" });

		await expect(
			runCollectCore({ preview: Number.NaN }, log, deps),
		).rejects.toThrow("--preview must be a non-negative integer");
		expect(create).not.toHaveBeenCalled();
	});

	it("warns about windows lost to errors", async () => {
		const { log, captured } = makeCaptureLog();
		const { deps } = makeDeps({
			GITHUB_TOKEN: "test-token",
			SEARCH_START_DATE: "2024-01-01",
		});
		const failing = (opts: CollectServiceOpts) =>
			createCollectService({
				...opts,
				endDate: END,
				exec: async () => {
					throw new Error("HTTP 502");
				},
			});

		const summary = await runCollectCore({ json: true }, log, {
			...deps,
			createCollectService: failing,
		});

		expect(summary.failedWindows).toBe(1);
		expect(captured.warn).toContain("1 window abandoned after errors");
		expect(captured.warn).toContain("Error: 2024-01-01..2024-01-25 page 1: HTTP 502");
	});
});
