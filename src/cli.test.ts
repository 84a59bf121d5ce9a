import { afterEach, describe, expect, it, vi } from "vitest";
import type { runCollectCore } from "./api/collect";
import { _resetCliDeps, _setCliDeps, _testMain, parseCollectArgs } from "./cli";

afterEach(() => {
	_resetCliDeps();
	process.exitCode = undefined;
});

describe("parseCollectArgs", () => {
	it("reads every collect option", () => {
		expect(
			parseCollectArgs([
				"collect",
				"--query",
				"is:public stars:>=100",
				"--max",
				"250",
				"--since",
				"2020-01-01",
				"--out",
				"out.csv",
				"--json",
				"--deadline",
				"60000",
				"--preview",
				"5",
			]),
		).toEqual({
			query: "is:public stars:>=100",
			max: 250,
			since: "2020-01-01",
			out: "out.csv",
			json: true,
			deadlineMs: 60000,
			preview: 5,
		});
	});

	it("leaves absent options undefined", () => {
		expect(parseCollectArgs(["collect"])).toEqual({
			query: undefined,
			max: undefined,
			since: undefined,
			out: undefined,
			json: false,
			deadlineMs: undefined,
			preview: undefined,
		});
	});

	it("keeps a non-numeric value so validation can reject it", () => {
		expect(parseCollectArgs(["collect", "--max", "abc"]).max).toBeNaN();
	});
});

describe("cli router", () => {
	it("routes collect to the collect core with parsed options", async () => {
		const runCollect = vi.fn<typeof runCollectCore>(async () => ({
			rows: 0,
			windows: 0,
			pages: 0,
			truncatedWindows: 0,
			failedWindows: 0,
			throttleWaits: 0,
			stopReason: "exhausted",
		}));
		_setCliDeps({ runCollect });

		await _testMain(["node", "cli.ts", "collect", "--max", "3"]);

		expect(runCollect).toHaveBeenCalledTimes(1);
		const [opts, , , signal] = runCollect.mock.calls[0];
		expect(opts.max).toBe(3);
		expect(signal).toBeInstanceOf(AbortSignal);
	});

	it("rejects a mistyped --max before collecting", async () => {
		process.env.GITHUB_TOKEN = "test-token";

		await expect(
			_testMain(["node", "cli.ts", "collect", "--max", "abc"]),
		).rejects.toThrow("--max must be a non-negative integer");
	});

	it("flags unknown commands", async () => {
		vi.spyOn(process.stdout, "write").mockImplementation(() => true);
		vi.spyOn(process.stderr, "write").mockImplementation(() => true);

		await _testMain(["node", "cli.ts", "nope"]);

		expect(process.exitCode).toBe(1);
	});
});
