// src/features/collect/service.ts
import { ConfigError } from "@lib/errors";
import { createSearchExecutor } from "@lib/github";
import * as searchLib from "@lib/search";
import { toTable } from "@lib/table";
import type { SearchExec } from "@lib/types";
import type {
	CollectRunOpts,
	CollectService,
	CollectServiceOpts,
} from "./types";

// Narrow API surface we depend on, so we can inject a fake in tests
export type SearchApi = {
	collectRepositories: typeof searchLib.collectRepositories;
	collectRepositoriesStream: typeof searchLib.collectRepositoriesStream;
};

export function createCollectService(
	opts: CollectServiceOpts,
	api: SearchApi = searchLib,
): CollectService {
	const token = opts.token.trim();
	if (!token) throw new ConfigError("GitHub token is required");

	const makeExec = (run?: CollectRunOpts): SearchExec =>
		opts.exec ??
		createSearchExecutor({
			token,
			fetchImpl: opts.fetchImpl,
			clock: opts.clock,
			timeoutMs: opts.timeoutMs,
			maxThrottleWaits: opts.maxThrottleWaits,
			userAgent: opts.userAgent,
			apiVersion: opts.apiVersion,
			reporter: opts.reporter,
			onThrottle: run?.onThrottle,
		});

	const base = (baseQuery: string, maxRepos: number) => ({
		baseQuery,
		maxRepos,
		startDate: opts.startDate,
		endDate: opts.endDate,
		clock: opts.clock,
		deadlineMs: opts.deadlineMs,
		reporter: opts.reporter,
	});

	return {
		async collect(
			baseQuery,
			maxRepos = searchLib.DEFAULT_MAX_REPOS,
			run = {},
		) {
			let throttleWaits = 0;
			const exec = makeExec({
				...run,
				onThrottle: (ms, state) => {
					throttleWaits++;
					run.onThrottle?.(ms, state);
				},
			});
			const { records, stats } = await api.collectRepositories({
				...base(baseQuery, maxRepos),
				exec,
				signal: run.signal,
				onBatch: run.onBatch,
			});
			return { table: toTable(records), stats: { ...stats, throttleWaits } };
		},

		stream(baseQuery, maxRepos = searchLib.DEFAULT_MAX_REPOS, run = {}) {
			return api.collectRepositoriesStream({
				...base(baseQuery, maxRepos),
				exec: makeExec(),
				signal: run.signal,
			});
		},
	};
}
