import { createCollectService } from "@features/collect";
import type { log as realLog } from "@lib/bootstrap";
import { DEFAULT_BASE_QUERY, DEFAULT_MAX_REPOS } from "@lib/search";
import { toCsv } from "@lib/table";
import type { FetchLike, Reporter } from "@lib/types";
import { formatDate } from "@lib/windows";
import {
	type ProgressEmitter,
	type RepositoryTable,
	resolveGithubToken,
} from "./public.types";

/** Options for the repository search collector. */
export interface CollectFetchOptions {
	query?: string;
	maxRepos?: number;
	startDate?: Date;
	endDate?: Date;
	deadlineMs?: number;
	signal?: AbortSignal;
	logger?: typeof realLog;
	// NOTE: override token useful for tests / programmatic use
	GITHUB_TOKEN?: string;
	fetchImpl?: FetchLike;
	onProgress?: ProgressEmitter<"fetching:window">;
}

export interface CollectFetchResult {
	table: RepositoryTable;
	stats: {
		count: number;
		windows: number;
		pages: number;
		truncatedWindows: number;
		failedWindows: number;
		throttleWaits: number;
		stopReason: string;
		fetchedAt: string;
	};
}

/** Collect repositories as plain data (no disk writes, no logging unless logger provided). */
export async function fetchRepositories(
	opts: CollectFetchOptions = {},
): Promise<CollectFetchResult> {
	const token = resolveGithubToken({
		override: opts.GITHUB_TOKEN,
		help: "Set GITHUB_TOKEN or pass options.GITHUB_TOKEN to collect repositories.",
	});
	const reporter: Reporter | undefined = opts.logger?.reporter();
	const service = createCollectService({
		token,
		fetchImpl: opts.fetchImpl,
		startDate: opts.startDate,
		endDate: opts.endDate,
		deadlineMs: opts.deadlineMs,
		reporter,
	});

	const query = opts.query ?? DEFAULT_BASE_QUERY;
	const maxRepos = opts.maxRepos ?? DEFAULT_MAX_REPOS;
	await opts.onProgress?.({
		phase: "fetching:window",
		detail: { status: "start" },
		meta: { query, maxRepos },
	});

	let idx = 0;
	const { table, stats } = await service.collect(
		query,
		maxRepos,
		{
			signal: opts.signal,
			onBatch: async (b, total) => {
				idx++;
				await opts.onProgress?.({
					phase: "fetching:window",
					index: idx,
					item: `${formatDate(b.window.start)}..${formatDate(b.window.end)}`,
					detail: b.error
						? { status: "error", error: b.error.message }
						: { status: "progress", current: total, label: b.query },
					meta: { pages: b.pages, truncated: b.truncated },
				});
			},
		},
	);
	await opts.onProgress?.({
		phase: "fetching:window",
		total: idx,
		detail: { status: "done" },
		meta: { count: table.rows.length, stopReason: stats.stopReason },
	});

	return {
		table,
		stats: {
			count: table.rows.length,
			windows: stats.windows,
			pages: stats.pages,
			truncatedWindows: stats.truncatedWindows,
			failedWindows: stats.failedWindows,
			throttleWaits: stats.throttleWaits,
			stopReason: stats.stopReason,
			fetchedAt: new Date().toISOString(),
		},
	};
}

/** Collect and serialise straight to CSV text. */
export async function fetchRepositoriesCsv(
	opts: CollectFetchOptions = {},
): Promise<string> {
	const { table } = await fetchRepositories(opts);
	return toCsv(table);
}
