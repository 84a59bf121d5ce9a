// src/lib/search.ts

import { SEARCH_REPOSITORIES_URL } from "./github";
import { projectRepository } from "./mapper";
import type {
	Clock,
	CollectStats,
	RepositoryRecord,
	Reporter,
	SearchExec,
	SearchPage,
	SearchRepoItem,
	SearchWindow,
	StopReason,
	WindowBatch,
} from "./types";
import { NoopReporter } from "./types";
import { isObject } from "./utils";
import { formatDate, parseDate, searchWindows, windowQuery } from "./windows";

/** GitHub's per_page maximum */
export const PAGE_SIZE = 100;
/** GitHub serves at most 1000 results (10 pages of 100) per search query. */
export const MAX_PAGES = 10;
export const DEFAULT_START_DATE = "2014-01-01";
export const DEFAULT_BASE_QUERY = "is:public stars:>=100";
export const DEFAULT_MAX_REPOS = 5000;

export type CollectOptions = {
	exec: SearchExec;
	baseQuery: string;
	maxRepos: number;
	/** First day searched (default 2014-01-01). */
	startDate?: Date;
	/** Upper bound (default: now, per `clock`). */
	endDate?: Date;
	clock?: Pick<Clock, "now">;
	/** Stop issuing requests once this many ms have elapsed. */
	deadlineMs?: number;
	signal?: AbortSignal;
	reporter?: Reporter;
	url?: string;
};

/* ─────────────────────── internals ───────────────────────── */

function defaultStart(): Date {
	const d = parseDate(DEFAULT_START_DATE);
	if (!d) throw new Error(`bad DEFAULT_START_DATE ${DEFAULT_START_DATE}`);
	return d;
}

/** Validate the body of a search response. */
export function parseSearchPage(body: unknown): SearchPage {
	if (!isObject(body)) throw new Error("search: response body is not an object");
	const items = body.items ?? [];
	if (!Array.isArray(items)) throw new Error("search: `items` is not an array");
	return {
		totalCount:
			typeof body.total_count === "number" ? body.total_count : null,
		incompleteResults: body.incomplete_results === true,
		items: items.filter((it): it is SearchRepoItem => isObject(it)),
	};
}

/** Whether a window that reached the page ceiling still had results left upstream. */
function reachedCapWithMore(page: SearchPage): boolean {
	if (page.totalCount != null) return page.totalCount > MAX_PAGES * PAGE_SIZE;
	return page.items.length >= PAGE_SIZE;
}

const label = (w: SearchWindow) =>
	`${formatDate(w.start)}..${formatDate(w.end)}`;

/* ─────────────────────── public API ──────────────────────── */

/**
 * Walk the search API window by window, yielding one batch per window.
 * The generator's return value says why it stopped. The running total never
 * exceeds `maxRepos`: a page is cut short as soon as the target is reached.
 */
export async function* collectRepositoriesStream(
	opts: CollectOptions,
): AsyncGenerator<WindowBatch, StopReason, void> {
	const {
		exec,
		baseQuery,
		maxRepos,
		signal,
		reporter = NoopReporter,
		url = SEARCH_REPOSITORIES_URL,
	} = opts;
	const warn = reporter.warn ?? reporter.debug;
	const now = opts.clock?.now ?? Date.now;
	const start = opts.startDate ?? defaultStart();
	const end = opts.endDate ?? new Date(now());
	const deadlineAt = opts.deadlineMs != null ? now() + opts.deadlineMs : null;

	const interrupted = (): StopReason | null => {
		if (signal?.aborted) return "aborted";
		if (deadlineAt != null && now() >= deadlineAt) return "deadline";
		return null;
	};

	let total = 0;
	for (const window of searchWindows(start, end)) {
		if (total >= maxRepos) return "target";
		const early = interrupted();
		if (early) return early;

		const query = windowQuery(baseQuery, window);
		const records: RepositoryRecord[] = [];
		let page = 1;
		let pages = 0;
		let truncated = false;
		let error: Error | undefined;
		let stopped: StopReason | null = null;

		while (total + records.length < maxRepos) {
			stopped = interrupted();
			if (stopped) break;

			reporter.debug(`Fetching page ${page} for date range ${label(window)}`);
			try {
				const body = await exec(url, {
					q: query,
					sort: "stars",
					order: "desc",
					per_page: PAGE_SIZE,
					page,
				});
				const res = parseSearchPage(body);
				if (res.incompleteResults)
					warn(
						`search: ${label(window)} page ${page} came back incomplete (search timed out upstream)`,
					);
				if (res.items.length === 0) break;
				pages++;

				for (const item of res.items) {
					records.push(projectRepository(item));
					if (total + records.length >= maxRepos) break;
				}

				page++;
				if (page > MAX_PAGES) {
					truncated = reachedCapWithMore(res);
					if (truncated) {
						warn(
							`search: ${label(window)} has more than ${
								MAX_PAGES * PAGE_SIZE
							} results (total_count=${res.totalCount ?? "?"}); the rest are skipped`,
						);
					}
					break;
				}
			} catch (err) {
				error = err instanceof Error ? err : new Error(String(err));
				warn(`Error: ${label(window)} page ${page}: ${error.message}`);
				break;
			}
		}

		total += records.length;
		reporter.debug(
			`search: ${label(window)} pages=${pages} got=${records.length} total=${total}`,
		);
		yield { window, query, records, pages, truncated, error };
		if (stopped) return stopped;
	}
	return total >= maxRepos ? "target" : "exhausted";
}

export type CollectResult = {
	records: RepositoryRecord[];
	stats: CollectStats;
};

/** Drain the stream into a single accumulator. */
export async function collectRepositories(
	opts: CollectOptions & {
		onBatch?: (batch: WindowBatch, total: number) => void | Promise<void>;
	},
): Promise<CollectResult> {
	const records: RepositoryRecord[] = [];
	const stats: CollectStats = {
		windows: 0,
		pages: 0,
		truncatedWindows: 0,
		failedWindows: 0,
		stopReason: "exhausted",
	};

	const stream = collectRepositoriesStream(opts);
	for (;;) {
		const step = await stream.next();
		if (step.done) {
			stats.stopReason = step.value;
			break;
		}
		const batch = step.value;
		records.push(...batch.records);
		stats.windows++;
		stats.pages += batch.pages;
		if (batch.truncated) stats.truncatedWindows++;
		if (batch.error) stats.failedWindows++;
		await opts.onBatch?.(batch, records.length);
	}
	return { records, stats };
}
