// src/lib/types.ts

export type FetchLike = (
	input: string | URL | Request,
	init?: RequestInit,
) => Promise<Response>;

/** Basic reporter interface for debugging output */
export type Reporter = {
	debug: (...args: unknown[]) => void;
	warn?: (...args: unknown[]) => void;
};

/** No-op reporter for silent operations */
export const NoopReporter: Reporter = { debug: () => {} };

/** Wall clock + sleep, injectable so throttling can be tested without waiting. */
export type Clock = {
	/** Milliseconds since the Unix epoch. */
	now: () => number;
	sleep: (ms: number) => Promise<void>;
};

export type SearchParams = Record<string, string | number>;

/** Issues one search GET (including any rate-limit waits) and returns the parsed body. */
export type SearchExec = (url: string, params: SearchParams) => Promise<unknown>;

/* ───────────────────────── upstream shapes ───────────────────────── */

/** Repository item as returned by /search/repositories (only the fields we read). */
export type SearchRepoItem = {
	name?: unknown;
	full_name?: unknown;
	stargazers_count?: unknown;
	language?: unknown;
	created_at?: unknown;
	[key: string]: unknown;
};

export type SearchPage = {
	totalCount: number | null;
	incompleteResults: boolean;
	items: SearchRepoItem[];
};

/* ───────────────────────── collector shapes ──────────────────────── */

export type RepositoryRecord = {
	name: string | null;
	full_name: string | null;
	stargazers_count: number | null;
	language: string | null;
	created_at: string | null;
};

/** Calendar range used as a `created:` qualifier; both ends are inclusive dates. */
export type SearchWindow = { start: Date; end: Date };

export type WindowBatch = {
	window: SearchWindow;
	query: string;
	records: RepositoryRecord[];
	/** Non-empty pages fetched for this window. */
	pages: number;
	/** Hit the page-depth ceiling while upstream still reported more results. */
	truncated: boolean;
	/** Set when pagination for this window was abandoned on an error. */
	error?: Error;
};

export type StopReason = "target" | "exhausted" | "deadline" | "aborted";

export type CollectStats = {
	windows: number;
	pages: number;
	truncatedWindows: number;
	failedWindows: number;
	stopReason: StopReason;
};
