import type { RateLimitState } from "@lib/rate-limit";
import type { RepositoryTable } from "@lib/table";
import type {
	Clock,
	CollectStats,
	FetchLike,
	Reporter,
	SearchExec,
	StopReason,
	WindowBatch,
} from "@lib/types";

// Re-export types used by service
export type { RepositoryTable, StopReason, WindowBatch };

export type CollectServiceOpts = {
	/** Static GitHub token; required. */
	token: string;
	/** Provide a fetch implementation (tests). Falls back to global fetch. */
	fetchImpl?: FetchLike;
	/** Provide a search executor (tests). Overrides fetchImpl and the rate-limit settings. */
	exec?: SearchExec;
	clock?: Clock;
	reporter?: Reporter;
	startDate?: Date;
	endDate?: Date;
	timeoutMs?: number;
	deadlineMs?: number;
	maxThrottleWaits?: number;
	userAgent?: string;
	apiVersion?: string;
};

export type CollectRunOpts = {
	signal?: AbortSignal;
	onBatch?: (batch: WindowBatch, total: number) => void | Promise<void>;
	onThrottle?: (delayMs: number, state: RateLimitState) => void;
};

export type CollectServiceStats = CollectStats & { throttleWaits: number };

export type CollectServiceResult = {
	table: RepositoryTable;
	stats: CollectServiceStats;
};

export type CollectService = {
	/** Collect up to `maxRepos` repositories matching `baseQuery` (network). */
	collect: (
		baseQuery: string,
		maxRepos?: number,
		run?: CollectRunOpts,
	) => Promise<CollectServiceResult>;
	/** Stream one batch per search window (network). */
	stream: (
		baseQuery: string,
		maxRepos?: number,
		run?: Pick<CollectRunOpts, "signal">,
	) => AsyncGenerator<WindowBatch, StopReason, void>;
};
