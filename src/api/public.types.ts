/**
 * Shared public types & utilities for library consumers.
 */

// Re-export core types from lib for public API consumers
export type { RepositoryTable } from "@lib/table";
export type {
	CollectStats,
	RepositoryRecord,
	SearchWindow,
	StopReason,
} from "@lib/types";

import { ConfigError } from "@lib/errors";

/* -------------------------------------------------------------------------- */
/*  ERROR HANDLING                                                            */
/* -------------------------------------------------------------------------- */

export {
	ConfigError,
	RateLimitExhaustedError,
	TransportError,
} from "@lib/errors";

/* -------------------------------------------------------------------------- */
/*  PROGRESS & RESULTS                                                        */
/* -------------------------------------------------------------------------- */

/**
 * Lifecycle markers for progress events.
 * `progress` is a running row count after each search window.
 */
export type ProgressStatus = "start" | "progress" | "done" | "error";

type ProgressDetailBase = { status: ProgressStatus } & Record<string, unknown>;

/**
 * Structured progress detail payload carried alongside phase/index metadata.
 * - `start`/`done` mark lifecycle boundaries.
 * - `progress` is a counter with optional label/context.
 * - `error` surfaces failures without throwing.
 */
export type ProgressDetail =
	| (ProgressDetailBase & { status: "start" | "done" })
	| (ProgressDetailBase & {
			status: "progress";
			current: number;
			total?: number;
			label?: string;
	  })
	| (ProgressDetailBase & { status: "error"; error: string });

/**
 * Progress notification emitted by long‑running operations.
 * Phases follow a `verbing:subject` convention (e.g. `fetching:window`).
 */
export interface ProgressEvent {
	phase: string;
	index?: number;
	total?: number;
	item?: string;
	detail?: ProgressDetail;
	meta?: Record<string, unknown>;
}

/** Function signature for progress emitters used across public APIs. */
export type ProgressEmitter<TPhase extends string = string> = (
	event: ProgressEvent & { phase: TPhase },
) => void | Promise<void>;

/**
 * Resolve the GitHub token from an explicit override or env.
 * Throws ConfigError when neither yields a non-blank value.
 */
export function resolveGithubToken({
	override,
	help,
	env = process.env,
}: {
	override?: string;
	help?: string;
	env?: Record<string, string | undefined>;
} = {}): string {
	const token = (override ?? env.GITHUB_TOKEN ?? "").trim();
	if (!token)
		throw new ConfigError(help ?? "GITHUB_TOKEN missing. Set env or pass override.");
	return token;
}
