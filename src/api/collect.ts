// ./api/collect.ts

import { createCollectService } from "@features/collect";
import { type CollectorConfig, resolveCollectorConfig } from "@lib/config";
import { ConfigError } from "@lib/errors";
import { formatDate } from "@lib/windows";
import type { CollectCommandOpts, CollectSummary, LoggerLike } from "./types";
import { defaultOutputFile, plural, writeTableFile } from "./utils";

/* ----------------------------- Types & DI seams ----------------------------- */

type CollectDeps = {
	createCollectService: typeof createCollectService;
	resolveConfig: typeof resolveCollectorConfig;
	writeTableFile: typeof writeTableFile;
	env: Record<string, string | undefined>;
};

const defaultDeps: CollectDeps = {
	createCollectService,
	resolveConfig: resolveCollectorConfig,
	writeTableFile,
	env: process.env,
};

/* -------------------------------- helpers -------------------------------- */

function describeConfig(cfg: CollectorConfig): string {
	const deadline = cfg.deadlineMs != null ? ` deadline=${cfg.deadlineMs}ms` : "";
	return `query=${JSON.stringify(cfg.baseQuery)} max=${cfg.maxRepos} since=${formatDate(
		cfg.startDate,
	)}${deadline}`;
}

/* ----------------------------- collect command ----------------------------- */

/**
 * Resolve config, walk the search API and hand the finished table to the sink
 * (a CSV/JSON file, or stdout with `json`). ConfigError propagates before any
 * request is made.
 */
export async function runCollectCore(
	opts: CollectCommandOpts,
	logger: LoggerLike,
	deps: CollectDeps = defaultDeps,
	signal?: AbortSignal,
): Promise<CollectSummary> {
	const cfg = deps.resolveConfig(deps.env, {
		baseQuery: opts.query,
		maxRepos: opts.max,
		startDate: opts.since,
		deadlineMs: opts.deadlineMs,
	});
	if (
		opts.preview != null &&
		(!Number.isInteger(opts.preview) || opts.preview < 0)
	)
		throw new ConfigError("--preview must be a non-negative integer");
	logger.debug(`collect: ${describeConfig(cfg)}`);

	const service = deps.createCollectService({
		token: cfg.token,
		startDate: cfg.startDate,
		timeoutMs: cfg.timeoutMs,
		deadlineMs: cfg.deadlineMs,
		maxThrottleWaits: cfg.maxThrottleWaits,
		userAgent: cfg.userAgent,
		apiVersion: cfg.apiVersion,
		reporter: {
			debug: (...a) => logger.debug(...a),
			warn: (...a) => logger.warn(a.map(String).join(" ")),
		},
	});

	const s = logger
		.spinner(`Collecting repositories for query: ${cfg.baseQuery}`)
		.start();
	let result: Awaited<ReturnType<typeof service.collect>>;
	try {
		result = await service.collect(cfg.baseQuery, cfg.maxRepos, {
			signal,
			onBatch: (b, total) => {
				s.text = `${formatDate(b.window.start)}..${formatDate(
					b.window.end,
				)}: +${b.records.length} (total ${total}/${cfg.maxRepos})`;
			},
			onThrottle: (ms) => {
				s.text = `Rate limited; waiting ${Math.ceil(ms / 1000)}s`;
			},
		});
		s.succeed(
			`Collected data for ${plural(result.table.rows.length, "repository", "repositories")}`,
		);
	} catch (e) {
		s.fail?.("Collection failed");
		throw e;
	}

	const { table, stats } = result;
	if (stats.truncatedWindows > 0)
		logger.warn(
			`${plural(stats.truncatedWindows, "window")} exceeded the 1000-result search cap; their excess results were not collected`,
		);
	if (stats.failedWindows > 0)
		logger.warn(`${plural(stats.failedWindows, "window")} abandoned after errors`);
	if (stats.stopReason === "deadline" || stats.stopReason === "aborted")
		logger.warn(`Stopped early (${stats.stopReason}); keeping rows collected so far`);

	const summary: CollectSummary = {
		rows: table.rows.length,
		windows: stats.windows,
		pages: stats.pages,
		truncatedWindows: stats.truncatedWindows,
		failedWindows: stats.failedWindows,
		throttleWaits: stats.throttleWaits,
		stopReason: stats.stopReason,
	};

	if (opts.json && !opts.out) {
		logger.json(table.rows);
		return summary;
	}

	const file = opts.out ?? defaultOutputFile(cfg.exportsDir);
	deps.writeTableFile(file, table);
	logger.success(`Wrote ${plural(table.rows.length, "row")} → ${file}`);

	if (opts.preview && opts.preview > 0 && logger.columns) {
		logger.columns(
			table.rows.slice(0, opts.preview),
			["full_name", "stargazers_count", "language", "created_at"],
			{
				full_name: "Repository",
				stargazers_count: "Stars",
				language: "Language",
				created_at: "Created",
			},
		);
	}
	return { ...summary, file };
}
