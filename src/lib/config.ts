// src/lib/config.ts
// Resolve collector settings from env (+ explicit overrides from the CLI).

import { ConfigError } from "./errors";
import {
	DEFAULT_API_VERSION,
	DEFAULT_TIMEOUT_MS,
	DEFAULT_USER_AGENT,
} from "./github";
import { DEFAULT_MAX_THROTTLE_WAITS } from "./rate-limit";
import {
	DEFAULT_BASE_QUERY,
	DEFAULT_MAX_REPOS,
	DEFAULT_START_DATE,
} from "./search";
import { parseDate } from "./windows";

type Env = Record<string, string | undefined>;

export type CollectorConfig = {
	token: string;
	baseQuery: string;
	maxRepos: number;
	startDate: Date;
	timeoutMs: number;
	deadlineMs?: number;
	maxThrottleWaits: number;
	exportsDir: string;
	userAgent: string;
	apiVersion: string;
	debug: boolean;
};

export type CollectorOverrides = {
	token?: string;
	baseQuery?: string;
	maxRepos?: number;
	/** YYYY-MM-DD */
	startDate?: string;
	deadlineMs?: number;
};

/** Parse a non-negative integer from env; unset or blank → fallback. */
export function getEnvInt(env: Env, name: string, fallback: number): number;
export function getEnvInt(
	env: Env,
	name: string,
	fallback?: number,
): number | undefined;
export function getEnvInt(
	env: Env,
	name: string,
	fallback?: number,
): number | undefined {
	const raw = env[name];
	if (raw == null || raw.trim() === "") return fallback;
	return checkInt(name, Number(raw));
}

function checkInt(name: string, n: number): number {
	if (!Number.isInteger(n) || n < 0)
		throw new ConfigError(`${name} must be a non-negative integer`);
	return n;
}

/** Throw if a required env var is missing. */
export function getEnvStringRequired(
	env: Env,
	name: string,
	hint?: string,
): string {
	const v = env[name]?.trim();
	if (!v) throw new ConfigError(hint ?? `${name} missing`);
	return v;
}

/**
 * Effective collector config. Fails with ConfigError (before any network call)
 * when the token is missing or a numeric/date setting does not parse.
 */
export function resolveCollectorConfig(
	env: Env = process.env,
	overrides: CollectorOverrides = {},
): CollectorConfig {
	const token =
		overrides.token?.trim() ||
		getEnvStringRequired(
			env,
			"GITHUB_TOKEN",
			"GITHUB_TOKEN missing. Add it to .env or export it before running.",
		);

	const startRaw =
		overrides.startDate ?? (env.SEARCH_START_DATE?.trim() || DEFAULT_START_DATE);
	const startDate = parseDate(startRaw);
	if (!startDate)
		throw new ConfigError(
			`SEARCH_START_DATE must be YYYY-MM-DD (got ${JSON.stringify(startRaw)})`,
		);

	const maxRepos =
		overrides.maxRepos != null
			? checkInt("--max", overrides.maxRepos)
			: getEnvInt(env, "SEARCH_MAX_REPOS", DEFAULT_MAX_REPOS);
	const deadlineMs =
		overrides.deadlineMs != null
			? checkInt("--deadline", overrides.deadlineMs)
			: getEnvInt(env, "SEARCH_DEADLINE_MS");

	return {
		token,
		baseQuery:
			overrides.baseQuery ?? (env.SEARCH_QUERY?.trim() || DEFAULT_BASE_QUERY),
		maxRepos,
		startDate,
		timeoutMs: getEnvInt(env, "SEARCH_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
		deadlineMs,
		maxThrottleWaits: getEnvInt(
			env,
			"SEARCH_MAX_THROTTLE_WAITS",
			DEFAULT_MAX_THROTTLE_WAITS,
		),
		exportsDir: env.EXPORTS_DIR?.trim() || "./exports",
		userAgent: env.GITHUB_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
		apiVersion: env.GITHUB_API_VERSION?.trim() || DEFAULT_API_VERSION,
		debug: !!env.DEBUG,
	};
}
