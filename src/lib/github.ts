import { TransportError } from "./errors";
import { type RateLimitState, systemClock, withRateLimit } from "./rate-limit";
import type {
	Clock,
	FetchLike,
	Reporter,
	SearchExec,
	SearchParams,
} from "./types";
import { NoopReporter } from "./types";

// src/lib/github.ts
export const GITHUB_API = "https://api.github.com";
export const SEARCH_REPOSITORIES_URL = `${GITHUB_API}/search/repositories`;
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_USER_AGENT = "repo-harvest/0.1";
export const DEFAULT_API_VERSION = "2022-11-28";

export function ghHeaders(
	token: string,
	opts: { userAgent?: string; apiVersion?: string } = {},
): Record<string, string> {
	return {
		Accept: "application/vnd.github+json",
		Authorization: `Bearer ${token}`,
		"User-Agent": opts.userAgent ?? DEFAULT_USER_AGENT,
		"X-GitHub-Api-Version": opts.apiVersion ?? DEFAULT_API_VERSION,
	};
}

/** Append params to `url` in insertion order. */
export function buildUrl(url: string, params: SearchParams = {}): string {
	const u = new URL(url);
	for (const [k, v] of Object.entries(params)) u.searchParams.set(k, String(v));
	return u.toString();
}

function failMessage(err: unknown, signal: AbortSignal, timeoutMs: number) {
	if (signal.aborted) return `timed out after ${timeoutMs}ms`;
	return err instanceof Error ? err.message : String(err);
}

/** One GET bound to `signal`. Network failures surface as TransportError. */
async function fetchOnce(
	doFetch: FetchLike,
	url: string,
	headers: Record<string, string>,
	signal: AbortSignal,
	timeoutMs: number,
	reporter: Reporter,
): Promise<Response> {
	try {
		reporter.debug(`[rest] GET ${url} timeout=${timeoutMs}ms`);
		return await doFetch(url, { method: "GET", headers, signal });
	} catch (err) {
		const msg = failMessage(err, signal, timeoutMs);
		(reporter.warn ?? reporter.debug)(`Error making request to ${url}: ${msg}`);
		throw new TransportError(`GET ${url} failed: ${msg}`, url, undefined, {
			cause: err,
		});
	}
}

/** Read the body of the accepted response while its timer is still armed. */
async function readBody(
	res: Response,
	url: string,
	signal: AbortSignal,
	timeoutMs: number,
	reporter: Reporter,
): Promise<unknown> {
	const warn = reporter.warn ?? reporter.debug;
	if (!res.ok) {
		const txt = await res.text().catch(() => "");
		warn(`Error making request to ${url}: HTTP ${res.status}`);
		throw new TransportError(
			`GET ${url} -> ${res.status} ${txt}`.trim(),
			url,
			res.status,
		);
	}

	try {
		const body: unknown = await res.json();
		return body;
	} catch (err) {
		if (!signal.aborted)
			throw new TransportError(`GET ${url}: invalid JSON body`, url, res.status, {
				cause: err,
			});
		const msg = failMessage(err, signal, timeoutMs);
		warn(`Error making request to ${url}: ${msg}`);
		throw new TransportError(`GET ${url} failed: ${msg}`, url, res.status, {
			cause: err,
		});
	}
}

export type SearchExecutorOpts = {
	token: string;
	fetchImpl?: FetchLike;
	clock?: Clock;
	timeoutMs?: number;
	maxThrottleWaits?: number;
	userAgent?: string;
	apiVersion?: string;
	reporter?: Reporter;
	onThrottle?: (delayMs: number, state: RateLimitState) => void;
};

/**
 * Build the request executor used by the collector: attaches the token,
 * waits out the rate limit, and returns the parsed JSON body of a 2xx response.
 */
export function createSearchExecutor(opts: SearchExecutorOpts): SearchExec {
	const doFetch = opts.fetchImpl ?? fetch;
	const clock = opts.clock ?? systemClock;
	const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
	const reporter = opts.reporter ?? NoopReporter;
	const headers = ghHeaders(opts.token, opts);

	return async function execute(url, params) {
		const target = buildUrl(url, params);
		// each attempt gets its own timer; the accepted one runs until the body is read
		let controller = new AbortController();
		let timer: ReturnType<typeof setTimeout> | undefined;
		const attempt = () => {
			clearTimeout(timer);
			const current = new AbortController();
			controller = current;
			timer = setTimeout(() => current.abort(), timeoutMs);
			return fetchOnce(
				doFetch,
				target,
				headers,
				current.signal,
				timeoutMs,
				reporter,
			);
		};

		try {
			const res = await withRateLimit(attempt, {
				clock,
				maxWaits: opts.maxThrottleWaits,
				reporter,
				label: target,
				onThrottle: (delayMs, state) => {
					clearTimeout(timer);
					opts.onThrottle?.(delayMs, state);
				},
			});
			return await readBody(
				res,
				target,
				controller.signal,
				timeoutMs,
				reporter,
			);
		} finally {
			clearTimeout(timer);
		}
	};
}
