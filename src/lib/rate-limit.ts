// src/lib/rate-limit.ts
import { RateLimitExhaustedError } from "./errors";
import type { Clock, Reporter } from "./types";
import { NoopReporter } from "./types";

/** Throttle once fewer than this many requests remain in the window. */
export const LOW_WATER_MARK = 5;
/** Assumed quota when GitHub omits the header. */
export const DEFAULT_REMAINING = 30;
export const DEFAULT_MAX_THROTTLE_WAITS = 20;

export type RateLimitState = {
	remaining: number;
	/** Epoch seconds at which the quota resets. */
	resetEpochSeconds: number;
};

export function sleep(ms: number) {
	return new Promise<void>((r) => setTimeout(r, ms));
}

export const systemClock: Clock = { now: () => Date.now(), sleep };

function headerInt(headers: Headers, name: string, fallback: number): number {
	const n = Number.parseInt(headers.get(name) ?? "", 10);
	return Number.isFinite(n) ? n : fallback;
}

/** Read the quota headers of a single response. */
export function readRateLimit(headers: Headers): RateLimitState {
	return {
		remaining: headerInt(headers, "x-ratelimit-remaining", DEFAULT_REMAINING),
		resetEpochSeconds: headerInt(headers, "x-ratelimit-reset", 0),
	};
}

/** Milliseconds until one second past the reset, never negative. */
export function throttleDelayMs(state: RateLimitState, nowMs: number): number {
	return Math.max(0, Math.ceil(state.resetEpochSeconds * 1000 - nowMs + 1000));
}

export type RateLimitOpts = {
	clock?: Clock;
	lowWaterMark?: number;
	maxWaits?: number;
	reporter?: Reporter;
	/** Used in log lines and errors, usually the request URL. */
	label?: string;
	onThrottle?: (delayMs: number, state: RateLimitState) => void;
};

/**
 * Run `call` until a response arrives with quota above the low-water mark.
 * A throttled response is discarded; the caller only ever sees the response
 * of the attempt that was allowed through.
 */
export async function withRateLimit(
	call: () => Promise<Response>,
	opts: RateLimitOpts = {},
): Promise<Response> {
	const clock = opts.clock ?? systemClock;
	const lowWater = opts.lowWaterMark ?? LOW_WATER_MARK;
	const maxWaits = opts.maxWaits ?? DEFAULT_MAX_THROTTLE_WAITS;
	const reporter = opts.reporter ?? NoopReporter;
	const label = opts.label ?? "request";

	for (let waits = 0; ; waits++) {
		const res = await call();
		const state = readRateLimit(res.headers);
		if (state.remaining >= lowWater) return res;

		if (waits >= maxWaits) {
			await res.body?.cancel();
			throw new RateLimitExhaustedError(label, waits);
		}

		const delay = throttleDelayMs(state, clock.now());
		(reporter.warn ?? reporter.debug)(
			`Search API limit reached (remaining=${state.remaining}). Sleeping for ${(
				delay / 1000
			).toFixed(2)} seconds...`,
		);
		opts.onThrottle?.(delay, state);
		await res.body?.cancel();
		await clock.sleep(delay);
	}
}
