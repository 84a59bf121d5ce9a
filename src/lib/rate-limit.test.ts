import { describe, expect, it, vi } from "vitest";
import { makeFakeClock } from "../__test__/github-fakes";
import { RateLimitExhaustedError } from "./errors";
import {
	DEFAULT_REMAINING,
	readRateLimit,
	throttleDelayMs,
	withRateLimit,
} from "./rate-limit";

const reply = (headers: Record<string, string>, body = "{}") =>
	new Response(body, { status: 200, headers });

describe("readRateLimit", () => {
	it("reads remaining and reset from the headers", () => {
		const h = new Headers({
			"X-RateLimit-Remaining": "7",
			"X-RateLimit-Reset": "1700000060",
		});
		expect(readRateLimit(h)).toEqual({
			remaining: 7,
			resetEpochSeconds: 1700000060,
		});
	});

	it("treats missing or garbage headers as not near the limit", () => {
		expect(readRateLimit(new Headers())).toEqual({
			remaining: DEFAULT_REMAINING,
			resetEpochSeconds: 0,
		});
		expect(
			readRateLimit(new Headers({ "X-RateLimit-Remaining": "n/a" })).remaining,
		).toBe(DEFAULT_REMAINING);
	});
});

describe("throttleDelayMs", () => {
	it("waits until one second past the reset", () => {
		const now = 1_700_000_000_000;
		expect(
			throttleDelayMs({ remaining: 2, resetEpochSeconds: 1_700_000_010 }, now),
		).toBe(11_000);
	});

	it("never returns a negative delay", () => {
		const now = 1_700_000_000_000;
		expect(
			throttleDelayMs({ remaining: 0, resetEpochSeconds: 1_699_999_000 }, now),
		).toBe(0);
	});
});

describe("withRateLimit", () => {
	it("returns the first response when quota is above the low-water mark", async () => {
		const clock = makeFakeClock();
		const call = vi.fn(async () => reply({ "X-RateLimit-Remaining": "5" }));
		await withRateLimit(call, { clock });
		expect(call).toHaveBeenCalledTimes(1);
		expect(clock.sleeps).toEqual([]);
	});

	it("sleeps past the reset and hands back the retried response", async () => {
		const clock = makeFakeClock(1_700_000_000_000);
		const onThrottle = vi.fn();
		const responses = [
			reply(
				{ "X-RateLimit-Remaining": "2", "X-RateLimit-Reset": "1700000010" },
				'{"attempt":1}',
			),
			reply({ "X-RateLimit-Remaining": "29" }, '{"attempt":2}'),
		];
		let i = 0;
		const res = await withRateLimit(async () => responses[i++], {
			clock,
			onThrottle,
		});

		expect(clock.sleeps).toEqual([11_000]);
		expect(onThrottle).toHaveBeenCalledWith(11_000, {
			remaining: 2,
			resetEpochSeconds: 1_700_000_010,
		});
		expect(await res.json()).toEqual({ attempt: 2 });
	});

	it("gives up after maxWaits throttled attempts", async () => {
		const clock = makeFakeClock();
		const call = vi.fn(async () =>
			reply({ "X-RateLimit-Remaining": "0", "X-RateLimit-Reset": "0" }),
		);
		await expect(
			withRateLimit(call, { clock, maxWaits: 2, label: "GET /x" }),
		).rejects.toBeInstanceOf(RateLimitExhaustedError);
		expect(call).toHaveBeenCalledTimes(3);
		expect(clock.sleeps).toEqual([0, 0]);
	});

	it("logs the wait through the reporter", async () => {
		const clock = makeFakeClock(1_700_000_000_000);
		const warn = vi.fn();
		const responses = [
			reply({ "X-RateLimit-Remaining": "1", "X-RateLimit-Reset": "1700000002" }),
			reply({}),
		];
		let i = 0;
		await withRateLimit(async () => responses[i++], {
			clock,
			reporter: { debug: () => {}, warn },
		});
		expect(warn).toHaveBeenCalledWith(
			"Search API limit reached (remaining=1). Sleeping for 3.00 seconds...",
		);
	});
});
