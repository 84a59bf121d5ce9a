// src/__test__/github-fakes.ts
import type { Clock, FetchLike, SearchParams } from "@lib/types";

export type FakeReply = {
	status?: number;
	body?: unknown;
	headers?: Record<string, string>;
};

export type FakeCall = { url: URL; headers: Headers };

/** Fake fetch answering every GET through `handler`; records each call. */
export function makeFakeFetch(
	handler: (url: URL, call: number) => FakeReply | Promise<FakeReply>,
): { fetchImpl: FetchLike; calls: FakeCall[] } {
	const calls: FakeCall[] = [];
	const fetchImpl: FetchLike = async (input, init) => {
		const url = new URL(input instanceof Request ? input.url : String(input));
		calls.push({ url, headers: new Headers(init?.headers) });
		const r = await handler(url, calls.length);
		return new Response(JSON.stringify(r.body ?? {}), {
			status: r.status ?? 200,
			headers: { "Content-Type": "application/json", ...r.headers },
		});
	};
	return { fetchImpl, calls };
}

export type FakeItem = {
	name: string;
	full_name: string;
	stargazers_count: number;
	language: string;
	created_at: string;
	description: string;
	forks: number;
};

const LANGUAGES = ["TypeScript", "Go", "Rust"];

/** `n` search items with strictly descending star counts starting at `topStars`. */
export function makeItems(
	n: number,
	opts: { prefix?: string; topStars?: number; created?: string } = {},
): FakeItem[] {
	const prefix = opts.prefix ?? "repo";
	const top = opts.topStars ?? 10_000;
	return Array.from({ length: n }, (_, i) => ({
		name: `${prefix}-${i}`,
		full_name: `owner/${prefix}-${i}`,
		stargazers_count: top - i,
		language: LANGUAGES[i % LANGUAGES.length],
		created_at: opts.created ?? "2024-01-05T12:00:00Z",
		description: "not projected",
		forks: i,
	}));
}

/** Clock whose sleep advances time instantly and records the requested delays. */
export function makeFakeClock(startMs = 1_700_000_000_000): Clock & {
	sleeps: number[];
	advance: (ms: number) => void;
} {
	let t = startMs;
	const sleeps: number[] = [];
	return {
		sleeps,
		now: () => t,
		sleep: async (ms: number) => {
			sleeps.push(ms);
			t += ms;
		},
		advance: (ms: number) => {
			t += ms;
		},
	};
}

/** Pull the `created:A..B` qualifier and page out of a search call. */
export function describeSearch(params: SearchParams): {
	range: string;
	page: number;
} {
	const q = String(params.q);
	const m = /created:(\S+)/.exec(q);
	return { range: m ? m[1] : "", page: Number(params.page) };
}
