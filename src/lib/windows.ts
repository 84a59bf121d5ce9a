// src/lib/windows.ts
import type { SearchWindow } from "./types";

const DAY_MS = 86_400_000;

/** Width of each search window; keeps a single query under the 1000-result cap. */
export const WINDOW_DAYS = 30;

export function addDays(d: Date, days: number): Date {
	return new Date(d.getTime() + days * DAY_MS);
}

/** YYYY-MM-DD in UTC */
export function formatDate(d: Date): string {
	return d.toISOString().slice(0, 10);
}

/** Strict YYYY-MM-DD parser (UTC midnight); null for anything else, including 2023-02-30. */
export function parseDate(s: string): Date | null {
	if (!/^\d{4}-\d{2}-\d{2}$/.test(s)) return null;
	const d = new Date(`${s}T00:00:00Z`);
	if (Number.isNaN(d.getTime()) || formatDate(d) !== s) return null;
	return d;
}

/**
 * Contiguous windows covering [start, end] in ascending order.
 * Each window spans `widthDays` days; the last one is clipped to `end`.
 * The next window starts the day after the previous one ends.
 */
export function* searchWindows(
	start: Date,
	end: Date,
	widthDays = WINDOW_DAYS,
): Generator<SearchWindow, void, void> {
	let cursor = start;
	while (cursor.getTime() < end.getTime()) {
		const next = addDays(cursor, widthDays);
		const windowEnd = next.getTime() > end.getTime() ? end : next;
		yield { start: cursor, end: windowEnd };
		cursor = addDays(windowEnd, 1);
	}
}

export function createdQualifier(w: SearchWindow): string {
	return `created:${formatDate(w.start)}..${formatDate(w.end)}`;
}

export function windowQuery(baseQuery: string, w: SearchWindow): string {
	return `${baseQuery.trim()} ${createdQualifier(w)}`.trim();
}
