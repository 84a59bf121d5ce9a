// src/__test__/helpers/log.ts
import type { LoggerLike, Spinner } from "@src/api/types";

export type Captured = {
	info: string[];
	success: string[];
	warn: string[];
	error: string[];
	json: unknown[];
	spinnerStarts: string[];
	spinnerSucceeds: string[];
	spinnerFails: string[];
	spinnerTexts: string[];
	columns: unknown[][];
};

/** Logger that records every call instead of writing to the terminal. */
export function makeCaptureLog(): { log: LoggerLike; captured: Captured } {
	const captured: Captured = {
		info: [],
		success: [],
		warn: [],
		error: [],
		json: [],
		spinnerStarts: [],
		spinnerSucceeds: [],
		spinnerFails: [],
		spinnerTexts: [],
		columns: [],
	};

	const log: LoggerLike = {
		info: (...args) => {
			captured.info.push(args.map(String).join(" "));
		},
		success: (msg) => {
			captured.success.push(msg);
		},
		warn: (msg) => {
			captured.warn.push(msg);
		},
		error: (msg) => {
			captured.error.push(msg);
		},
		debug: () => {},
		json: (v) => {
			captured.json.push(v);
		},
		columns: (rows) => {
			captured.columns.push(rows);
		},
		spinner(text: string) {
			return {
				start(): Spinner {
					captured.spinnerStarts.push(text);
					let current = text;
					return {
						get text() {
							return current;
						},
						set text(v: string) {
							current = v;
							captured.spinnerTexts.push(v);
						},
						succeed: (m: string) => {
							captured.spinnerSucceeds.push(m);
						},
						fail: (m: string) => {
							captured.spinnerFails.push(m);
						},
						stop: () => {},
					};
				},
			};
		},
	};
	return { log, captured };
}
