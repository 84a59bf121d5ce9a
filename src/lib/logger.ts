// src/lib/logger.ts

import type { ConsolaReporter, LogObject } from "consola";
import { createConsola } from "consola";
import ora, { type Ora } from "ora";
import type { Reporter } from "./types";

type Variadic = [unknown?, ...unknown[]];
type Row = Record<string, string | number | null | undefined>;

const STYLE = {
	reset: "\x1b[0m",
	bold: "\x1b[1m",
	gray: "\x1b[90m",
	cyan: "\x1b[36m",
};
const ICON: Record<string, string> = {
	info: "ℹ",
	success: "✔",
	warn: "⚠",
	error: "✖",
	debug: "·",
};

// stdout is reserved for results (`--json`), diagnostics go to stderr
const TO_STDERR = new Set(["warn", "error", "fatal"]);

export function formatLogLine(obj: Pick<LogObject, "type" | "message" | "args">) {
	const text = [obj.message, ...(obj.args ?? [])]
		.filter((v) => v !== undefined)
		.map((v) => (typeof v === "string" ? v : JSON.stringify(v)))
		.join(" ");
	return `${ICON[obj.type] ?? "•"} ${text}`;
}

const reporter: ConsolaReporter = {
	log(obj: LogObject) {
		const dest = TO_STDERR.has(obj.type) ? process.stderr : process.stdout;
		dest.write(`${formatLogLine(obj)}\n`);
	},
};

/** Left-aligned table lines: optional header + rule, then one line per row. */
export function formatColumns(
	rows: Row[],
	order: string[],
	header?: Record<string, string>,
): string[] {
	const cell = (v: unknown) => (v == null ? "" : String(v));
	const widths = order.map((k) =>
		Math.max(
			header ? cell(header[k] ?? k).length : 0,
			...rows.map((r) => cell(r[k]).length),
			1,
		),
	);
	const render = (cells: string[]) =>
		`  ${cells.map((v, i) => v.padEnd(widths[i])).join("   ")}`.trimEnd();

	const out: string[] = [];
	if (header) {
		out.push(render(order.map((k) => header[k] ?? k)));
		out.push(render(widths.map((w) => "─".repeat(w))));
	}
	for (const r of rows) out.push(render(order.map((k) => cell(r[k]))));
	return out;
}

function rule() {
	const width = Math.min(process.stdout.columns ?? 80, 100);
	return "─".repeat(Math.max(16, Math.min(width - 2, 80)));
}

export function createLogger(opts?: { debug?: boolean; spinners?: boolean }) {
	// animated spinners only on an interactive terminal
	const spinners = opts?.spinners ?? !!process.stderr.isTTY;
	// 4 = debug, 3 = info+
	const level = (opts?.debug ?? !!process.env.DEBUG) ? 4 : 3;
	const c = createConsola({ level, reporters: [reporter] });
	const write = (s: string) => process.stdout.write(`${s}\n`);
	const warn = (...args: Variadic) => c.warn(...args);
	const debug = (...args: Variadic) => c.debug(...args);

	return {
		info: (...args: Variadic) => c.info(...args),
		success: (...args: Variadic) => c.success(...args),
		warn,
		error: (...args: Variadic) => c.error(...args),
		debug,
		json: (obj: unknown) => write(JSON.stringify(obj, null, 2)),
		header: (title: string) =>
			write(
				`\n${STYLE.bold}${STYLE.cyan}${title}${STYLE.reset}\n${STYLE.gray}${rule()}${STYLE.reset}`,
			),
		subheader: (title: string) => write(`${STYLE.bold}${title}${STYLE.reset}`),
		list: (items: string[]) => {
			for (const it of items) write(`  • ${it}`);
		},
		line: (s = "") => write(s),
		columns: (rows: Row[], order: string[], header?: Record<string, string>) => {
			write("");
			for (const l of formatColumns(rows, order, header)) write(l);
			write("");
		},
		spinner: (text: string): Ora => ora({ text, isEnabled: spinners }),
		/** Narrow view handed to the collector internals. */
		reporter: (): Reporter => ({
			debug: (...args) => debug(...args),
			warn: (...args) => warn(...args),
		}),
	} as const;
}

export type Logger = ReturnType<typeof createLogger>;
