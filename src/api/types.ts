// ./api/types.ts

/* -------------------------------------------------------------------------- */
/*  SPINNER                                                                   */
/* -------------------------------------------------------------------------- */

/** Canonical spinner instance. */
export type Spinner = {
	/** Current status text (mutable by caller). */
	text: string;
	/** Mark success and freeze this spinner line. */
	succeed(msg: string): void;
	/** Mark failure (optional on some loggers; keep optional). */
	fail?(msg: string): void;
	/** Stop without marking success/fail. */
	stop(): void;
};

/** Factory returned by logger.spinner(text). */
export type SpinnerFactory = { start(): Spinner };

/* -------------------------------------------------------------------------- */
/*  LOGGER                                                                    */
/* -------------------------------------------------------------------------- */

/**
 * Canonical logger contract used by the command cores.
 * Matches `typeof realLog` where relevant, but kept structural for tests.
 */
export type LoggerLike = {
	info(...args: unknown[]): void;
	success(msg: string): void;
	warn(msg: string): void;
	error(msg: string): void;
	debug(...args: unknown[]): void;

	/* Raw JSON to stdout */
	json(v: unknown): void;
	columns?(
		rows: Array<Record<string, string | number | null | undefined>>,
		order: string[],
		headers?: Record<string, string>,
	): void;

	spinner(text: string): SpinnerFactory;
};

/* -------------------------------------------------------------------------- */
/*  COMMAND OPTIONS & RESULTS                                                 */
/* -------------------------------------------------------------------------- */

export type CollectCommandOpts = {
	query?: string;
	max?: number;
	/** YYYY-MM-DD */
	since?: string;
	/** Output file; `.json` writes JSON, anything else CSV. */
	out?: string;
	/** Print rows as JSON to stdout instead of writing a file. */
	json?: boolean;
	deadlineMs?: number;
	/** Print a preview of the first N rows. */
	preview?: number;
};

export type CollectSummary = {
	rows: number;
	file?: string;
	windows: number;
	pages: number;
	truncatedWindows: number;
	failedWindows: number;
	throttleWaits: number;
	stopReason: string;
};
