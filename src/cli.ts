// src/cli.ts
// CLI entry with subcommands: collect, help

import "dotenv/config";
import { pathToFileURL } from "node:url";
import { log } from "@lib/bootstrap";
import {
	hasBooleanFlag,
	parseNumericOption,
	parseStringOption,
} from "@lib/cli-utils";
import { ConfigError } from "@lib/errors";
import { runCollectCore } from "@src/api/collect";
import type { CollectCommandOpts } from "@src/api/types";

type CliDeps = {
	runCollect: typeof runCollectCore;
};

const defaultDeps: CliDeps = {
	runCollect: runCollectCore,
};

const cliDeps: CliDeps = { ...defaultDeps };

export function _setCliDeps(overrides: Partial<CliDeps>): void {
	Object.assign(cliDeps, overrides);
}

export function _resetCliDeps(): void {
	Object.assign(cliDeps, defaultDeps);
}

/* ----------------------------- Usage banner ----------------------------- */
function usage(): void {
	log.header("rh");

	log.subheader("Usage");
	log.line("  rh <command> [options]");
	log.line("");

	log.subheader("Commands");
	log.list([
		"collect               Search GitHub repositories and save them as CSV",
		"help                  Show this message",
	]);
	log.line("");

	log.subheader("Options for collect");
	log.list([
		'--query "<q>"         Base search query (default SEARCH_QUERY or "is:public stars:>=100")',
		"--max N               Stop after N repositories (default 5000)",
		"--since YYYY-MM-DD    First creation date searched (default 2014-01-01)",
		"--out <file>          Output file (.csv or .json; default EXPORTS_DIR/repositories.csv)",
		"--json                Print rows as JSON to stdout instead of writing a file",
		"--deadline MS         Stop issuing requests after MS milliseconds",
		"--preview N           Print the first N rows after writing",
	]);
	log.line("");

	log.subheader("Examples");
	log.list([
		'rh collect --query "is:public stars:>=100" --max 250',
		"rh collect --since 2020-01-01 --out exports/2020.csv",
	]);
	log.line("");

	log.subheader("Notes");
	log.list([
		"GITHUB_TOKEN is required (read from the environment or .env)",
		"Each 30-day window yields at most 1000 results; truncated windows are reported",
	]);
	log.line("");
}

/* -------------------------- Command handlers --------------------------- */

export function parseCollectArgs(args: string[]): CollectCommandOpts {
	return {
		query: parseStringOption(args, "--query"),
		max: parseNumericOption(args, "--max"),
		since: parseStringOption(args, "--since"),
		out: parseStringOption(args, "--out"),
		json: hasBooleanFlag(args, "json"),
		deadlineMs: parseNumericOption(args, "--deadline"),
		preview: parseNumericOption(args, "--preview"),
	};
}

async function handleCollect(args: string[]): Promise<void> {
	const controller = new AbortController();
	const onSigint = () => controller.abort();
	process.once("SIGINT", onSigint);
	try {
		await cliDeps.runCollect(
			parseCollectArgs(args),
			log,
			undefined,
			controller.signal,
		);
	} finally {
		process.off("SIGINT", onSigint);
	}
}

/* --------------------------------- Router -------------------------------- */

async function main(argv: string[]) {
	const args = argv.slice(2);
	const cmd = args[0] ?? "help";

	switch (cmd) {
		case "help":
		case "--help":
		case "-h":
			usage();
			return;

		case "collect":
			return handleCollect(args);

		default:
			log.error(`Unknown command: ${cmd}`);
			usage();
			process.exitCode = 1;
	}
}

const isMain =
	process.argv[1] != null &&
	import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMain) {
	main(process.argv).catch((e) => {
		log.error(
			e instanceof ConfigError
				? `Configuration error: ${e.message}`
				: e instanceof Error
					? e.message
					: String(e),
		);
		process.exit(1);
	});
}
// For tests: allow calling the router without executing as main
export { main as _testMain };
