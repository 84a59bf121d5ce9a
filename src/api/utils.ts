// ./api/utils.ts

import * as fs from "node:fs";
import { dirname, extname, join } from "node:path";
import { type RepositoryTable, toCsv } from "@lib/table";

/* -----------------------------------------------------------------------------
 * FILE HELPERS
 * -------------------------------------------------------------------------- */

export function ensureDirExists(
	dir: string,
	_fs: Pick<typeof fs, "existsSync" | "mkdirSync"> = fs,
) {
	if (!_fs.existsSync(dir)) _fs.mkdirSync(dir, { recursive: true });
}

export function writeJsonFile(
	filePath: string,
	data: unknown,
	_fs: Pick<typeof fs, "writeFileSync"> = fs,
) {
	_fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}

/** Default export path: `<exportsDir>/repositories.csv` */
export function defaultOutputFile(exportsDir: string): string {
	return join(exportsDir, "repositories.csv");
}

/** Write the table as CSV, or as a JSON array when the file ends in `.json`. */
export function writeTableFile(
	filePath: string,
	table: RepositoryTable,
	_fs: Pick<typeof fs, "existsSync" | "mkdirSync" | "writeFileSync"> = fs,
): void {
	ensureDirExists(dirname(filePath), _fs);
	if (extname(filePath).toLowerCase() === ".json") {
		writeJsonFile(filePath, table.rows, _fs);
		return;
	}
	_fs.writeFileSync(filePath, toCsv(table));
}

/* -----------------------------------------------------------------------------
 * UX HELPERS
 * -------------------------------------------------------------------------- */

export function plural(n: number, word: string, many = `${word}s`): string {
	return `${n} ${n === 1 ? word : many}`;
}
