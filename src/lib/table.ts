// src/lib/table.ts
import type { RepositoryRecord } from "./types";

export const REPOSITORY_COLUMNS = [
	"name",
	"full_name",
	"stargazers_count",
	"language",
	"created_at",
] as const satisfies readonly (keyof RepositoryRecord)[];

export type RepositoryColumn = (typeof REPOSITORY_COLUMNS)[number];

export type RepositoryTable = {
	columns: readonly RepositoryColumn[];
	rows: RepositoryRecord[];
};

/** Rows keep insertion order and carry exactly the five columns. */
export function toTable(records: RepositoryRecord[]): RepositoryTable {
	return {
		columns: REPOSITORY_COLUMNS,
		rows: records.map((r) => ({
			name: r.name,
			full_name: r.full_name,
			stargazers_count: r.stargazers_count,
			language: r.language,
			created_at: r.created_at,
		})),
	};
}

export function csvField(v: string | number | null): string {
	if (v == null) return "";
	const s = String(v);
	return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** Header row plus one line per record, `\n` terminated, no index column. */
export function toCsv(table: RepositoryTable): string {
	const lines = [table.columns.join(",")];
	for (const row of table.rows) {
		lines.push(table.columns.map((c) => csvField(row[c])).join(","));
	}
	return `${lines.join("\n")}\n`;
}
