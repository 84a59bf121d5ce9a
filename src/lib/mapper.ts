// src/lib/mapper.ts
import type { RepositoryRecord, SearchRepoItem } from "./types";

const str = (v: unknown): string | null => (typeof v === "string" ? v : null);
const num = (v: unknown): number | null =>
	typeof v === "number" && Number.isFinite(v) ? v : null;

/** Project a search item onto the five columns we keep. Values pass through untouched. */
export function projectRepository(item: SearchRepoItem): RepositoryRecord {
	return {
		name: str(item.name),
		full_name: str(item.full_name),
		stargazers_count: num(item.stargazers_count),
		language: str(item.language),
		created_at: str(item.created_at),
	};
}
