export * as collect from "./api/collect.public";
// Shared public types & errors
export * from "./api/public.types";
export { createCollectService } from "./features/collect";
export { createSearchExecutor } from "./lib/github";
export { withRateLimit } from "./lib/rate-limit";
export {
	collectRepositories,
	collectRepositoriesStream,
} from "./lib/search";
export { REPOSITORY_COLUMNS, toCsv, toTable } from "./lib/table";
export { searchWindows } from "./lib/windows";
