export { createCollectService, type SearchApi } from "./service";
export type * from "./types";
