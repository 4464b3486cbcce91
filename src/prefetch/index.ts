export { isValidView, nextRequestForView, shouldLoadRange } from "./planner";
export type { PrefetchOptions } from "./types";
