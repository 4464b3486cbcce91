export { makeWindowLoader } from "./service";
export { useSparseWindow, type UseSparseWindowOptions, type UseSparseWindowResult } from "./react";
export {
  WindowFetchError,
  type FetchRange,
  type MakeWindowLoaderOptions,
  type WindowLoader,
  type WindowLoaderError,
  type WindowLoaderFailure,
  type WindowSnapshot,
} from "./types";
