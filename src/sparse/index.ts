export { SparseArray, SparseCursor } from "./sparse";
export {
  SparseOverlapError,
  SparseRangeError,
  type SparseError,
  type SparseOverlapReason,
} from "./errors";
export {
  blockEnd,
  isEmptyRange,
  makeRange,
  rangeLength,
  type IndexRange,
  type SparseBlock,
} from "./types";
