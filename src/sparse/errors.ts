import type { IndexRange } from "./types";

export type SparseOverlapReason = "overlap" | "out-of-bounds";

export class SparseOverlapError extends Error {
  readonly _tag = "SparseOverlapError" as const;

  constructor(
    readonly start: number,
    readonly size: number,
    readonly reason: SparseOverlapReason,
    readonly conflict?: IndexRange,
  ) {
    super(
      reason === "overlap" && conflict !== undefined
        ? `Inserted block [${String(start)}, ${String(start + size)}) overlaps existing block [${String(conflict.start)}, ${String(conflict.end)})`
        : `Inserted block [${String(start)}, ${String(start + size)}) exceeds the container bounds`,
    );
    this.name = "SparseOverlapError";
  }
}

export class SparseRangeError extends Error {
  readonly _tag = "SparseRangeError" as const;

  constructor(
    readonly start: number,
    readonly end: number,
    readonly length: number,
  ) {
    super(
      `Range [${String(start)}, ${String(end)}) is not valid for a container of length ${String(length)}`,
    );
    this.name = "SparseRangeError";
  }
}

export type SparseError = SparseOverlapError | SparseRangeError;
