import type { Effect, Option, Stream } from "effect";
import type { SparseViewConfig } from "../config";
import type { IndexRange, SparseArray, SparseOverlapError, SparseRangeError } from "../sparse";

export type FetchRange<T, E> = (range: IndexRange) => Effect.Effect<readonly T[], E, never>;

export interface WindowSnapshot {
  readonly revision: number;
  readonly length: number;
  readonly populated: number;
  readonly loaded: readonly IndexRange[];
  readonly pending: readonly IndexRange[];
}

export class WindowFetchError extends Error {
  readonly _tag = "WindowFetchError" as const;

  constructor(
    readonly range: IndexRange,
    readonly received: number,
  ) {
    super(
      `Fetch for [${String(range.start)}, ${String(range.end)}) returned ${String(received)} items, more than the range holds`,
    );
    this.name = "WindowFetchError";
  }
}

export type WindowLoaderFailure = WindowFetchError | SparseOverlapError | SparseRangeError;

export type WindowLoaderError<E> = E | WindowLoaderFailure;

export interface MakeWindowLoaderOptions<T, E> {
  readonly container: SparseArray<T>;
  readonly fetch: FetchRange<T, E>;
  readonly config?: SparseViewConfig;
}

export interface WindowLoader<T, E> {
  readonly container: SparseArray<T>;
  /** Plans, fetches and inserts one range; `none` when the view needs nothing more. */
  readonly request: (
    view: IndexRange,
  ) => Effect.Effect<Option.Option<IndexRange>, WindowLoaderError<E>, never>;
  /** Repeats `request` until the view is covered or the per-fill request limit is hit. */
  readonly fill: (view: IndexRange) => Effect.Effect<readonly IndexRange[], WindowLoaderError<E>, never>;
  readonly pending: Effect.Effect<readonly IndexRange[], never, never>;
  readonly snapshot: Effect.Effect<WindowSnapshot, never, never>;
  readonly snapshots: Stream.Stream<WindowSnapshot>;
}
