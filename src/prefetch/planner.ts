import { Option } from "effect";
import { defaultConfig } from "../config";
import { invariant } from "../internal/invariant";
import {
  isEmptyRange,
  rangeLength,
  SparseRangeError,
  type IndexRange,
  type SparseArray,
} from "../sparse";
import type { PrefetchOptions } from "./types";

export const isValidView = (view: IndexRange, length: number): boolean =>
  Number.isInteger(view.start) &&
  Number.isInteger(view.end) &&
  view.start >= 0 &&
  view.start <= view.end &&
  view.end <= length;

const sortExcluded = (exclude: readonly IndexRange[] | undefined): readonly IndexRange[] =>
  (exclude ?? [])
    .filter((range) => !isEmptyRange(range))
    .sort((left, right) => left.start - right.start);

const longerOf = (longest: IndexRange | undefined, run: IndexRange): IndexRange =>
  longest === undefined || rangeLength(longest) < rangeLength(run) ? run : longest;

/**
 * The view widened by `extraLoadRatio` of its length on both sides, clamped
 * to `[0, length)`.
 */
export const shouldLoadRange = (
  view: IndexRange,
  length: number,
  options: PrefetchOptions = {},
): IndexRange => {
  const ratio = options.extraLoadRatio ?? defaultConfig.prefetch.extraLoadRatio;
  invariant(
    Number.isFinite(ratio) && ratio >= 0,
    `extraLoadRatio must be a finite number >= 0, received ${String(ratio)}`,
  );
  const extra = Math.floor(rangeLength(view) * ratio);
  return {
    start: Math.max(0, view.start - extra),
    end: Math.min(length, view.end + extra),
  };
};

/**
 * Picks the next range to fetch for `view`: the longest run of missing
 * indices inside the should-load window. Equal runs resolve to the earliest
 * one. Returns `none` for an empty view or when the window is fully
 * populated.
 *
 * Call it whenever the view changes or a previous request has completed.
 * Requests still in flight are not known here unless passed as `exclude`.
 */
export const nextRequestForView = <T>(
  container: SparseArray<T>,
  view: IndexRange,
  options: PrefetchOptions = {},
): Option.Option<IndexRange> => {
  if (isEmptyRange(view)) {
    return Option.none();
  }
  if (!isValidView(view, container.length)) {
    throw new SparseRangeError(view.start, view.end, container.length);
  }

  const window = shouldLoadRange(view, container.length, options);
  const excluded = sortExcluded(options.exclude);
  let excludedIndex = 0;

  let longest: IndexRange | undefined;
  let runStart: number | undefined;
  let index = window.start;

  for (const item of container.iterRange(window)) {
    while (excludedIndex < excluded.length && excluded[excludedIndex]!.end <= index) {
      excludedIndex += 1;
    }
    const pending = excluded[excludedIndex];
    const missing = Option.isNone(item) && (pending === undefined || pending.start > index);

    if (missing) {
      if (runStart === undefined) {
        runStart = index;
      }
    } else if (runStart !== undefined) {
      longest = longerOf(longest, { start: runStart, end: index });
      runStart = undefined;
    }
    index += 1;
  }

  if (runStart !== undefined) {
    longest = longerOf(longest, { start: runStart, end: window.end });
  }

  return Option.fromNullable(longest);
};
