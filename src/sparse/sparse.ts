import { Option } from "effect";
import { invariant } from "../internal/invariant";
import { SparseOverlapError, SparseRangeError } from "./errors";
import { blockEnd, type IndexRange, type SparseBlock } from "./types";

// First block whose offset is >= `start`.
const lowerBoundByOffset = <T>(blocks: readonly SparseBlock<T>[], start: number): number => {
  let low = 0;
  let high = blocks.length;
  while (low < high) {
    const mid = low + ((high - low) >> 1);
    if (blocks[mid]!.offset < start) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
};

// First block that still covers something at or after `position`.
const firstBlockEndingAfter = <T>(blocks: readonly SparseBlock<T>[], position: number): number => {
  let low = 0;
  let high = blocks.length;
  while (low < high) {
    const mid = low + ((high - low) >> 1);
    if (blockEnd(blocks[mid]!) <= position) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
};

const toRange = <T>(block: SparseBlock<T>): IndexRange => ({
  start: block.offset,
  end: blockEnd(block),
});

/**
 * Lazy, gap-aware walk over a window of a {@link SparseArray}. Yields exactly
 * `end - start` values: `Option.some` for populated indices, `Option.none`
 * for gaps.
 */
export class SparseCursor<T> implements IterableIterator<Option.Option<T>> {
  private position: number;
  private blockIndex: number;

  constructor(
    private readonly blocks: readonly SparseBlock<T>[],
    start: number,
    private readonly end: number,
  ) {
    this.position = start;
    this.blockIndex = firstBlockEndingAfter(blocks, start);
  }

  /** Absolute index of the value the next call to `next` produces. */
  get index(): number {
    return this.position;
  }

  get remaining(): number {
    return Math.max(0, this.end - this.position);
  }

  next(): IteratorResult<Option.Option<T>, undefined> {
    if (this.position >= this.end) {
      return { done: true, value: undefined };
    }

    let block = this.blocks[this.blockIndex];
    while (block !== undefined && blockEnd(block) <= this.position) {
      this.blockIndex += 1;
      block = this.blocks[this.blockIndex];
    }

    const position = this.position;
    this.position += 1;

    if (block === undefined || position < block.offset) {
      return { done: false, value: Option.none() };
    }
    return { done: false, value: Option.some(block.items[position - block.offset]!) };
  }

  [Symbol.iterator](): SparseCursor<T> {
    return this;
  }
}

/**
 * Fixed-length sequence where only some contiguous runs are populated.
 *
 * Blocks are kept ordered by offset and never overlap. Touching blocks stay
 * separate; nothing is merged, split or removed once inserted.
 */
export class SparseArray<T> implements Iterable<Option.Option<T>> {
  private readonly entries: SparseBlock<T>[] = [];
  private populated = 0;

  private constructor(readonly length: number) {}

  static withLength<T>(length: number): SparseArray<T> {
    invariant(
      Number.isSafeInteger(length) && length >= 0,
      `Sparse array length must be a non-negative safe integer, received ${String(length)}`,
    );
    return new SparseArray<T>(length);
  }

  static from<T>(items: readonly T[]): SparseArray<T> {
    const array = new SparseArray<T>(items.length);
    if (items.length > 0) {
      array.entries.push({ offset: 0, items: [...items] });
      array.populated = items.length;
    }
    return array;
  }

  get populatedCount(): number {
    return this.populated;
  }

  /**
   * Adds `items` as a new block starting at `start`.
   *
   * @throws SparseOverlapError when the block leaves `[0, length)` or
   * intersects an existing block.
   */
  insert(start: number, items: readonly T[]): void {
    const conflict = this.findInsertConflict(start, items.length);
    if (conflict !== undefined) {
      throw conflict;
    }
    if (items.length === 0) {
      return;
    }

    const position = lowerBoundByOffset(this.entries, start);
    this.entries.splice(position, 0, { offset: start, items: [...items] });
    this.populated += items.length;
  }

  /** The error `insert(start, items)` would throw for a block of `size` items, if any. */
  findInsertConflict(start: number, size: number): SparseOverlapError | undefined {
    invariant(Number.isInteger(start), `Insert offset must be an integer, received ${String(start)}`);

    if (start < 0 || start + size > this.length) {
      return new SparseOverlapError(start, size, "out-of-bounds");
    }
    if (size === 0) {
      return undefined;
    }

    const position = lowerBoundByOffset(this.entries, start);
    const previous = this.entries[position - 1];
    if (previous !== undefined && blockEnd(previous) > start) {
      return new SparseOverlapError(start, size, "overlap", toRange(previous));
    }
    const following = this.entries[position];
    if (following !== undefined && following.offset < start + size) {
      return new SparseOverlapError(start, size, "overlap", toRange(following));
    }
    return undefined;
  }

  get(index: number): Option.Option<T> {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      return Option.none();
    }
    const block = this.entries[firstBlockEndingAfter(this.entries, index)];
    if (block === undefined || index < block.offset) {
      return Option.none();
    }
    return Option.some(block.items[index - block.offset]!);
  }

  has(index: number): boolean {
    return Option.isSome(this.get(index));
  }

  iter(): SparseCursor<T> {
    return new SparseCursor(this.entries, 0, this.length);
  }

  iterRange(range: IndexRange): SparseCursor<T> {
    const { start, end } = range;
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      start > end ||
      end > this.length
    ) {
      throw new SparseRangeError(start, end, this.length);
    }
    return new SparseCursor(this.entries, start, end);
  }

  blocks(): readonly SparseBlock<T>[] {
    return this.entries.slice();
  }

  loadedRanges(): readonly IndexRange[] {
    return this.entries.map(toRange);
  }

  [Symbol.iterator](): SparseCursor<T> {
    return this.iter();
  }
}
