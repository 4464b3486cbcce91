/** Half-open index range `[start, end)`. */
export interface IndexRange {
  readonly start: number;
  readonly end: number;
}

export interface SparseBlock<T> {
  readonly offset: number;
  readonly items: readonly T[];
}

export const makeRange = (start: number, end: number): IndexRange => ({ start, end });

export const rangeLength = (range: IndexRange): number => Math.max(0, range.end - range.start);

export const isEmptyRange = (range: IndexRange): boolean => range.end <= range.start;

export const blockEnd = <T>(block: SparseBlock<T>): number => block.offset + block.items.length;
