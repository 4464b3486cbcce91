import type { IndexRange } from "../sparse";

export interface PrefetchOptions {
  /** Share of the view length loaded on each side of it (default: 0.5) */
  readonly extraLoadRatio?: number;
  /** Ranges to treat as populated while scanning, typically requests still in flight */
  readonly exclude?: readonly IndexRange[];
}
