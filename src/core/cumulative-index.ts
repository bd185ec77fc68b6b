import { lowerBound } from './comparator.js';
import type { WeightedEntry } from './weighted-store.js';

/** Inclusive sub-range of [1, total] owned by one element. Empty when upper < lower. */
export interface CumulativeRange<E> {
  readonly element: E;
  readonly lower: number;
  readonly upper: number;
}

/** A drawn value could not be matched to a range. Indicates a bug, not bad input. */
export class IndexInvariantError extends Error {
  constructor(readonly value: number, readonly total: number) {
    super(`No range contains ${value} (total weight ${total})`);
    this.name = 'IndexInvariantError';
  }
}

/**
 * Cumulative ranges laid out in entry order. Rebuilt from scratch on every
 * `rebuild()`; nothing is carried over from the previous layout.
 */
export class CumulativeIndex<E> {
  private ranges_: CumulativeRange<E>[] = [];
  private total_ = 0;

  /** Total weight covered by the current layout (0 = empty index) */
  get total(): number {
    return this.total_;
  }

  get isEmpty(): boolean {
    return this.total_ === 0;
  }

  rebuild(entries: Iterable<WeightedEntry<E>>): void {
    const ranges: CumulativeRange<E>[] = [];
    let upper = 0;
    for (const { element, weight } of entries) {
      const lower = upper + 1;
      upper += weight;
      ranges.push({ element, lower, upper });
    }
    this.ranges_ = ranges;
    this.total_ = upper;
  }

  reset(): void {
    this.ranges_ = [];
    this.total_ = 0;
  }

  /** Element whose range contains `value`, for value in [1, total]. */
  resolve(value: number): E {
    if (!(value >= 1 && value <= this.total_)) {
      throw new IndexInvariantError(value, this.total_);
    }
    // First range whose upper bound reaches value; zero-weight ranges share
    // the previous upper bound and are never first.
    const i = lowerBound(this.ranges_, value, (range, v) => range.upper - v);
    const range = this.ranges_[i];
    if (range === undefined || value < range.lower) {
      throw new IndexInvariantError(value, this.total_);
    }
    return range.element;
  }

  ranges(): readonly CumulativeRange<E>[] {
    return this.ranges_.slice();
  }
}
