import { naturalOrder } from './comparator.js';
import type { Comparator } from './comparator.js';
import { CumulativeIndex } from './cumulative-index.js';
import type { CumulativeRange } from './cumulative-index.js';
import { SelectionEngine } from './selection-engine.js';
import { WeightedStore } from './weighted-store.js';
import type { WeightedEntry } from './weighted-store.js';

export interface GeneratorOptions<E> {
  /** Element order. Defaults to natural order, which only handles numbers, strings and bigints. */
  compare?: Comparator<E>;
}

/**
 * Options may be left out only when every element is one natural type
 * (all numbers, all strings or all bigints). Anything else, mixed unions
 * included, must bring a comparator.
 */
export type GeneratorOptionArgs<E> =
  [E] extends [number] ? [options?: GeneratorOptions<E>]
  : [E] extends [string] ? [options?: GeneratorOptions<E>]
  : [E] extends [bigint] ? [options?: GeneratorOptions<E>]
  : [options: Required<GeneratorOptions<E>>];

function comparatorOf<E>(args: readonly [options?: GeneratorOptions<E>]): Comparator<E> {
  return args[0]?.compare ?? naturalOrder;
}

/**
 * Container of unique weighted elements that draws element `e` with
 * probability weight(e) / totalWeight.
 *
 * Mutations (insert, erase, modify, clear) only touch the store and leave the
 * range index stale. `refresh()` rebuilds the index and re-bounds the random
 * engine; draws refresh a stale index on their own, so a batch of mutations
 * costs one rebuild at the next draw.
 *
 * Elements with weight 0 are members but are never drawn.
 */
export class WeightedRandomGenerator<E> implements Iterable<WeightedEntry<E>> {
  private readonly store: WeightedStore<E>;
  private readonly index = new CumulativeIndex<E>();
  private readonly engine: SelectionEngine;
  private readonly options: GeneratorOptionArgs<E>;
  /** Store version the index was built from. -1 = never built. */
  private indexedVersion = -1;

  constructor(seed: number, ...options: GeneratorOptionArgs<E>) {
    this.options = options;
    this.store = new WeightedStore<E>(comparatorOf<E>(options));
    this.engine = new SelectionEngine(seed);
  }

  /** Reseed the random engine. The index is left alone. */
  seed(seed: number): void {
    this.engine.seed(seed);
  }

  /** Rebuild the cumulative ranges from the current entries. */
  refresh(): void {
    if (this.store.totalWeight === 0) {
      this.index.reset();
    } else {
      this.index.rebuild(this.store.entries());
    }
    this.engine.setBound(this.index.total);
    this.indexedVersion = this.store.version;
  }

  /** True when entries changed since the last refresh */
  get isStale(): boolean {
    return this.indexedVersion !== this.store.version;
  }

  insert(element: E, weight: number): boolean {
    return this.store.insert(element, weight);
  }

  erase(element: E): number | undefined {
    return this.store.erase(element);
  }

  modify(element: E, weight: number): number | undefined {
    return this.store.modify(element, weight);
  }

  clear(): void {
    this.store.clear();
  }

  contains(element: E): boolean {
    return this.store.contains(element);
  }

  get size(): number {
    return this.store.size;
  }

  empty(): boolean {
    return this.store.empty();
  }

  get totalWeight(): number {
    return this.store.totalWeight;
  }

  weight(element: E): number | undefined {
    return this.store.weight(element);
  }

  probability(element: E): number | undefined {
    return this.store.probability(element);
  }

  /** A random element, or undefined when the total weight is 0. */
  draw(): E | undefined {
    this.ensureFresh();
    return this.engine.draw(this.index);
  }

  /** `count` independent draws with replacement. Empty when the total weight is 0. */
  sample(count: number): E[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Sample count must be a non-negative integer, got ${count}`);
    }
    this.ensureFresh();
    if (this.engine.bound === 0) return [];

    const out = new Array<E>(count);
    for (let i = 0; i < count; i++) {
      out[i] = this.engine.pick(this.index);
    }
    return out;
  }

  /** Ranges of the last refresh, in element order */
  ranges(): readonly CumulativeRange<E>[] {
    return this.index.ranges();
  }

  entries(): IterableIterator<WeightedEntry<E>> {
    return this.store.entries();
  }

  elements(): IterableIterator<E> {
    return this.store.elements();
  }

  [Symbol.iterator](): IterableIterator<WeightedEntry<E>> {
    return this.store.entries();
  }

  /**
   * Copy entries and total weight into a new generator with its own engine.
   * Random state is not shared, and the copy's index starts stale.
   */
  clone(seed: number): WeightedRandomGenerator<E> {
    const copy = new WeightedRandomGenerator<E>(seed, ...this.options);
    for (const { element, weight } of this.store.entries()) {
      copy.store.insert(element, weight);
    }
    return copy;
  }

  private ensureFresh(): void {
    if (this.isStale) this.refresh();
  }
}
