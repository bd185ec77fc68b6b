import { lowerBound } from './comparator.js';
import type { Comparator } from './comparator.js';

/** Largest weight, and largest total weight, a store can hold (unsigned 32-bit) */
export const MAX_WEIGHT = 0xFFFF_FFFF;

export interface WeightedEntry<E> {
  readonly element: E;
  readonly weight: number;
}

/** Thrown for a weight that is not an integer in [0, MAX_WEIGHT] */
export class InvalidWeightError extends RangeError {
  constructor(readonly weight: number) {
    super(`Weight must be an integer in [0, ${MAX_WEIGHT}], got ${weight}`);
    this.name = 'InvalidWeightError';
  }
}

/** Thrown when a mutation would push the total weight past MAX_WEIGHT */
export class WeightOverflowError extends RangeError {
  constructor(readonly currentTotal: number, readonly requestedTotal: number) {
    super(`Total weight ${requestedTotal} would exceed ${MAX_WEIGHT} (current total ${currentTotal})`);
    this.name = 'WeightOverflowError';
  }
}

export function isValidWeight(weight: number): boolean {
  return Number.isInteger(weight) && weight >= 0 && weight <= MAX_WEIGHT;
}

function assertWeight(weight: number): void {
  if (!isValidWeight(weight)) throw new InvalidWeightError(weight);
}

interface MutableEntry<E> {
  element: E;
  weight: number;
}

/**
 * Set of unique elements with unsigned integer weights, kept sorted by the
 * element comparator. Every mutation bumps `version` so derived structures
 * can tell when they are out of date.
 */
export class WeightedStore<E> {
  private items: MutableEntry<E>[] = [];
  private total = 0;
  private revision = 0;
  readonly compare: Comparator<E>;

  constructor(compare: Comparator<E>) {
    this.compare = compare;
  }

  /** Incremented on every state change */
  get version(): number {
    return this.revision;
  }

  get size(): number {
    return this.items.length;
  }

  get totalWeight(): number {
    return this.total;
  }

  empty(): boolean {
    return this.items.length === 0;
  }

  contains(element: E): boolean {
    return this.indexOf(element) >= 0;
  }

  weight(element: E): number | undefined {
    const i = this.indexOf(element);
    return i >= 0 ? this.items[i].weight : undefined;
  }

  /** weight / totalWeight, or undefined if absent or the total is 0 */
  probability(element: E): number | undefined {
    const w = this.weight(element);
    if (w === undefined || this.total === 0) return undefined;
    return w / this.total;
  }

  /**
   * Add a new element. Returns false (no change) if it is already present.
   * Throws whatever the comparator throws for an element it cannot order,
   * even into an empty store.
   */
  insert(element: E, weight: number): boolean {
    assertWeight(weight);
    this.compare(element, element);
    const at = this.searchFrom(element);
    if (at < this.items.length && this.compare(this.items[at].element, element) === 0) {
      return false;
    }
    const newTotal = this.total + weight;
    if (newTotal > MAX_WEIGHT) throw new WeightOverflowError(this.total, newTotal);

    this.items.splice(at, 0, { element, weight });
    this.total = newTotal;
    this.revision++;
    return true;
  }

  /** Remove an element. Returns its weight, or undefined if absent. */
  erase(element: E): number | undefined {
    const i = this.indexOf(element);
    if (i < 0) return undefined;
    const [removed] = this.items.splice(i, 1);
    this.total -= removed.weight;
    this.revision++;
    return removed.weight;
  }

  /** Replace an element's weight. Returns the previous weight, or undefined if absent. */
  modify(element: E, weight: number): number | undefined {
    assertWeight(weight);
    const i = this.indexOf(element);
    if (i < 0) return undefined;
    const entry = this.items[i];
    const prev = entry.weight;
    const newTotal = this.total - prev + weight;
    if (newTotal > MAX_WEIGHT) throw new WeightOverflowError(this.total, newTotal);

    entry.weight = weight;
    this.total = newTotal;
    this.revision++;
    return prev;
  }

  clear(): void {
    this.items = [];
    this.total = 0;
    this.revision++;
  }

  /** Entries in ascending element order */
  *entries(): IterableIterator<WeightedEntry<E>> {
    for (const { element, weight } of this.items) {
      yield { element, weight };
    }
  }

  *elements(): IterableIterator<E> {
    for (const entry of this.items) yield entry.element;
  }

  [Symbol.iterator](): IterableIterator<WeightedEntry<E>> {
    return this.entries();
  }

  private searchFrom(element: E): number {
    return lowerBound(this.items, element, (entry, target) => this.compare(entry.element, target));
  }

  private indexOf(element: E): number {
    const i = this.searchFrom(element);
    if (i < this.items.length && this.compare(this.items[i].element, element) === 0) return i;
    return -1;
  }
}
