/**
 * Strict total order over elements: negative if a < b, 0 if equal, positive if a > b.
 * Elements comparing equal are the same member of a generator.
 */
export type Comparator<E> = (a: E, b: E) => number;

/** Element types ordered without an explicit comparator */
export type NaturallyOrdered = number | string | bigint;

function ascending<T extends NaturallyOrdered>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Ascending order for numbers, strings (code unit order) and bigints.
 * Throws a TypeError for anything else, including NaN and mixed types.
 */
export function naturalOrder(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number' && !Number.isNaN(a) && !Number.isNaN(b)) {
    return ascending(a, b);
  }
  if (typeof a === 'string' && typeof b === 'string') return ascending(a, b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return ascending(a, b);
  throw new TypeError(`No natural order between ${String(a)} and ${String(b)}; pass a comparator`);
}

/**
 * First index in `sorted` whose item does not compare below `target`
 * (sorted.length if none).
 */
export function lowerBound<T, K>(
  sorted: readonly T[], target: K, compare: (item: T, target: K) => number,
): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compare(sorted[mid], target) < 0) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
