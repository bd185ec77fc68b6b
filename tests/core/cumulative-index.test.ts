import { describe, it, expect } from 'vitest';
import { CumulativeIndex, IndexInvariantError } from '../../src/core/cumulative-index.js';
import type { WeightedEntry } from '../../src/core/weighted-store.js';

function entries(pairs: Array<[string, number]>): WeightedEntry<string>[] {
  return pairs.map(([element, weight]) => ({ element, weight }));
}

describe('CumulativeIndex', () => {
  it('starts empty', () => {
    const index = new CumulativeIndex<string>();
    expect(index.isEmpty).toBe(true);
    expect(index.total).toBe(0);
    expect(index.ranges()).toEqual([]);
  });

  it('lays ranges out contiguously from 1', () => {
    const index = new CumulativeIndex<string>();
    index.rebuild(entries([['a', 1], ['b', 2], ['c', 3]]));
    expect(index.total).toBe(6);
    expect(index.ranges()).toEqual([
      { element: 'a', lower: 1, upper: 1 },
      { element: 'b', lower: 2, upper: 3 },
      { element: 'c', lower: 4, upper: 6 },
    ]);
  });

  it('gives zero-weight entries an empty range', () => {
    const index = new CumulativeIndex<string>();
    index.rebuild(entries([['a', 1], ['z', 0], ['b', 3]]));
    expect(index.ranges()[1]).toEqual({ element: 'z', lower: 2, upper: 1 });
  });

  it('resolves every value in [1, total] to its range', () => {
    const index = new CumulativeIndex<string>();
    index.rebuild(entries([['a', 1], ['b', 2], ['c', 3]]));
    const resolved = [1, 2, 3, 4, 5, 6].map(v => index.resolve(v));
    expect(resolved).toEqual(['a', 'b', 'b', 'c', 'c', 'c']);
  });

  it('never resolves to a zero-weight entry', () => {
    const index = new CumulativeIndex<string>();
    index.rebuild(entries([['z0', 0], ['a', 2], ['z1', 0], ['z2', 0], ['b', 1], ['z3', 0]]));
    const resolved = [1, 2, 3].map(v => index.resolve(v));
    expect(resolved).toEqual(['a', 'a', 'b']);
  });

  it('partitions [1, total] exactly', () => {
    const index = new CumulativeIndex<number>();
    const weights = [5, 0, 1, 7, 0, 0, 3, 2];
    index.rebuild(weights.map((weight, element) => ({ element, weight })));

    const covered: number[] = [];
    for (const r of index.ranges()) {
      for (let v = r.lower; v <= r.upper; v++) covered.push(v);
    }
    const total = weights.reduce((s, w) => s + w, 0);
    expect(covered).toEqual(Array.from({ length: total }, (_, i) => i + 1));
  });

  it('rebuilding from the same entries gives an identical layout', () => {
    const index = new CumulativeIndex<string>();
    const src = entries([['a', 4], ['b', 1]]);
    index.rebuild(src);
    const first = index.ranges();
    index.rebuild(src);
    expect(index.ranges()).toEqual(first);
  });

  it('recomputes later bounds after an earlier entry changes', () => {
    const index = new CumulativeIndex<string>();
    index.rebuild(entries([['a', 10], ['b', 2]]));
    index.rebuild(entries([['b', 2]]));
    expect(index.ranges()).toEqual([{ element: 'b', lower: 1, upper: 2 }]);
    expect(index.resolve(2)).toBe('b');
  });

  it.each([0, 7, 1.5, NaN])('throws IndexInvariantError for %s', (value) => {
    const index = new CumulativeIndex<string>();
    index.rebuild(entries([['a', 1], ['b', 2], ['c', 3]]));
    expect(() => index.resolve(value)).toThrow(IndexInvariantError);
  });

  it('reset empties the layout', () => {
    const index = new CumulativeIndex<string>();
    index.rebuild(entries([['a', 1]]));
    index.reset();
    expect(index.isEmpty).toBe(true);
    expect(() => index.resolve(1)).toThrow(IndexInvariantError);
  });

  it('ranges() returns a copy', () => {
    const index = new CumulativeIndex<string>();
    index.rebuild(entries([['a', 1]]));
    const copy = index.ranges();
    index.rebuild(entries([['b', 1]]));
    expect(copy[0].element).toBe('a');
  });
});
