import { describe, it, expect } from 'vitest';
import { naturalOrder, lowerBound } from '../../src/core/comparator.js';

describe('naturalOrder', () => {
  it('orders numbers ascending', () => {
    expect(naturalOrder(1, 2)).toBe(-1);
    expect(naturalOrder(2, 1)).toBe(1);
    expect(naturalOrder(-0, 0)).toBe(0);
  });

  it('orders strings by code unit', () => {
    expect(naturalOrder('a', 'b')).toBe(-1);
    expect(naturalOrder('B', 'a')).toBe(-1);
    expect(naturalOrder('same', 'same')).toBe(0);
  });

  it('orders bigints ascending', () => {
    expect(naturalOrder(10n, 9n)).toBe(1);
  });

  it('rejects mixed types', () => {
    expect(() => naturalOrder(1, '1')).toThrow(TypeError);
  });

  it('rejects NaN', () => {
    expect(() => naturalOrder(NaN, 1)).toThrow(TypeError);
  });

  it('rejects objects', () => {
    expect(() => naturalOrder({}, {})).toThrow('pass a comparator');
  });
});

describe('lowerBound', () => {
  const sorted = [1, 3, 3, 5];
  const cmp = (item: number, target: number) => item - target;

  it('finds the first match', () => {
    expect(lowerBound(sorted, 3, cmp)).toBe(1);
  });

  it('finds the insertion point for a missing value', () => {
    expect(lowerBound(sorted, 4, cmp)).toBe(3);
  });

  it('returns 0 below the smallest item', () => {
    expect(lowerBound(sorted, 0, cmp)).toBe(0);
  });

  it('returns length above the largest item', () => {
    expect(lowerBound(sorted, 9, cmp)).toBe(4);
  });

  it('returns 0 for an empty array', () => {
    expect(lowerBound([], 1, cmp)).toBe(0);
  });
});
