/**
 * Tests for stock comparators.
 */

import { describe, it, expect } from 'vitest';
import {
  numberComparator,
  stringComparator,
  bigintComparator,
  dateComparator,
  reverseComparator,
  compareBy,
} from './comparators.ts';

describe('Comparators', () => {
  it('should order numbers ascending', () => {
    expect([3, -1, 2].sort(numberComparator)).toEqual([-1, 2, 3]);
  });

  it('should order strings by code unit', () => {
    expect(stringComparator('a', 'b')).toBe(-1);
    expect(stringComparator('b', 'a')).toBe(1);
    expect(stringComparator('a', 'a')).toBe(0);
    expect(['b', 'B', 'a'].sort(stringComparator)).toEqual(['B', 'a', 'b']);
  });

  it('should order bigints', () => {
    expect([10n, 2n, 7n].sort(bigintComparator)).toEqual([2n, 7n, 10n]);
  });

  it('should order dates chronologically', () => {
    const early = new Date(1000);
    const late = new Date(2000);
    expect(dateComparator(early, late)).toBe(-1000);
    expect([late, early].sort(dateComparator)).toEqual([early, late]);
  });

  it('should reverse an ordering', () => {
    expect([1, 3, 2].sort(reverseComparator(numberComparator))).toEqual([3, 2, 1]);
  });

  it('should compare by a derived key', () => {
    const byLength = compareBy((value: string) => value.length, numberComparator);
    expect(['ccc', 'a', 'bb'].sort(byLength)).toEqual(['a', 'bb', 'ccc']);
  });
});
