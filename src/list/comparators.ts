/**
 * Stock comparators for `List.sort`.
 */

import type { Comparator } from '../types/list.ts';

export const numberComparator: Comparator<number> = (a, b) => a - b;

/**
 * UTF-16 code-unit order, the same order as the default `Array.prototype.sort`.
 */
export const stringComparator: Comparator<string> = (a, b) =>
  a < b ? -1 : a > b ? 1 : 0;

export const bigintComparator: Comparator<bigint> = (a, b) =>
  a < b ? -1 : a > b ? 1 : 0;

export const dateComparator: Comparator<Date> = (a, b) =>
  a.getTime() - b.getTime();

/**
 * Invert the order of `comparator`.
 */
export function reverseComparator<T>(comparator: Comparator<T>): Comparator<T> {
  return (a, b) => comparator(b, a);
}

/**
 * Order elements by a derived key.
 *
 * @example
 * ```typescript
 * list.sort(compareBy((user) => user.age, numberComparator));
 * ```
 */
export function compareBy<T, K>(
  key: (value: T) => K,
  comparator: Comparator<K>
): Comparator<T> {
  return (a, b) => comparator(key(a), key(b));
}
