/**
 * Capacity policy for buffer-backed lists.
 *
 * Growth is geometric so that repeated appends cost amortized O(1):
 * when `size + n` reaches the current capacity, the buffer is reallocated
 * to `floor(growthFactor * (capacity + n))` slots. After a removal the
 * buffer shrinks to exactly `size` once occupancy falls to
 * `shrinkFactor * capacity`. A shrink factor of 0 disables shrinking.
 */

import { CapacityError } from '../errors.ts';

/** Largest length a JavaScript array can hold */
export const MAX_CAPACITY = 2 ** 32 - 1;

/** Default growth multiplier (grow by 100%) */
export const DEFAULT_GROWTH_FACTOR = 2.0;

/** Default shrink threshold (shrink when size is 25% of capacity) */
export const DEFAULT_SHRINK_FACTOR = 0.25;

/**
 * Capacity needed before writing `n` more elements.
 *
 * @returns The new capacity, or null when the current one suffices
 * @throws CapacityError when `size + n` exceeds MAX_CAPACITY
 */
export function planGrowth(
  size: number,
  capacity: number,
  n: number,
  growthFactor: number = DEFAULT_GROWTH_FACTOR
): number | null {
  const required = size + n;
  if (required > MAX_CAPACITY) {
    throw new CapacityError(required);
  }
  if (required < capacity) {
    return null;
  }
  const grown = Math.floor(growthFactor * (capacity + n));
  return Math.min(Math.max(grown, required), MAX_CAPACITY);
}

/**
 * Capacity to reclaim down to after a removal.
 *
 * @returns `size` when the buffer should shrink, otherwise null
 */
export function planShrink(
  size: number,
  capacity: number,
  shrinkFactor: number = DEFAULT_SHRINK_FACTOR
): number | null {
  if (shrinkFactor === 0 || size === capacity) {
    return null;
  }
  if (size <= Math.floor(capacity * shrinkFactor)) {
    return size;
  }
  return null;
}
