/**
 * Resizable slot storage that encapsulates the mutation invariant
 * for a list's backing array.
 *
 * Slots in [0, length) hold elements; slots beyond are holes and are never
 * read. The buffer does not track the logical length itself: every method
 * that needs it takes it from the owner.
 */

import { CapacityError } from '../errors.ts';
import type { Comparator } from '../../types/list.ts';

export class GrowableBuffer<T> {
  /** Backing storage (length is the capacity) */
  private slots: T[];

  constructor(capacity: number) {
    this.slots = allocate<T>(capacity);
  }

  /**
   * Create an empty GrowableBuffer with the given initial capacity.
   */
  static empty<T>(capacity: number = 0): GrowableBuffer<T> {
    return new GrowableBuffer<T>(capacity);
  }

  /**
   * Number of slots, occupied or not.
   */
  get capacity(): number {
    return this.slots.length;
  }

  read(index: number): T {
    return this.slots[index];
  }

  write(index: number, value: T): void {
    this.slots[index] = value;
  }

  /**
   * Drop the reference held at `index`.
   */
  release(index: number): void {
    delete this.slots[index];
  }

  /**
   * Reallocate to `capacity` slots, keeping [0, length).
   * `length` is clamped to the new capacity.
   */
  resize(capacity: number, length: number): void {
    const next = allocate<T>(capacity);
    const kept = Math.min(length, capacity);
    for (let i = 0; i < kept; i++) {
      next[i] = this.slots[i];
    }
    this.slots = next;
  }

  /**
   * Move [from, length) right by `count` slots.
   * The caller guarantees `length + count <= capacity`.
   */
  shiftRight(from: number, length: number, count: number): void {
    this.slots.copyWithin(from + count, from, length);
  }

  /**
   * Move [from + 1, length) left by one slot, overwriting `from`.
   * Slot `length - 1` keeps a stale copy until released.
   */
  shiftLeft(from: number, length: number): void {
    this.slots.copyWithin(from, from + 1, length);
  }

  /**
   * Fresh array holding [0, length).
   */
  snapshot(length: number): T[] {
    return this.slots.slice(0, length);
  }

  /**
   * Stable in-place sort of [0, length).
   * Sorts positions rather than elements: `Array.prototype.sort` moves
   * `undefined` to the end without consulting the comparator.
   */
  sortPrefix(length: number, comparator: Comparator<T>): void {
    const slots = this.slots;
    const order = Array.from({ length }, (_, i) => i);
    order.sort((a, b) => comparator(slots[a], slots[b]));
    const sorted = order.map((i) => slots[i]);
    for (let i = 0; i < length; i++) {
      slots[i] = sorted[i];
    }
  }
}

/**
 * Allocate a holey array of `capacity` slots, surfacing an engine
 * allocation failure as CapacityError.
 */
function allocate<T>(capacity: number): T[] {
  try {
    return new Array<T>(capacity);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new CapacityError(capacity, error);
    }
    throw error;
  }
}
