/**
 * Sequence container interfaces for Stride.
 * `Container` is the capability every collection shares; `List` adds ordered,
 * index-addressable access; `ArrayList` is the buffer-backed implementation.
 */

import type { ListEventMap, EventHandler, Unsubscribe } from '../list/events.ts';

// =============================================================================
// Element Capabilities
// =============================================================================

/**
 * Total-order comparator used by `sort`.
 * Returns a negative number when `a < b`, zero when equal, positive when `a > b`.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Equality used by `contains` and `indexOf`.
 */
export type Equality<T> = (a: T, b: T) => boolean;

// =============================================================================
// Lookup Result
// =============================================================================

/**
 * Result of reading an index.
 * Discriminated on `found` so that a stored `undefined` is distinguishable
 * from an out-of-range read.
 */
export type Lookup<T> =
  | { readonly found: true; readonly value: T }
  | { readonly found: false; readonly value: undefined };

// =============================================================================
// Container Interfaces
// =============================================================================

/**
 * Capabilities shared by every container.
 */
export interface Container<T> {
  /** True when the container holds no elements */
  isEmpty(): boolean;
  /** Number of elements held */
  size(): number;
  /** Remove every element */
  clear(): void;
  /** Fresh array copy of the elements, in order */
  values(): T[];
  /** Diagnostic rendering, not a serialization format */
  toString(): string;
}

/**
 * Ordered, index-addressable sequence.
 * Out-of-range writes are silent no-ops; out-of-range reads report
 * `{ found: false }`.
 */
export interface List<T> extends Container<T>, Iterable<T> {
  /**
   * Read the element at `index`.
   * @returns `{ found: true, value }`, or `{ found: false }` when out of range
   */
  get(index: number): Lookup<T>;

  /**
   * Remove the element at `index`, closing the gap.
   * Does nothing when `index` is out of range.
   */
  remove(index: number): void;

  /**
   * Append values at the end, preserving argument order.
   */
  add(...values: T[]): void;

  /**
   * True when every value is present. Vacuously true with no arguments.
   * @complexity O(n * m) for m query values
   */
  contains(...values: T[]): boolean;

  /**
   * Sort in place with a caller-supplied total order.
   */
  sort(comparator: Comparator<T>): void;

  /**
   * Exchange the elements at `i` and `j`.
   * Does nothing unless both indices are in range.
   */
  swap(i: number, j: number): void;

  /**
   * Insert values at `index`, shifting the element there (and everything
   * after it) to the right. `index === size()` appends; any other
   * out-of-range index does nothing.
   */
  insert(index: number, ...values: T[]): void;

  /**
   * Overwrite the element at `index`. `index === size()` appends; any other
   * out-of-range index does nothing.
   */
  set(index: number, value: T): void;

  /**
   * Index of the first element equal to `value`, or -1.
   */
  indexOf(value: T): number;
}

/**
 * List backed by a contiguous, resizable buffer.
 *
 * Not safe for concurrent mutation: callers sharing a list across workers
 * must lock externally. Iterating while mutating reads live state.
 */
export interface ArrayList<T> extends List<T> {
  /** Physical buffer capacity (always `>= size()`) */
  capacity(): number;

  /** Visit each element with its index, in order */
  forEach(callback: (value: T, index: number) => void): void;

  /**
   * Observe buffer reallocations.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof ListEventMap>(
    type: K,
    handler: EventHandler<ListEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof ListEventMap>(
    type: K,
    handler: EventHandler<ListEventMap[K]>
  ): void;
}
