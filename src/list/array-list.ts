/**
 * Buffer-backed list implementation for Stride.
 * Factory function that creates an ArrayList with encapsulated state.
 */

import type { ArrayList, Comparator, Lookup } from '../types/list.ts';
import type { ArrayListConfig } from '../types/config.ts';
import { resolveListConfig, validateListConfig } from '../types/config.ts';
import { GrowableBuffer } from './core/growable-buffer.ts';
import { planGrowth, planShrink } from './core/capacity.ts';
import { ListConfigError } from './errors.ts';
import {
  createListEventEmitter,
  createResizeEvent,
  type ResizeReason,
} from './events.ts';

const NOT_FOUND: Lookup<never> = Object.freeze({ found: false as const, value: undefined });

/**
 * Factory function to create an ArrayList.
 * Encapsulates the buffer and logical size; nothing outside the returned
 * object can alias the backing storage.
 *
 * @param initialValues - Initial elements, in order
 * @param config - Optional capacity policy and equality
 * @throws ListConfigError when the configuration is invalid
 */
export function createArrayList<T>(
  initialValues: Iterable<T> = [],
  config: Partial<ArrayListConfig<T>> = {}
): ArrayList<T> {
  const validation = validateListConfig(config);
  if (!validation.valid) {
    throw new ListConfigError(validation.errors);
  }
  const { growthFactor, shrinkFactor, initialCapacity, equals } =
    resolveListConfig(config);

  let buffer = GrowableBuffer.empty<T>(initialCapacity);
  let size = 0;
  const emitter = createListEventEmitter();

  function withinRange(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < size;
  }

  function reallocate(capacity: number, reason: ResizeReason): void {
    const previousCapacity = buffer.capacity;
    buffer.resize(capacity, size);
    if (emitter.hasListeners('resize')) {
      emitter.emit(
        'resize',
        createResizeEvent(reason, previousCapacity, capacity, size)
      );
    }
  }

  /**
   * Grow before writing `n` more elements.
   */
  function growBy(n: number): void {
    const capacity = planGrowth(size, buffer.capacity, n, growthFactor);
    if (capacity !== null && capacity !== buffer.capacity) {
      reallocate(capacity, 'grow');
    }
  }

  function shrink(): void {
    const capacity = planShrink(size, buffer.capacity, shrinkFactor);
    if (capacity !== null) {
      reallocate(capacity, 'shrink');
    }
  }

  function append(items: readonly T[]): void {
    if (items.length === 0) {
      return;
    }
    growBy(items.length);
    for (const item of items) {
      buffer.write(size, item);
      size++;
    }
  }

  function add(...items: T[]): void {
    append(items);
  }

  function get(index: number): Lookup<T> {
    if (!withinRange(index)) {
      return NOT_FOUND;
    }
    return { found: true, value: buffer.read(index) };
  }

  function remove(index: number): void {
    if (!withinRange(index)) {
      return;
    }
    buffer.shiftLeft(index, size);
    size--;
    buffer.release(size);
    shrink();
  }

  function indexOf(value: T): number {
    for (let i = 0; i < size; i++) {
      if (equals(buffer.read(i), value)) {
        return i;
      }
    }
    return -1;
  }

  function contains(...items: T[]): boolean {
    return items.every((item) => indexOf(item) !== -1);
  }

  function values(): T[] {
    return buffer.snapshot(size);
  }

  function clear(): void {
    const previousCapacity = buffer.capacity;
    buffer = GrowableBuffer.empty<T>();
    size = 0;
    if (previousCapacity !== 0 && emitter.hasListeners('resize')) {
      emitter.emit('resize', createResizeEvent('clear', previousCapacity, 0, 0));
    }
  }

  function sort(comparator: Comparator<T>): void {
    if (size < 2) {
      return;
    }
    buffer.sortPrefix(size, comparator);
  }

  function swap(i: number, j: number): void {
    if (!withinRange(i) || !withinRange(j)) {
      return;
    }
    const first = buffer.read(i);
    buffer.write(i, buffer.read(j));
    buffer.write(j, first);
  }

  function insert(index: number, ...items: T[]): void {
    if (!withinRange(index)) {
      if (index === size) {
        append(items);
      }
      return;
    }
    const count = items.length;
    if (count === 0) {
      return;
    }
    growBy(count);
    buffer.shiftRight(index, size, count);
    for (let k = 0; k < count; k++) {
      buffer.write(index + k, items[k]);
    }
    size += count;
  }

  function set(index: number, value: T): void {
    if (!withinRange(index)) {
      if (index === size) {
        append([value]);
      }
      return;
    }
    buffer.write(index, value);
  }

  function forEach(callback: (value: T, index: number) => void): void {
    for (let i = 0; i < size; i++) {
      callback(buffer.read(i), i);
    }
  }

  function* iterate(): IterableIterator<T> {
    for (let i = 0; i < size; i++) {
      yield buffer.read(i);
    }
  }

  function toString(): string {
    const rendered: string[] = [];
    for (let i = 0; i < size; i++) {
      rendered.push(renderElement(buffer.read(i)));
    }
    return `ArrayList\n${rendered.join(', ')}`;
  }

  const list: ArrayList<T> = {
    add,
    get,
    remove,
    contains,
    values,
    indexOf,
    isEmpty: () => size === 0,
    size: () => size,
    capacity: () => buffer.capacity,
    clear,
    sort,
    swap,
    insert,
    set,
    forEach,
    toString,
    [Symbol.iterator]: iterate,
    addEventListener: emitter.addEventListener,
    removeEventListener: emitter.removeEventListener,
  };

  append(Array.from(initialValues));
  return list;
}

/**
 * Diagnostic form of one element.
 * Objects with no primitive conversion (null prototype) fall back to their
 * `[object Tag]` form.
 */
function renderElement(value: unknown): string {
  try {
    return String(value);
  } catch (error) {
    if (error instanceof TypeError) {
      return Object.prototype.toString.call(value);
    }
    throw error;
  }
}

/**
 * Create an ArrayList holding `values`, in order, with the default policy.
 */
export function arrayListOf<T>(...values: T[]): ArrayList<T> {
  return createArrayList(values);
}

/**
 * Type guard to check if a value is an ArrayList.
 */
export function isArrayList(value: unknown): value is ArrayList<unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'get' in value && typeof value.get === 'function' &&
    'insert' in value && typeof value.insert === 'function' &&
    'capacity' in value && typeof value.capacity === 'function' &&
    Symbol.iterator in value
  );
}
