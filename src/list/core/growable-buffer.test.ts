/**
 * Tests for the resizable slot storage.
 */

import { describe, it, expect } from 'vitest';
import { GrowableBuffer } from './growable-buffer.ts';
import { CapacityError } from '../errors.ts';
import { numberComparator } from '../comparators.ts';

function filled(capacity: number, values: number[]): GrowableBuffer<number> {
  const buffer = GrowableBuffer.empty<number>(capacity);
  values.forEach((value, index) => buffer.write(index, value));
  return buffer;
}

describe('GrowableBuffer', () => {
  describe('empty', () => {
    it('should default to zero capacity', () => {
      expect(GrowableBuffer.empty().capacity).toBe(0);
    });

    it('should allocate the requested capacity', () => {
      expect(GrowableBuffer.empty(4).capacity).toBe(4);
    });

    it('should surface an impossible allocation as CapacityError', () => {
      expect(() => GrowableBuffer.empty(2 ** 32)).toThrow(CapacityError);
    });
  });

  describe('read/write', () => {
    it('should store values by slot', () => {
      const buffer = filled(3, [7, 8, 9]);
      expect(buffer.read(0)).toBe(7);
      expect(buffer.read(2)).toBe(9);
    });

    it('should drop a released slot', () => {
      const buffer = filled(2, [7, 8]);
      buffer.release(1);
      expect(buffer.read(1)).toBeUndefined();
      expect(buffer.capacity).toBe(2);
    });
  });

  describe('shifting', () => {
    it('should open a gap with shiftRight', () => {
      const buffer = filled(5, [1, 2, 3]);
      buffer.shiftRight(1, 3, 2);
      buffer.write(1, 10);
      buffer.write(2, 20);
      expect(buffer.snapshot(5)).toEqual([1, 10, 20, 2, 3]);
    });

    it('should close a gap with shiftLeft', () => {
      const buffer = filled(5, [1, 10, 20, 2, 3]);
      buffer.shiftLeft(0, 5);
      expect(buffer.snapshot(4)).toEqual([10, 20, 2, 3]);
    });
  });

  describe('resize', () => {
    it('should keep the occupied prefix when growing', () => {
      const buffer = filled(2, [1, 2]);
      buffer.resize(6, 2);
      expect(buffer.capacity).toBe(6);
      expect(buffer.snapshot(2)).toEqual([1, 2]);
    });

    it('should truncate to the new capacity when shrinking', () => {
      const buffer = filled(4, [1, 2, 3, 4]);
      buffer.resize(2, 4);
      expect(buffer.capacity).toBe(2);
      expect(buffer.snapshot(2)).toEqual([1, 2]);
    });
  });

  describe('snapshot', () => {
    it('should return an independent copy', () => {
      const buffer = filled(3, [1, 2, 3]);
      const copy = buffer.snapshot(3);
      copy[0] = 99;
      expect(buffer.read(0)).toBe(1);
    });
  });

  describe('sortPrefix', () => {
    it('should sort only the occupied prefix', () => {
      const buffer = filled(6, [3, 1, 2]);
      buffer.sortPrefix(3, numberComparator);
      expect(buffer.snapshot(3)).toEqual([1, 2, 3]);
      expect(buffer.capacity).toBe(6);
    });

    it('should order undefined by the comparator, keeping ties stable', () => {
      const buffer = GrowableBuffer.empty<string | undefined>(4);
      ['b', undefined, 'a', undefined].forEach((value, index) => buffer.write(index, value));
      buffer.sortPrefix(4, (a, b) => (a === undefined ? 0 : 1) - (b === undefined ? 0 : 1));
      expect(buffer.snapshot(4)).toEqual([undefined, undefined, 'b', 'a']);
    });

    it('should sort a full buffer in place', () => {
      const buffer = filled(3, [3, 1, 2]);
      buffer.sortPrefix(3, numberComparator);
      expect(buffer.snapshot(3)).toEqual([1, 2, 3]);
    });
  });
});
