/**
 * Tests for the growth and shrink policy.
 */

import { describe, it, expect } from 'vitest';
import { planGrowth, planShrink, MAX_CAPACITY } from './capacity.ts';
import { CapacityError } from '../errors.ts';

describe('planGrowth', () => {
  it('should size an empty buffer to twice the incoming count', () => {
    expect(planGrowth(0, 0, 3)).toBe(6);
  });

  it('should return null while the incoming elements fit below capacity', () => {
    expect(planGrowth(3, 6, 2)).toBeNull();
  });

  it('should grow when the write would reach capacity exactly', () => {
    expect(planGrowth(5, 6, 1)).toBe(14);
  });

  it('should apply a custom growth factor', () => {
    expect(planGrowth(0, 0, 1, 1.5)).toBe(1);
    expect(planGrowth(1, 1, 1, 1.5)).toBe(3);
    expect(planGrowth(2, 2, 1, 1)).toBe(3);
  });

  it('should clamp to the maximum capacity', () => {
    expect(planGrowth(3e9, 3e9, 1)).toBe(MAX_CAPACITY);
  });

  it('should throw CapacityError when the request exceeds the maximum', () => {
    expect(() => planGrowth(MAX_CAPACITY, MAX_CAPACITY, 1)).toThrow(CapacityError);
    try {
      planGrowth(MAX_CAPACITY, MAX_CAPACITY, 1);
    } catch (error) {
      expect(error).toBeInstanceOf(RangeError);
      expect(error).toHaveProperty('requested', MAX_CAPACITY + 1);
    }
  });
});

describe('planShrink', () => {
  it('should shrink to size once occupancy reaches a quarter of capacity', () => {
    expect(planShrink(1, 6)).toBe(1);
    expect(planShrink(3, 14)).toBe(3);
  });

  it('should keep capacity above the threshold', () => {
    expect(planShrink(2, 6)).toBeNull();
    expect(planShrink(4, 14)).toBeNull();
  });

  it('should never shrink with a factor of 0', () => {
    expect(planShrink(0, 100, 0)).toBeNull();
  });

  it('should skip a buffer that is already exactly full', () => {
    expect(planShrink(0, 0)).toBeNull();
  });

  it('should release everything when the last element goes', () => {
    expect(planShrink(0, 1)).toBe(0);
  });
});
