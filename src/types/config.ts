/**
 * Per-instance configuration for Stride lists.
 */

import type { Equality } from './list.ts';
import {
  DEFAULT_GROWTH_FACTOR,
  DEFAULT_SHRINK_FACTOR,
  MAX_CAPACITY,
} from '../list/core/capacity.ts';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration accepted by `createArrayList`.
 */
export interface ArrayListConfig<T> {
  /** Capacity multiplier applied on growth (default: 2.0, must be >= 1) */
  growthFactor: number;
  /** Occupancy fraction that triggers a shrink after removal (default: 0.25, 0 disables) */
  shrinkFactor: number;
  /** Capacity of an empty list before the first add (default: 0) */
  initialCapacity: number;
  /** Equality used by contains/indexOf (default: strict equality) */
  equals: Equality<T>;
}

/**
 * Strict equality, matching `===`.
 */
export function strictEquals<T>(a: T, b: T): boolean {
  return a === b;
}

/**
 * Fill in defaults for every option the caller left out.
 */
export function resolveListConfig<T>(
  config: Partial<ArrayListConfig<T>> = {}
): Readonly<ArrayListConfig<T>> {
  return Object.freeze({
    growthFactor: config.growthFactor ?? DEFAULT_GROWTH_FACTOR,
    shrinkFactor: config.shrinkFactor ?? DEFAULT_SHRINK_FACTOR,
    initialCapacity: config.initialCapacity ?? 0,
    equals: config.equals ?? strictEquals,
  });
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Result of validating a configuration.
 */
export interface ConfigValidationResult {
  /** Whether the configuration is valid */
  readonly valid: boolean;
  /** Error messages if validation failed */
  readonly errors: readonly string[];
}

/**
 * Validate a list configuration with detailed error messages.
 * Options left undefined are valid (their defaults apply).
 *
 * @example
 * ```typescript
 * const result = validateListConfig({ growthFactor: 0.5 });
 * if (!result.valid) {
 *   console.error('Invalid config:', result.errors);
 * }
 * ```
 */
export function validateListConfig(value: unknown): ConfigValidationResult {
  const errors: string[] = [];

  if (typeof value !== 'object' || value === null) {
    errors.push('Config must be a non-null object');
    return { valid: false, errors };
  }

  if ('growthFactor' in value && value.growthFactor !== undefined) {
    const { growthFactor } = value;
    if (typeof growthFactor !== 'number' || !Number.isFinite(growthFactor)) {
      errors.push('growthFactor must be a finite number');
    } else if (growthFactor < 1) {
      errors.push(`growthFactor must be at least 1: ${growthFactor}`);
    }
  }

  if ('shrinkFactor' in value && value.shrinkFactor !== undefined) {
    const { shrinkFactor } = value;
    if (typeof shrinkFactor !== 'number' || Number.isNaN(shrinkFactor)) {
      errors.push('shrinkFactor must be a number');
    } else if (shrinkFactor < 0 || shrinkFactor > 1) {
      errors.push(`shrinkFactor must be between 0 and 1: ${shrinkFactor}`);
    }
  }

  if ('initialCapacity' in value && value.initialCapacity !== undefined) {
    const { initialCapacity } = value;
    if (typeof initialCapacity !== 'number' || !Number.isInteger(initialCapacity)) {
      errors.push('initialCapacity must be an integer');
    } else if (initialCapacity < 0) {
      errors.push(`initialCapacity cannot be negative: ${initialCapacity}`);
    } else if (initialCapacity > MAX_CAPACITY) {
      errors.push(
        `initialCapacity ${initialCapacity} exceeds maximum capacity ${MAX_CAPACITY}`
      );
    }
  }

  if ('equals' in value && value.equals !== undefined) {
    if (typeof value.equals !== 'function') {
      errors.push('equals must be a function');
    }
  }

  return { valid: errors.length === 0, errors };
}
