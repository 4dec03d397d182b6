/**
 * Errors raised by Stride lists.
 * Out-of-range indices never throw; only configuration and allocation do.
 */

/**
 * Growth could not allocate a buffer large enough for the requested size.
 */
export class CapacityError extends RangeError {
  /** Number of slots the operation needed */
  readonly requested: number;

  constructor(requested: number, cause?: unknown) {
    super(`Cannot allocate a buffer for ${requested} elements`, { cause });
    this.name = 'CapacityError';
    this.requested = requested;
  }
}

/**
 * The configuration passed to `createArrayList` failed validation.
 */
export class ListConfigError extends Error {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid list configuration: ${errors.join('; ')}`);
    this.name = 'ListConfigError';
    this.errors = errors;
  }
}
