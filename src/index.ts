/**
 * Stride - A dynamic-array list backed by a contiguous, resizable buffer
 *
 * Main entry point exporting core types, the list factory, and utilities.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  Comparator,
  Equality,
  Lookup,
  Container,
  List,
  ArrayList,
  ArrayListConfig,
  ConfigValidationResult,
} from './types/index.ts';

export {
  strictEquals,
  resolveListConfig,
  validateListConfig,
} from './types/index.ts';

// =============================================================================
// List
// =============================================================================

export { createArrayList, arrayListOf, isArrayList } from './list/index.ts';

// =============================================================================
// Capacity Policy
// =============================================================================

export {
  GrowableBuffer,
  planGrowth,
  planShrink,
  MAX_CAPACITY,
  DEFAULT_GROWTH_FACTOR,
  DEFAULT_SHRINK_FACTOR,
} from './list/index.ts';

// =============================================================================
// Comparators
// =============================================================================

export {
  numberComparator,
  stringComparator,
  bigintComparator,
  dateComparator,
  reverseComparator,
  compareBy,
} from './list/index.ts';

// =============================================================================
// Errors
// =============================================================================

export { CapacityError, ListConfigError } from './list/index.ts';

// =============================================================================
// Event System
// =============================================================================

export { createListEventEmitter, createResizeEvent } from './list/index.ts';
export type {
  ListEvent,
  ResizeEvent,
  ResizeReason,
  AnyListEvent,
  ListEventMap,
  EventHandler,
  Unsubscribe,
  ListEventEmitter,
} from './list/index.ts';
