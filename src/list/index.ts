/**
 * List module exports.
 */

export { createArrayList, arrayListOf, isArrayList } from './array-list.ts';

export { GrowableBuffer } from './core/growable-buffer.ts';
export {
  planGrowth,
  planShrink,
  MAX_CAPACITY,
  DEFAULT_GROWTH_FACTOR,
  DEFAULT_SHRINK_FACTOR,
} from './core/capacity.ts';

export {
  numberComparator,
  stringComparator,
  bigintComparator,
  dateComparator,
  reverseComparator,
  compareBy,
} from './comparators.ts';

export { CapacityError, ListConfigError } from './errors.ts';

export { createListEventEmitter, createResizeEvent } from './events.ts';
export type {
  ListEvent,
  ResizeEvent,
  ResizeReason,
  AnyListEvent,
  ListEventMap,
  EventHandler,
  Unsubscribe,
  ListEventEmitter,
} from './events.ts';
