/**
 * Type exports for Stride.
 */

// List types
export type {
  Comparator,
  Equality,
  Lookup,
  Container,
  List,
  ArrayList,
} from './list.ts';

// Configuration types
export type {
  ArrayListConfig,
  ConfigValidationResult,
} from './config.ts';

export {
  strictEquals,
  resolveListConfig,
  validateListConfig,
} from './config.ts';
