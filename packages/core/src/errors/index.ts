/**
 * Centralized error handling for ziptree
 */

export { ZiptreeError } from './base.js';

// Cursor errors
export {
  CursorError,
  RootEditError,
  TraversalLimitError,
  CapabilityError,
  InvalidNodeError,
  type RootEditOperation,
} from './cursor.js';
