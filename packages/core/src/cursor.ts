/**
 * Tree Cursor
 *
 * The cursor, the capability contract it is built on, and the navigation,
 * linearization, traversal and edit operations as free functions.
 */

export { TreeCursor, type CursorPath, type CursorFields } from './entities/TreeCursor.js';
export {
  type TreeCapability,
  capabilitySchema,
  assertCapability,
  defineCapability,
} from './entities/capability.js';

// Navigation
export {
  down,
  up,
  left,
  right,
  leftmost,
  rightmost,
  top,
  root,
  siblingsOf,
} from './entities/navigation.js';

// Linearization
export {
  next,
  nextSkippingChildren,
  prev,
  descendToLast,
  isEnd,
  markEnd,
} from './entities/linearization.js';
export { cursors, preorder, find } from './entities/iteration.js';

// Edits
export {
  replace,
  update,
  remove,
  insertLeft,
  insertRight,
  appendChild,
  insertChild,
} from './entities/edits.js';

// Traversal drivers
export {
  fold,
  traverse,
  map,
  foldWhile,
  traverseWhile,
  cont,
  skip,
  halt,
  type TraversalOptions,
  type FoldResult,
  type FoldStep,
  type TraverseStep,
  type StepAction,
} from './entities/traversal.js';

export { TRAVERSAL_CONFIG } from './entities/CursorConstants.js';
