/**
 * Sequence view over the pre-order linearization
 */

import type { TreeCursor } from './TreeCursor.js';
import { next } from './linearization.js';

/**
 * Every cursor from `cursor` onwards in pre-order, stopping at the end marker.
 */
export function* cursors<T>(cursor: TreeCursor<T>): Generator<TreeCursor<T>, void, undefined> {
  let current = cursor;
  while (!current.isEnd) {
    yield current;
    current = next(current);
  }
}

/**
 * Every node from `cursor` onwards in pre-order, stopping at the end marker.
 */
export function* preorder<T>(cursor: TreeCursor<T>): Generator<T, void, undefined> {
  for (const current of cursors(cursor)) {
    yield current.location;
  }
}

/**
 * First cursor, starting with `cursor` itself, for which `predicate` holds.
 * Returns null when the walk reaches the end first.
 */
export function find<T>(
  cursor: TreeCursor<T>,
  predicate: (cursor: TreeCursor<T>) => boolean
): TreeCursor<T> | null {
  for (const current of cursors(cursor)) {
    if (predicate(current)) return current;
  }
  return null;
}
