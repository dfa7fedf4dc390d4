/**
 * Linearization Engine
 *
 * Turns a tree into a depth-first pre-order sequence of cursors: a node comes
 * before its children, children left to right. Walking `next` from the root
 * ends on the root cursor marked `end`; `prev` walks the same sequence back.
 */

import type { TreeCursor } from './TreeCursor.js';
import { down, left, right, rightmost, up } from './navigation.js';

/**
 * The cursor after `cursor` in pre-order.
 *
 * Idempotent once the end of the traversal has been reached.
 */
export function next<T>(cursor: TreeCursor<T>): TreeCursor<T> {
  if (cursor.isEnd) return cursor;

  return down(cursor) ?? nextSkippingChildren(cursor);
}

/**
 * The cursor after `cursor`'s subtree in pre-order: the right sibling, or the
 * right sibling of the nearest ancestor that has one, or the end marker.
 */
export function nextSkippingChildren<T>(cursor: TreeCursor<T>): TreeCursor<T> {
  if (cursor.isEnd) return cursor;

  let current = cursor;
  for (;;) {
    const sibling = right(current);
    if (sibling) return sibling;

    const parent = up(current);
    if (!parent) return markEnd(current);
    current = parent;
  }
}

/**
 * The cursor before `cursor` in pre-order.
 *
 * From the end marker this is the last node of the tree; from the root it is
 * null.
 */
export function prev<T>(cursor: TreeCursor<T>): TreeCursor<T> | null {
  if (cursor.isEnd) {
    return descendToLast(cursor.with({ path: { kind: 'root' } }));
  }

  const sibling = left(cursor);
  return sibling ? descendToLast(sibling) : up(cursor);
}

/**
 * The last node of `cursor`'s subtree in pre-order, found by repeatedly
 * focusing the rightmost child.
 */
export function descendToLast<T>(cursor: TreeCursor<T>): TreeCursor<T> {
  let current = cursor;
  let child = down(current);
  while (child) {
    current = rightmost(child);
    child = down(current);
  }
  return current;
}

/**
 * Whether the cursor has walked past the last node.
 */
export function isEnd<T>(cursor: TreeCursor<T>): boolean {
  return cursor.isEnd;
}

/**
 * The root-level cursor marked as the end of the traversal.
 */
export function markEnd<T>(cursor: TreeCursor<T>): TreeCursor<T> {
  return cursor.with({ path: { kind: 'end' } });
}
