/**
 * Navigation Engine
 *
 * Primitive cursor moves. A move with no valid target returns null; nothing
 * here throws.
 */

import type { TreeCursor } from './TreeCursor.js';

/**
 * Focus the first child of the current location.
 *
 * Returns null for a leaf or for a branch without children.
 */
export function down<T>(cursor: TreeCursor<T>): TreeCursor<T> | null {
  if (!cursor.isBranch()) return null;

  const children = cursor.capability.children(cursor.location);
  if (children.length === 0) return null;

  const [first, ...rest] = children;
  return cursor.with({
    location: first,
    lefts: [],
    rights: rest,
    path: { kind: 'parent', parent: cursor },
  });
}

/**
 * Focus the parent, rebuilding it from the current sibling context.
 *
 * Returns null at the root and at the end of a traversal.
 */
export function up<T>(cursor: TreeCursor<T>): TreeCursor<T> | null {
  if (cursor.path.kind !== 'parent') return null;

  const parent = cursor.path.parent;
  return parent.with({
    location: parent.makeNode(siblingsOf(cursor)),
  });
}

/**
 * Focus the previous sibling. Returns null when there is none.
 */
export function left<T>(cursor: TreeCursor<T>): TreeCursor<T> | null {
  if (cursor.lefts.length === 0) return null;

  const [nearest, ...rest] = cursor.lefts;
  return cursor.with({
    location: nearest,
    lefts: rest,
    rights: [cursor.location, ...cursor.rights],
  });
}

/**
 * Focus the next sibling. Returns null when there is none.
 */
export function right<T>(cursor: TreeCursor<T>): TreeCursor<T> | null {
  if (cursor.rights.length === 0) return null;

  const [nearest, ...rest] = cursor.rights;
  return cursor.with({
    location: nearest,
    lefts: [cursor.location, ...cursor.lefts],
    rights: rest,
  });
}

/**
 * Focus the first sibling. Returns the cursor itself when already there.
 */
export function leftmost<T>(cursor: TreeCursor<T>): TreeCursor<T> {
  if (cursor.lefts.length === 0) return cursor;

  // lefts are nearest-first, so reversing yields tree order
  const [first, ...between] = [...cursor.lefts].reverse();
  return cursor.with({
    location: first,
    lefts: [],
    rights: [...between, cursor.location, ...cursor.rights],
  });
}

/**
 * Focus the last sibling. Returns the cursor itself when already there.
 */
export function rightmost<T>(cursor: TreeCursor<T>): TreeCursor<T> {
  if (cursor.rights.length === 0) return cursor;

  const between = cursor.rights.slice(0, -1);
  const last = cursor.rights[cursor.rights.length - 1];
  return cursor.with({
    location: last,
    lefts: [...between.reverse(), cursor.location, ...cursor.lefts],
    rights: [],
  });
}

/**
 * Climb to the root cursor. A cursor at the end of a traversal is returned
 * unchanged.
 */
export function top<T>(cursor: TreeCursor<T>): TreeCursor<T> {
  let current = cursor;
  let parent = up(current);
  while (parent) {
    current = parent;
    parent = up(current);
  }
  return current;
}

/**
 * The fully rebuilt tree, edits included.
 */
export function root<T>(cursor: TreeCursor<T>): T {
  return top(cursor).location;
}

/**
 * The current location's siblings and itself, in tree order.
 */
export function siblingsOf<T>(cursor: TreeCursor<T>): T[] {
  return [...[...cursor.lefts].reverse(), cursor.location, ...cursor.rights];
}
