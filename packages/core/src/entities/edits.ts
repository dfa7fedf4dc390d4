/**
 * Structural Edit Operations
 *
 * Edits only touch the cursor they are given; ancestors pick the change up
 * when the cursor moves up. Edits that need a parent throw RootEditError at
 * the root and leave the caller's cursor as it was.
 */

import { type RootEditOperation, RootEditError } from '../errors/cursor.js';
import { createModuleLogger } from '../utils/logger.js';
import type { TreeCursor } from './TreeCursor.js';
import { descendToLast } from './linearization.js';

const log = createModuleLogger('cursor.edits');

function rejectAtRoot<T>(cursor: TreeCursor<T>, edit: RootEditOperation): RootEditError {
  log.debug({ edit, path: cursor.path.kind }, 'Rejected edit at root');
  return new RootEditError(edit, { path: cursor.path.kind });
}

/**
 * Put `node` in place of the current location.
 */
export function replace<T>(cursor: TreeCursor<T>, node: T): TreeCursor<T> {
  return cursor.with({ location: node });
}

/**
 * Replace the current location with `fn(location)`.
 */
export function update<T>(cursor: TreeCursor<T>, fn: (node: T) => T): TreeCursor<T> {
  return replace(cursor, fn(cursor.location));
}

/**
 * Drop the current location.
 *
 * The new focus is the node before it in pre-order: the last node of the left
 * sibling's subtree, or the parent when there is no left sibling.
 *
 * @throws RootEditError when called on the root
 */
export function remove<T>(cursor: TreeCursor<T>): TreeCursor<T> {
  if (cursor.path.kind !== 'parent') {
    throw rejectAtRoot(cursor, 'remove');
  }

  if (cursor.lefts.length > 0) {
    const [nearest, ...rest] = cursor.lefts;
    return descendToLast(cursor.with({ location: nearest, lefts: rest }));
  }

  const parent = cursor.path.parent;
  return parent.with({ location: parent.makeNode(cursor.rights) });
}

/**
 * Insert `node` as the nearest left sibling; the focus does not move.
 *
 * @throws RootEditError when called on the root
 */
export function insertLeft<T>(cursor: TreeCursor<T>, node: T): TreeCursor<T> {
  if (cursor.path.kind !== 'parent') {
    throw rejectAtRoot(cursor, 'insertLeft');
  }
  return cursor.with({ lefts: [node, ...cursor.lefts] });
}

/**
 * Insert `node` as the nearest right sibling; the focus does not move.
 *
 * @throws RootEditError when called on the root
 */
export function insertRight<T>(cursor: TreeCursor<T>, node: T): TreeCursor<T> {
  if (cursor.path.kind !== 'parent') {
    throw rejectAtRoot(cursor, 'insertRight');
  }
  return cursor.with({ rights: [node, ...cursor.rights] });
}

/**
 * Add `node` as the last child of the current location. A leaf is promoted
 * to a branch holding only `node`.
 */
export function appendChild<T>(cursor: TreeCursor<T>, node: T): TreeCursor<T> {
  const children = cursor.isBranch() ? [...cursor.children(), node] : [node];
  return replace(cursor, cursor.makeNode(children));
}

/**
 * Add `node` as the first child of the current location. A leaf is promoted
 * to a branch holding only `node`.
 */
export function insertChild<T>(cursor: TreeCursor<T>, node: T): TreeCursor<T> {
  const children = cursor.isBranch() ? [node, ...cursor.children()] : [node];
  return replace(cursor, cursor.makeNode(children));
}
