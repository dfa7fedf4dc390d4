/**
 * Test utilities: a small value/children tuple tree and helpers to build
 * cursors over it
 */

import { TreeCursor } from '../src/entities/TreeCursor.js';
import { defineCapability } from '../src/entities/capability.js';

/**
 * A leaf number, or a `[value, children]` pair.
 */
export type TupleTree = number | TupleBranch;
export type TupleBranch = readonly [number, readonly TupleTree[]];

export const tupleCapability = defineCapability<TupleTree>({
  isBranch: (node) => typeof node !== 'number',
  children: (node) => (typeof node === 'number' ? [] : node[1]),
  makeNode: (node, children) =>
    typeof node === 'number' ? [node, children] : [node[0], children],
});

export function branch(value: number, children: readonly TupleTree[]): TupleBranch {
  return [value, children];
}

/** `{1, [2, {3, [4, 5]}]}` */
export const sampleTree: TupleTree = branch(1, [2, branch(3, [4, 5])]);

export function tupleCursor(tree: TupleTree = sampleTree): TreeCursor<TupleTree> {
  return TreeCursor.from(tree, tupleCapability);
}

/** The number a node carries: the leaf itself or a branch's value. */
export function valueOf(node: TupleTree): number {
  return typeof node === 'number' ? node : node[0];
}

/** Follow a list of child indices from the root. */
export function cursorAt(cursor: TreeCursor<TupleTree>, ...indices: number[]): TreeCursor<TupleTree> {
  let current = cursor;
  for (const index of indices) {
    let child = current.down();
    for (let i = 0; i < index && child; i++) {
      child = child.right();
    }
    if (!child) {
      throw new Error(`No child at index ${index}`);
    }
    current = child;
  }
  return current;
}
