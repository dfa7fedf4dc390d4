/**
 * Tree Adapters Module
 *
 * Ready-made capabilities for common tree shapes, so plain data can be walked
 * with a TreeCursor without writing the three operations by hand.
 */

import { InvalidNodeError } from '../errors/cursor.js';
import { TreeCursor } from './TreeCursor.js';
import { type TreeCapability, defineCapability } from './capability.js';

// Nested lists

/**
 * A value or a list of nested lists. Every array is a branch, so values
 * must not be arrays themselves.
 */
export type NestedList<V> = V | readonly NestedList<V>[];

function isListBranch<V>(node: NestedList<V>): node is readonly NestedList<V>[] {
  return Array.isArray(node);
}

/**
 * Capability for nested arrays. An empty array is a branch without
 * children; rebuilding a node returns the new children as the array.
 */
export function listCapability<V>(): TreeCapability<NestedList<V>> {
  return defineCapability<NestedList<V>>({
    isBranch: (node) => isListBranch(node),
    children: (node) => (isListBranch(node) ? node : []),
    makeNode: (_node, children) => [...children],
  });
}

export function listCursor<V>(tree: NestedList<V>): TreeCursor<NestedList<V>> {
  return TreeCursor.from(tree, listCapability<V>());
}

// Keyed objects

export type KeyedObject = { readonly [key: string]: unknown };

/**
 * Keyed trees are walked through explicit tagged nodes: the root object and
 * one entry node per key. An entry whose value is a plain object is a branch
 * whose children are that object's entries.
 *
 * Rebuilt objects follow JavaScript key order: integer-like keys such as "0"
 * always come first, whatever their sibling position. Two entries with the
 * same key under one parent make `makeNode` throw InvalidNodeError.
 */
export type KeyedNode =
  | { readonly kind: 'object'; readonly value: KeyedObject }
  | { readonly kind: 'entry'; readonly key: string; readonly value: unknown };

export type KeyedEntry = Extract<KeyedNode, { kind: 'entry' }>;

export function isKeyedObject(value: unknown): value is KeyedObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function keyedRoot(value: KeyedObject): KeyedNode {
  return { kind: 'object', value };
}

export function keyedEntry(key: string, value: unknown): KeyedEntry {
  return { kind: 'entry', key, value };
}

/**
 * The plain value a keyed node stands for: the object for the root, the
 * entry's value otherwise.
 */
export function keyedValue(node: KeyedNode): unknown {
  return node.value;
}

function entriesOf(value: KeyedObject): KeyedEntry[] {
  return Object.entries(value).map(([key, child]) => keyedEntry(key, child));
}

function objectFrom(children: readonly KeyedNode[]): KeyedObject {
  const keys = new Set<string>();
  const entries = children.map((child) => {
    if (child.kind !== 'entry') {
      throw new InvalidNodeError('Only entry nodes can be children of a keyed node', 'keyed', 'makeNode', {
        kind: child.kind,
      });
    }
    if (keys.has(child.key)) {
      throw new InvalidNodeError(`Duplicate key "${child.key}" among keyed children`, 'keyed', 'makeNode', {
        key: child.key,
      });
    }
    keys.add(child.key);
    return [child.key, child.value] as const;
  });
  // fromEntries defines own properties, so a "__proto__" key stays a key
  return Object.fromEntries(entries);
}

export const keyedCapability: TreeCapability<KeyedNode> = defineCapability<KeyedNode>({
  isBranch: (node) => node.kind === 'object' || isKeyedObject(node.value),
  children: (node) => {
    if (node.kind === 'object') return entriesOf(node.value);
    return isKeyedObject(node.value) ? entriesOf(node.value) : [];
  },
  makeNode: (node, children) => {
    const value = objectFrom(children);
    return node.kind === 'object' ? keyedRoot(value) : keyedEntry(node.key, value);
  },
});

export function keyedCursor(value: KeyedObject): TreeCursor<KeyedNode> {
  return TreeCursor.from(keyedRoot(value), keyedCapability);
}

// Labeled nodes

/**
 * A value with an ordered list of child nodes.
 */
export interface LabeledNode<V> {
  readonly value: V;
  readonly children: readonly LabeledNode<V>[];
}

export function labeledNode<V>(value: V, children: readonly LabeledNode<V>[] = []): LabeledNode<V> {
  return { value, children };
}

/**
 * Capability for labeled nodes. A node is a branch once it has a child.
 */
export function labeledCapability<V>(): TreeCapability<LabeledNode<V>> {
  return defineCapability<LabeledNode<V>>({
    isBranch: (node) => node.children.length > 0,
    children: (node) => node.children,
    makeNode: (node, children) => ({ ...node, children }),
  });
}

export function labeledCursor<V>(tree: LabeledNode<V>): TreeCursor<LabeledNode<V>> {
  return TreeCursor.from(tree, labeledCapability<V>());
}
