import { cfg } from '../utils/config.js';
import { type TreeCapability, assertCapability } from './capability.js';
import {
  appendChild,
  insertChild,
  insertLeft,
  insertRight,
  remove,
  replace,
  update,
} from './edits.js';
import { find, preorder } from './iteration.js';
import { next, prev } from './linearization.js';
import { down, left, leftmost, right, rightmost, root, top, up } from './navigation.js';
import {
  type FoldResult,
  type FoldStep,
  type TraversalOptions,
  type TraverseStep,
  fold,
  foldWhile,
  map,
  traverse,
  traverseWhile,
} from './traversal.js';

/**
 * Where a cursor sits relative to the rest of the tree.
 *
 * - `root`: no parent context
 * - `parent`: the parent's own cursor, whose location is the parent node as it
 *   was before any edit below it
 * - `end`: pre-order traversal has finished; only reachable at the root
 */
export type CursorPath<T> =
  | { readonly kind: 'root' }
  | { readonly kind: 'parent'; readonly parent: TreeCursor<T> }
  | { readonly kind: 'end' };

export interface CursorFields<T> {
  readonly location: T;
  readonly lefts: readonly T[];
  readonly rights: readonly T[];
  readonly path: CursorPath<T>;
}

const ROOT_PATH = { kind: 'root' } as const;

/**
 * Immutable cursor over a tree whose shape is described by a TreeCapability.
 *
 * Key principles:
 * - Immutable API: every move or edit returns a new cursor
 * - Lazy rebuild: edited nodes only reach their ancestors when moving up
 * - Shape-agnostic: nodes are only touched through the capability
 *
 * Moves and edits live in the navigation, linearization, traversal and edits
 * modules as free functions; the methods below delegate to them.
 */
export class TreeCursor<T> implements CursorFields<T> {
  readonly location: T;
  /** Siblings before `location`, nearest first. */
  readonly lefts: readonly T[];
  /** Siblings after `location`, in tree order. */
  readonly rights: readonly T[];
  readonly path: CursorPath<T>;
  readonly capability: TreeCapability<T>;

  private constructor(fields: CursorFields<T>, capability: TreeCapability<T>) {
    this.location = fields.location;
    this.lefts = fields.lefts;
    this.rights = fields.rights;
    this.path = fields.path;
    this.capability = capability;
  }

  // Factory methods

  /**
   * Wrap a tree value in a root cursor.
   *
   * The capability is checked once unless ZIPTREE_VALIDATE_CAPABILITY is off.
   */
  static from<T>(tree: T, capability: TreeCapability<T>): TreeCursor<T> {
    if (cfg.ZIPTREE_VALIDATE_CAPABILITY) {
      assertCapability(capability);
    }
    return new TreeCursor({ location: tree, lefts: [], rights: [], path: ROOT_PATH }, capability);
  }

  /**
   * Copy of this cursor with some fields replaced. The capability always
   * carries over.
   */
  with(fields: Partial<CursorFields<T>>): TreeCursor<T> {
    return new TreeCursor(
      {
        location: this.location,
        lefts: this.lefts,
        rights: this.rights,
        path: this.path,
        ...fields,
      },
      this.capability
    );
  }

  /**
   * Treat the current location as a fresh root: siblings and path are dropped.
   * A cursor already at the root comes back unchanged.
   */
  asRoot(): TreeCursor<T> {
    if (this.path.kind === 'root') return this;
    return new TreeCursor(
      { location: this.location, lefts: [], rights: [], path: ROOT_PATH },
      this.capability
    );
  }

  // Queries

  get node(): T {
    return this.location;
  }

  get isRoot(): boolean {
    return this.path.kind !== 'parent';
  }

  get isEnd(): boolean {
    return this.path.kind === 'end';
  }

  /** Number of ancestors above the current location. */
  get depth(): number {
    let depth = 0;
    let path = this.path;
    while (path.kind === 'parent') {
      depth++;
      path = path.parent.path;
    }
    return depth;
  }

  isBranch(): boolean {
    return this.capability.isBranch(this.location);
  }

  /** Children of the current location, or an empty list for a leaf. */
  children(): readonly T[] {
    return this.isBranch() ? this.capability.children(this.location) : [];
  }

  /** Rebuild the current location with the given children. */
  makeNode(children: readonly T[]): T {
    return this.capability.makeNode(this.location, children);
  }

  // Navigation

  down(): TreeCursor<T> | null {
    return down(this);
  }

  up(): TreeCursor<T> | null {
    return up(this);
  }

  left(): TreeCursor<T> | null {
    return left(this);
  }

  right(): TreeCursor<T> | null {
    return right(this);
  }

  leftmost(): TreeCursor<T> {
    return leftmost(this);
  }

  rightmost(): TreeCursor<T> {
    return rightmost(this);
  }

  top(): TreeCursor<T> {
    return top(this);
  }

  root(): T {
    return root(this);
  }

  // Linearization

  next(): TreeCursor<T> {
    return next(this);
  }

  prev(): TreeCursor<T> | null {
    return prev(this);
  }

  find(predicate: (cursor: TreeCursor<T>) => boolean): TreeCursor<T> | null {
    return find(this, predicate);
  }

  [Symbol.iterator](): Iterator<T> {
    return preorder(this);
  }

  // Edits

  replace(node: T): TreeCursor<T> {
    return replace(this, node);
  }

  update(fn: (node: T) => T): TreeCursor<T> {
    return update(this, fn);
  }

  remove(): TreeCursor<T> {
    return remove(this);
  }

  insertLeft(node: T): TreeCursor<T> {
    return insertLeft(this, node);
  }

  insertRight(node: T): TreeCursor<T> {
    return insertRight(this, node);
  }

  appendChild(node: T): TreeCursor<T> {
    return appendChild(this, node);
  }

  insertChild(node: T): TreeCursor<T> {
    return insertChild(this, node);
  }

  // Traversal

  map(fn: (node: T) => T, options?: TraversalOptions): TreeCursor<T> {
    return map(this, fn, options);
  }

  traverse(fn: (cursor: TreeCursor<T>) => TreeCursor<T>, options?: TraversalOptions): TreeCursor<T> {
    return traverse(this, fn, options);
  }

  fold<A>(
    acc: A,
    fn: (cursor: TreeCursor<T>, acc: A) => FoldResult<T, A>,
    options?: TraversalOptions
  ): FoldResult<T, A> {
    return fold(this, acc, fn, options);
  }

  traverseWhile(
    fn: (cursor: TreeCursor<T>) => TraverseStep<T>,
    options?: TraversalOptions
  ): TreeCursor<T> {
    return traverseWhile(this, fn, options);
  }

  foldWhile<A>(
    acc: A,
    fn: (cursor: TreeCursor<T>, acc: A) => FoldStep<T, A>,
    options?: TraversalOptions
  ): FoldResult<T, A> {
    return foldWhile(this, acc, fn, options);
  }
}
