/**
 * Traversal Drivers
 *
 * Higher-order walks over the pre-order linearization. Called on a root
 * cursor they cover the whole tree; called on a cursor below the root they
 * cover its subtree only and splice the result back in place.
 */

import { TraversalLimitError } from '../errors/cursor.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger, logError, startTimer } from '../utils/logger.js';
import { TRAVERSAL_CONFIG } from './CursorConstants.js';
import type { TreeCursor } from './TreeCursor.js';
import { replace, update } from './edits.js';
import { markEnd, next, nextSkippingChildren } from './linearization.js';
import { top } from './navigation.js';

const log = createModuleLogger('cursor.traversal');

export interface TraversalOptions {
  /**
   * Maximum number of cursors handed to the callback before the walk is
   * aborted with a TraversalLimitError. 0 disables the limit. Defaults to
   * ZIPTREE_TRAVERSAL_LIMIT.
   */
  maxSteps?: number;
}

export interface FoldResult<T, A> {
  cursor: TreeCursor<T>;
  acc: A;
}

export type StepAction = 'continue' | 'skip' | 'halt';

/**
 * What a foldWhile callback asks the walk to do next:
 * - continue: move on in pre-order, children included
 * - skip: move on without entering the current node's children
 * - halt: stop; the whole tree comes back at the top, marked as ended
 */
export interface FoldStep<T, A> {
  action: StepAction;
  cursor: TreeCursor<T>;
  acc: A;
}

export interface TraverseStep<T> {
  action: StepAction;
  cursor: TreeCursor<T>;
}

export function cont<T, A>(cursor: TreeCursor<T>, acc: A): FoldStep<T, A> {
  return { action: 'continue', cursor, acc };
}

export function skip<T, A>(cursor: TreeCursor<T>, acc: A): FoldStep<T, A> {
  return { action: 'skip', cursor, acc };
}

export function halt<T, A>(cursor: TreeCursor<T>, acc: A): FoldStep<T, A> {
  return { action: 'halt', cursor, acc };
}

interface WalkOutcome<T, A> extends FoldResult<T, A> {
  halted: boolean;
  steps: number;
}

class StepGuard {
  private steps = 0;

  constructor(
    private readonly driver: string,
    private readonly maxSteps: number
  ) {}

  get count(): number {
    return this.steps;
  }

  tick(): void {
    this.steps++;
    if (this.maxSteps !== TRAVERSAL_CONFIG.UNLIMITED && this.steps > this.maxSteps) {
      const error = new TraversalLimitError(this.driver, this.maxSteps);
      logError(log, error, { driver: this.driver });
      throw error;
    }
  }
}

/**
 * The cursor a walk actually starts from, and whether it is a subtree that
 * has to be spliced back afterwards.
 */
function enter<T>(cursor: TreeCursor<T>): { start: TreeCursor<T>; bounded: boolean } {
  switch (cursor.path.kind) {
    case 'end':
      return { start: cursor.with({ path: { kind: 'root' } }), bounded: false };
    case 'root':
      return { start: cursor, bounded: false };
    case 'parent':
      return { start: cursor.asRoot(), bounded: true };
  }
}

function walk<T, A>(
  driver: string,
  cursor: TreeCursor<T>,
  initial: A,
  fn: (cursor: TreeCursor<T>, acc: A) => FoldStep<T, A>,
  options: TraversalOptions
): WalkOutcome<T, A> {
  const guard = new StepGuard(driver, options.maxSteps ?? cfg.ZIPTREE_TRAVERSAL_LIMIT);
  const done = startTimer(log, driver);
  const { start, bounded } = enter(cursor);

  let current = start;
  let acc = initial;
  let halted = false;

  while (!current.isEnd) {
    guard.tick();
    const step = fn(current, acc);
    acc = step.acc;

    if (step.action === 'halt') {
      current = markEnd(top(step.cursor));
      halted = true;
      break;
    }

    current =
      step.action === 'skip' ? nextSkippingChildren(step.cursor) : next(step.cursor);
  }

  if (bounded) {
    const spliced = replace(cursor, current.location);
    // a halt inside a subtree still ends the walk of the whole tree
    current = halted ? markEnd(top(spliced)) : spliced;
  }

  done({ steps: guard.count, halted, bounded });
  return { cursor: current, acc, halted, steps: guard.count };
}

/**
 * Visit every node in pre-order, threading an accumulator.
 *
 * `fn` receives each cursor and returns the (possibly edited) cursor to
 * continue from together with the new accumulator.
 */
export function fold<T, A>(
  cursor: TreeCursor<T>,
  acc: A,
  fn: (cursor: TreeCursor<T>, acc: A) => FoldResult<T, A>,
  options: TraversalOptions = {}
): FoldResult<T, A> {
  const outcome = walk(
    'fold',
    cursor,
    acc,
    (current, value) => {
      const result = fn(current, value);
      return cont(result.cursor, result.acc);
    },
    options
  );
  return { cursor: outcome.cursor, acc: outcome.acc };
}

/**
 * Visit every node in pre-order, replacing each cursor with `fn(cursor)`.
 */
export function traverse<T>(
  cursor: TreeCursor<T>,
  fn: (cursor: TreeCursor<T>) => TreeCursor<T>,
  options: TraversalOptions = {}
): TreeCursor<T> {
  return fold(cursor, undefined, (current) => ({ cursor: fn(current), acc: undefined }), options)
    .cursor;
}

/**
 * Replace every node with `fn(node)`. Each node is transformed before its
 * children are visited, so the children walked are those of the new node.
 */
export function map<T>(
  cursor: TreeCursor<T>,
  fn: (node: T) => T,
  options: TraversalOptions = {}
): TreeCursor<T> {
  return traverse(cursor, (current) => update(current, fn), options);
}

/**
 * Pre-order fold that the callback can steer: skip a subtree or halt the
 * walk early.
 *
 * Halting returns the top of the whole tree marked as ended, even when the
 * fold started on a subtree; nodes not yet visited are left untouched.
 */
export function foldWhile<T, A>(
  cursor: TreeCursor<T>,
  acc: A,
  fn: (cursor: TreeCursor<T>, acc: A) => FoldStep<T, A>,
  options: TraversalOptions = {}
): FoldResult<T, A> {
  const outcome = walk('foldWhile', cursor, acc, fn, options);
  if (outcome.halted) {
    log.debug({ steps: outcome.steps }, 'foldWhile halted');
  }
  return { cursor: outcome.cursor, acc: outcome.acc };
}

/**
 * foldWhile without an accumulator.
 */
export function traverseWhile<T>(
  cursor: TreeCursor<T>,
  fn: (cursor: TreeCursor<T>) => TraverseStep<T>,
  options: TraversalOptions = {}
): TreeCursor<T> {
  return foldWhile(
    cursor,
    undefined,
    (current) => {
      const step = fn(current);
      return { action: step.action, cursor: step.cursor, acc: undefined };
    },
    options
  ).cursor;
}
