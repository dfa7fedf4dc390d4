import { assertCapability } from './capability.js';
import type { TreeCapability } from './capability.js';
import { VALIDATION_CONFIG } from './CursorConstants.js';

/**
 * CursorValidation - Checks that a tree and its capability can be walked safely
 *
 * Reports:
 * - Branches whose children are not a list
 * - Object nodes that contain themselves (cycles)
 * - Capabilities whose makeNode does not give back the same children
 * - Excessive nesting and subtrees shared between two positions (warnings)
 *
 * Positions are written as child indices from the root, e.g. `0/2/1`; the
 * root itself is the empty string.
 */

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  type: 'malformed_children' | 'cycle' | 'rebuild_mismatch';
  position: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationWarning {
  type: 'deep_nesting' | 'shared_subtree';
  position: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationOptions<T = unknown> {
  /** Depth above which a deep_nesting warning is reported. 0 disables the check. */
  maxDepth?: number;
  /** Check that makeNode(node, children(node)) yields the same children. */
  checkRebuild?: boolean;
  /**
   * Node comparison for the rebuild check. Defaults to shallow equality, so
   * adapters that allocate child wrappers on each call still pass.
   */
  equals?: (a: unknown, b: unknown) => boolean;
  /**
   * The value that stands for a node when looking for cycles and shared
   * subtrees. Defaults to the node itself; adapters that wrap their data in
   * fresh nodes should return the wrapped data.
   */
  identify?: (node: T) => unknown;
}

interface ResolvedOptions {
  maxDepth: number;
  checkRebuild: boolean;
  equals: (a: unknown, b: unknown) => boolean;
}

/**
 * Validates a tree against its capability
 *
 * @throws CapabilityError when the capability itself is malformed
 */
export function validateTree<T>(
  tree: T,
  capability: TreeCapability<T>,
  options: ValidationOptions<T> = {}
): ValidationResult {
  assertCapability(capability);

  const opts: ResolvedOptions = {
    maxDepth: options.maxDepth ?? VALIDATION_CONFIG.DEFAULT_MAX_DEPTH,
    checkRebuild: options.checkRebuild ?? VALIDATION_CONFIG.DEFAULT_CHECK_REBUILD,
    equals: options.equals ?? shallowEqual,
  };
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const ancestors = new Set<object>();
  const seen = new Map<object, string>();
  const identify = options.identify ?? ((node: T): unknown => node);

  const visit = (node: T, indices: readonly number[]): void => {
    const position = indices.join('/');
    const depth = indices.length;

    if (opts.maxDepth > 0 && depth > opts.maxDepth) {
      warnings.push({
        type: 'deep_nesting',
        position,
        message: `Node exceeds maximum depth of ${opts.maxDepth} (current: ${depth})`,
        details: { maxDepth: opts.maxDepth, currentDepth: depth },
      });
    }

    const identity = objectIdentity(identify(node));
    if (identity) {
      if (ancestors.has(identity)) {
        errors.push({
          type: 'cycle',
          position,
          message: `Node at ${describe(position)} is one of its own ancestors`,
        });
        return;
      }
      const firstPosition = seen.get(identity);
      if (firstPosition !== undefined) {
        warnings.push({
          type: 'shared_subtree',
          position,
          message: `Node at ${describe(position)} is also found at ${describe(firstPosition)}`,
          details: { firstPosition },
        });
        return;
      }
      seen.set(identity, position);
    }

    if (!capability.isBranch(node)) return;

    const children = capability.children(node);
    if (!isList(children)) {
      errors.push({
        type: 'malformed_children',
        position,
        message: `Children of the branch at ${describe(position)} are not a list`,
        details: { received: typeof children },
      });
      return;
    }

    if (opts.checkRebuild) {
      const mismatch = checkRebuild(capability, node, children, opts.equals);
      if (mismatch) {
        errors.push({ type: 'rebuild_mismatch', position, ...mismatch });
      }
    }

    if (identity) ancestors.add(identity);
    children.forEach((child, index) => visit(child, [...indices, index]));
    if (identity) ancestors.delete(identity);
  };

  visit(tree, []);

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

function checkRebuild<T>(
  capability: TreeCapability<T>,
  node: T,
  children: readonly T[],
  equals: (a: unknown, b: unknown) => boolean
): Pick<ValidationError, 'message' | 'details'> | null {
  const rebuilt = capability.makeNode(node, children);
  if (!capability.isBranch(rebuilt)) {
    return { message: 'makeNode did not produce a branch' };
  }

  const rebuiltChildren = capability.children(rebuilt);
  if (!isList(rebuiltChildren) || rebuiltChildren.length !== children.length) {
    return {
      message: 'makeNode changed the number of children',
      details: { expected: children.length, received: sizeOf(rebuiltChildren) },
    };
  }

  const index = children.findIndex((child, i) => !equals(child, rebuiltChildren[i]));
  if (index !== -1) {
    return { message: `makeNode changed the child at index ${index}`, details: { index } };
  }

  return null;
}

function isList(value: unknown): boolean {
  return Array.isArray(value);
}

function sizeOf(value: unknown): number | null {
  return Array.isArray(value) ? value.length : null;
}

function objectIdentity(value: unknown): object | null {
  return typeof value === 'object' && value !== null ? value : null;
}

function describe(position: string): string {
  return position === '' ? 'the root' : position;
}

/**
 * Same value, or objects with the same own keys holding the same values.
 */
export function shallowEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;

  const left = objectIdentity(a);
  const right = objectIdentity(b);
  if (!left || !right) return false;
  if (Array.isArray(left) !== Array.isArray(right)) return false;

  const leftKeys = Object.keys(left);
  const rightKeys = Object.keys(right);
  if (leftKeys.length !== rightKeys.length) return false;

  return leftKeys.every(
    (key) =>
      Object.prototype.hasOwnProperty.call(right, key) &&
      Object.is(Reflect.get(left, key), Reflect.get(right, key))
  );
}
