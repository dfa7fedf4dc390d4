import { z } from 'zod';
import { CapabilityError } from '../errors/cursor.js';

/**
 * The three operations a tree shape supplies so a cursor can walk it.
 *
 * Implementations must be pure: the cursor calls them repeatedly and expects
 * the same answer for the same node.
 */
export interface TreeCapability<T> {
  /** Whether `node` can have children. */
  isBranch(node: T): boolean;

  /** Ordered children of `node`. Only called when `isBranch(node)` holds. */
  children(node: T): readonly T[];

  /**
   * Rebuild a node of the same kind as `node` with `children` as its child
   * sequence. Also called on leaves when a child is added to them.
   */
  makeNode(node: T, children: readonly T[]): T;
}

const isFunction = (value: unknown): boolean => typeof value === 'function';

/**
 * Shape check for capability objects coming from untyped callers
 */
export const capabilitySchema = z.object({
  isBranch: z.custom<(node: unknown) => boolean>(isFunction, 'isBranch must be a function'),
  children: z.custom<(node: unknown) => readonly unknown[]>(
    isFunction,
    'children must be a function'
  ),
  makeNode: z.custom<(node: unknown, children: readonly unknown[]) => unknown>(
    isFunction,
    'makeNode must be a function'
  ),
});

/**
 * Throws a CapabilityError listing every missing or malformed operation
 */
export function assertCapability(candidate: unknown): void {
  const result = capabilitySchema.safeParse(candidate);
  if (result.success) return;

  const issues = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  throw new CapabilityError('Invalid tree capability', issues);
}

/**
 * Validate a capability once and return it unchanged.
 *
 * @example
 * const pairs = defineCapability<Pair>({
 *   isBranch: (node) => Array.isArray(node),
 *   children: (node) => (Array.isArray(node) ? node : []),
 *   makeNode: (_node, children) => [...children],
 * });
 */
export function defineCapability<T>(capability: TreeCapability<T>): TreeCapability<T> {
  assertCapability(capability);
  return capability;
}
