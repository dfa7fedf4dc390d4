/**
 * Cursor-specific error classes
 *
 * Navigation past a boundary is not an error: moves return null. These classes
 * cover the failures that have no in-place fallback.
 */

import { ZiptreeError } from './base.js';

/**
 * Base class for cursor-related errors
 */
export abstract class CursorError extends ZiptreeError {
  constructor(
    message: string,
    component: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, `cursor.${component}`, operation, context);
  }
}

export type RootEditOperation = 'remove' | 'insertLeft' | 'insertRight';

const ROOT_EDIT_MESSAGES: Record<RootEditOperation, string> = {
  remove: 'Cannot remove the root node',
  insertLeft: 'Cannot insert a left sibling at the root',
  insertRight: 'Cannot insert a right sibling at the root',
};

/**
 * Error thrown when an edit needs siblings or a parent the root does not have
 */
export class RootEditError extends CursorError {
  constructor(
    public readonly edit: RootEditOperation,
    context?: Record<string, unknown>
  ) {
    super(ROOT_EDIT_MESSAGES[edit], 'edits', edit, context);
  }
}

/**
 * Error thrown when a traversal driver exceeds its step limit
 */
export class TraversalLimitError extends CursorError {
  constructor(
    public readonly driver: string,
    public readonly maxSteps: number,
    context?: Record<string, unknown>
  ) {
    super(
      `Traversal exceeded the limit of ${maxSteps} steps in ${driver}`,
      'traversal',
      driver,
      { ...context, maxSteps }
    );
  }
}

/**
 * Error thrown when a supplied capability does not satisfy the contract
 */
export class CapabilityError extends CursorError {
  constructor(
    message: string,
    public readonly issues: string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'capability', 'validation', { ...context, issues });
  }
}

/**
 * Error thrown by an adapter that cannot represent the node it was given
 */
export class InvalidNodeError extends ZiptreeError {
  constructor(
    message: string,
    public readonly adapter: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, `adapters.${adapter}`, operation, context);
  }
}
