/**
 * Configuration constants for cursor operations
 *
 * Centralizes the default values shared by the traversal drivers, the
 * configuration schema and the tree validation helpers.
 */

/**
 * Tree traversal configuration constants
 */
export const TRAVERSAL_CONFIG = {
  /** Step limit value that disables the guard */
  UNLIMITED: 0,

  /** Walks are unbounded unless a limit is configured or passed in */
  DEFAULT_MAX_STEPS: 0,
} as const;

/**
 * Tree validation configuration constants
 */
export const VALIDATION_CONFIG = {
  /** Default depth above which a deep_nesting warning is reported */
  DEFAULT_MAX_DEPTH: 64,

  /** Default setting for the makeNode round-trip check */
  DEFAULT_CHECK_REBUILD: true,
} as const;
