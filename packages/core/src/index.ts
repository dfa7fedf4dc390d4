/**
 * ziptree - Immutable cursors for walking and editing arbitrary trees
 *
 * This is the main entry point providing everything most users need.
 * Narrower entry points are also available:
 * - @ziptree/core/cursor - The cursor and its engines
 * - @ziptree/core/adapters - Capabilities for common tree shapes
 * - @ziptree/core/validation - Tree and capability checks
 * - @ziptree/core/errors - Error handling
 * - @ziptree/core/utils - Logging and configuration
 */

export * from './cursor.js';
export * from './adapters.js';
export * from './validation.js';
export * from './errors.js';

// Essential utilities
export { createModuleLogger, logger } from './utils/logger.js';
export { cfg, type AppConfig } from './utils/config.js';
