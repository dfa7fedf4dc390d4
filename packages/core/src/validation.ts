/**
 * Validation Toolkit
 *
 * Structural checks for a tree and the capability used to walk it. The
 * capability shape check itself lives with the cursor exports.
 */

export {
  validateTree,
  shallowEqual,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
  type ValidationOptions,
} from './entities/CursorValidation.js';

export { VALIDATION_CONFIG } from './entities/CursorConstants.js';
