/**
 * Utility Functions
 *
 * Logging and configuration shared by every module.
 */

// Logging utilities
export {
  LoggerFactory,
  createLoggerFactory,
  createModuleLogger,
  logError,
  logger,
  startTimer,
} from './utils/logger.js';

// Configuration
export * from './utils/config.js';
