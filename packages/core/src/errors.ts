/**
 * Error Handling
 *
 * All error classes thrown by ziptree and the helpers to wrap and inspect them.
 */

export * from './errors/index.js';
