/**
 * CLI Utilities
 */

export * from './progress.js';
export * from './summary.js';
