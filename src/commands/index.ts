/**
 * Command re-exports
 */

export { initCommand } from './init.js';
export { migrateCommand } from './migrate.js';
export { cacheCommand } from './cache.js';
