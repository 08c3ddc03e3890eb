/**
 * eln-migrate
 *
 * Public API for programmatic usage.
 */

export * from './migrate/index.js';

// Configuration
export {
  resolveConfig,
  validateConfig,
  mergeLayers,
  loadConfigFile,
  saveConfig,
  defaultConfig,
  type MigrationConfig,
  type ConfigLayer,
} from './config.js';

// Logging
export { createLogger, silentLogger, type Logger, type LogLevel, type LoggerOptions } from './logging.js';
