/**
 * MCP Pagination Client - Entry point and public exports
 */

// Configuration
export {
  loadConfig,
  getConfig,
  reloadConfig,
  resetConfig,
  ConfigSchema,
  type Config,
} from './config.js';

// Protocol
export * from './protocol/pagination.js';
export * from './protocol/errors.js';

// Client
export * from './client/index.js';

// Logging
export * from './logging/levels.js';

// Observability
export { StructuredLogger, type LogEntry, type StructuredLoggerOptions } from './observability/logger.js';
export * from './observability/metrics.js';
