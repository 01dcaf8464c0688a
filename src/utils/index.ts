/**
 * Utility exports
 * @module
 */

export {
  type Logger,
  type LogLevel,
  LOG_LEVEL_NAMES,
  DEFAULT_LOG_PREFIX,
  createLogger,
  isLogLevel,
  silentLogger,
} from './logger.js';
