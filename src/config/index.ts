/**
 * Session configuration module.
 *
 * @module
 */

export type { SessionConfig, SessionConfigInput } from './types.js';
export { ConfigValidationError, ConfigLoadError } from './errors.js';
export {
  DEFAULT_SESSION_CONFIG,
  CONFIG_PATH_ENV,
  getDefaultConfigPath,
  validateSessionConfig,
  resolveSessionConfig,
  loadSessionConfig,
} from './loader.js';
