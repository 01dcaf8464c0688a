/**
 * metadata-ha-client — client-side failover across redundant
 * filesystem metadata-service endpoints.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Errors
export {
  RuntimeErrorCodes,
  type RuntimeErrorCode,
  RuntimeError,
  isRuntimeError,
  getErrorMessage,
} from './types/errors.js';

// Failover proxy
export * from './failover/index.js';

// Domain model
export * from './metadata/index.js';

// Configuration
export * from './config/index.js';

// Telemetry
export * from './telemetry/index.js';

// Utilities
export * from './utils/index.js';
