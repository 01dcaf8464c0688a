/**
 * Base error type and error codes shared by every module of the client.
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * String error codes carried on every {@link RuntimeError}.
 */
export const RuntimeErrorCodes = {
  /** An endpoint address does not split into host and port */
  INVALID_ADDRESS: 'INVALID_ADDRESS',
  /** The proxy was closed and no endpoint is left */
  CLIENT_CLOSED: 'CLIENT_CLOSED',
  /** A reachable endpoint reported that it is not the active authority */
  STANDBY: 'STANDBY',
  /** Channel-level failure; the endpoint may be down or transitioning */
  FAILOVER: 'FAILOVER',
  /** Failover retries exhausted, or HA disabled */
  RPC_ERROR: 'RPC_ERROR',
  /** Internal invariant broken; indicates a defect, not a runtime condition */
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
  /** Session configuration failed validation */
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',
  /** Session configuration file could not be read */
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
} as const;

/** Union type of all runtime error code values */
export type RuntimeErrorCode = (typeof RuntimeErrorCodes)[keyof typeof RuntimeErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for errors raised by the client itself.
 *
 * Errors raised by an endpoint for domain reasons (file not found,
 * permission denied, ...) are never wrapped in this type.
 *
 * @example
 * ```typescript
 * try {
 *   await proxy.mkdirs('/data', { mode: 0o755 }, true);
 * } catch (err) {
 *   if (err instanceof RuntimeError) {
 *     console.log(`${err.code}: ${err.message}`);
 *   }
 * }
 * ```
 */
export class RuntimeError extends Error {
  /** The error code identifying this error type */
  public readonly code: RuntimeErrorCode;

  constructor(message: string, code: RuntimeErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
    // Using this.constructor hides subclass constructors from the stack.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Type guard for {@link RuntimeError}.
 */
export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}

/**
 * Get a printable message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
