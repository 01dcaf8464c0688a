/**
 * Error classes for the failover coordinator.
 *
 * `StandbyError` and `FailoverError` are what endpoint implementations
 * throw to signal a placement failure; the rest are raised by the
 * coordinator itself.
 *
 * @module
 */

import { RuntimeError, RuntimeErrorCodes, getErrorMessage } from '../types/errors.js';

/**
 * An endpoint address that is not exactly `host:port`.
 */
export class InvalidAddressError extends RuntimeError {
  public readonly address: string;

  constructor(address: string, reason = 'does not contain host or port') {
    super(`Cannot create metadata service proxy, ${address} ${reason}`, RuntimeErrorCodes.INVALID_ADDRESS);
    this.name = 'InvalidAddressError';
    this.address = address;
  }
}

/**
 * Raised by every operation after `close()`.
 */
export class ClosedError extends RuntimeError {
  constructor() {
    super('Metadata service proxy is closed.', RuntimeErrorCodes.CLIENT_CLOSED);
    this.name = 'ClosedError';
  }
}

/**
 * Thrown by an endpoint that is reachable but not the active authority.
 */
export class StandbyError extends RuntimeError {
  /** Address of the endpoint that answered, when the transport knows it */
  public readonly endpoint?: string;

  constructor(message = 'Operation category is not supported in state standby', endpoint?: string) {
    super(message, RuntimeErrorCodes.STANDBY);
    this.name = 'StandbyError';
    this.endpoint = endpoint;
  }
}

/**
 * Thrown by an endpoint transport on a channel-level failure.
 *
 * `cause` holds the underlying error (socket reset, timeout, ...). A
 * transport must always set it; the coordinator treats a missing cause at
 * retry exhaustion as a defect.
 */
export class FailoverError extends RuntimeError {
  public readonly endpoint?: string;

  constructor(message: string, cause?: unknown, endpoint?: string) {
    super(message, RuntimeErrorCodes.FAILOVER, cause === undefined ? undefined : { cause });
    this.name = 'FailoverError';
    this.endpoint = endpoint;
  }
}

/**
 * Terminal error for a call whose placement failures were not absorbed,
 * either because HA is disabled or because the retry bound ran out.
 *
 * `cause` is the standby error, or the error unwrapped from a
 * {@link FailoverError}.
 */
export class RpcError extends RuntimeError {
  /** Name of the forwarded operation */
  public readonly operation: string;
  /** Total number of attempts made, including the first */
  public readonly attempts: number;
  /** Number of failovers performed before giving up */
  public readonly retries: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    super(
      `${operation} failed after ${attempts} attempt(s): ${getErrorMessage(cause)}`,
      RuntimeErrorCodes.RPC_ERROR,
      { cause },
    );
    this.name = 'RpcError';
    this.operation = operation;
    this.attempts = attempts;
    this.retries = attempts - 1;
  }
}

/**
 * A {@link FailoverError} reached retry exhaustion without a cause.
 */
export class InvariantViolationError extends RuntimeError {
  constructor(message: string) {
    super(message, RuntimeErrorCodes.INVARIANT_VIOLATION);
    this.name = 'InvariantViolationError';
  }
}
