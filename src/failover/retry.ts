/**
 * Retry Coordinator — the bounded failover loop every forwarded call
 * runs through.
 *
 * @module
 */

import type { RemoteMetadataService } from '../metadata/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { MetricsProvider } from '../telemetry/types.js';
import { HA_METRIC_NAMES } from '../telemetry/metric-names.js';
import type { ActivePointer } from './active-pointer.js';
import { FailoverError, InvariantViolationError, RpcError, StandbyError } from './errors.js';
import type { FailoverStats, FailureClass, HAConfig } from './types.js';

// ============================================================================
// Error classification
// ============================================================================

/**
 * Classify a rejected call. `failover` carries the unwrapped cause.
 */
export function classifyFailure(error: unknown): FailureClass {
  if (error instanceof StandbyError) {
    return { kind: 'standby', error };
  }
  if (error instanceof FailoverError) {
    return { kind: 'failover', error, cause: error.cause };
  }
  return { kind: 'other' };
}

// ============================================================================
// RetryCoordinator
// ============================================================================

export interface RetryCoordinatorOptions {
  ha: HAConfig;
  logger?: Logger;
  metrics?: MetricsProvider;
}

export type EndpointOperation<T> = (service: RemoteMetadataService) => Promise<T>;

/**
 * Runs operations against the active endpoint, failing over on standby
 * and channel errors.
 *
 * `ha.maxRetry` counts failovers after the first attempt: a call makes at
 * most `maxRetry + 1` attempts before it rejects with {@link RpcError}.
 */
export class RetryCoordinator {
  private readonly ha: HAConfig;
  private readonly logger: Logger;
  private readonly metrics?: MetricsProvider;

  private _totalCalls = 0;
  private _totalFailovers = 0;
  private _totalStandby = 0;
  private _totalFailoverErrors = 0;
  private _totalExhausted = 0;

  constructor(
    private readonly pointer: ActivePointer,
    options: RetryCoordinatorOptions,
  ) {
    this.ha = options.ha;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics;
  }

  async run<T>(operation: string, op: EndpointOperation<T>): Promise<T> {
    this._totalCalls++;
    this.metrics?.counter(HA_METRIC_NAMES.CALLS_TOTAL, 1, { operation });
    const start = Date.now();
    let retries = 0;

    for (;;) {
      const { endpoint, observedIndex } = this.pointer.getActive();

      try {
        const result = await op(endpoint.service);
        this.metrics?.histogram(HA_METRIC_NAMES.CALL_DURATION, Date.now() - start, { operation });
        return result;
      } catch (error) {
        const failure = classifyFailure(error);
        if (failure.kind === 'other') {
          throw error;
        }
        this.ensureRetryAllowed(operation, failure, retries);
      }

      retries++;
      if (this.pointer.advance(observedIndex)) {
        this._totalFailovers++;
        this.metrics?.counter(HA_METRIC_NAMES.FAILOVERS_TOTAL, 1, { operation });
      }
      this.logger.warn(
        `Failover to another endpoint after ${operation} failed on ${endpoint.address.raw}, retry count is ${retries}.`,
      );
    }
  }

  getStats(): Omit<FailoverStats, 'activeEndpoint' | 'endpointCount'> {
    return {
      totalCalls: this._totalCalls,
      totalFailovers: this._totalFailovers,
      totalStandby: this._totalStandby,
      totalFailoverErrors: this._totalFailoverErrors,
      totalExhausted: this._totalExhausted,
    };
  }

  /**
   * Return if another attempt may be made; otherwise throw the terminal error.
   */
  private ensureRetryAllowed(
    operation: string,
    failure: Exclude<FailureClass, { kind: 'other' }>,
    retries: number,
  ): void {
    if (failure.kind === 'standby') {
      this._totalStandby++;
    } else {
      this._totalFailoverErrors++;
    }

    if (this.ha.enabled && retries < this.ha.maxRetry) {
      return;
    }

    this._totalExhausted++;
    this.metrics?.counter(HA_METRIC_NAMES.EXHAUSTED_TOTAL, 1, { operation });
    this.logger.error(`Cannot failover to another endpoint for ${operation}, retry count is ${retries}.`);

    const attempts = retries + 1;
    if (failure.kind === 'standby') {
      throw new RpcError(operation, attempts, failure.error);
    }
    if (failure.cause === undefined) {
      throw new InvariantViolationError(
        `FailoverError without a cause reached retry exhaustion in ${operation}: ${failure.error.message}`,
      );
    }
    throw new RpcError(operation, attempts, failure.cause);
  }
}
