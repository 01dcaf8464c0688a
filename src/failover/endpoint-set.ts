/**
 * Endpoint Set — one service handle per configured address, shuffled once.
 *
 * @module
 */

import { getErrorMessage } from '../types/errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { InvalidAddressError } from './errors.js';
import { shuffleInPlace, timeSeededRandom } from './random.js';
import type { EndpointAddress, EndpointSetOptions, HAConfig, ServiceEndpoint } from './types.js';

/**
 * Split `host:port`. Both tokens must be present and non-empty.
 *
 * @throws {InvalidAddressError}
 */
export function parseEndpointAddress(address: string): EndpointAddress {
  const raw = address.trim();
  const parts = raw.split(':');
  if (parts.length !== 2 || parts[0].length === 0 || parts[1].length === 0) {
    throw new InvalidAddressError(address);
  }
  return { host: parts[0], port: parts[1], raw };
}

/**
 * HA is only meaningful with a peer to fail over to.
 */
export function deriveHaConfig(endpointCount: number, maxHaRetry: number): HAConfig {
  return endpointCount > 1
    ? { enabled: true, maxRetry: maxHaRetry }
    : { enabled: false, maxRetry: 0 };
}

/**
 * Ordered, fixed-length endpoint list. The only mutation is {@link clear}.
 */
export class EndpointSet {
  private endpoints: ServiceEndpoint[];

  constructor(endpoints: ServiceEndpoint[]) {
    this.endpoints = [...endpoints];
  }

  get length(): number {
    return this.endpoints.length;
  }

  get isEmpty(): boolean {
    return this.endpoints.length === 0;
  }

  /** Endpoint at `index` modulo the length; undefined once cleared. */
  at(index: number): ServiceEndpoint | undefined {
    if (this.endpoints.length === 0) return undefined;
    return this.endpoints[index % this.endpoints.length];
  }

  addresses(): string[] {
    return this.endpoints.map((ep) => ep.address.raw);
  }

  /** Empty the set and hand back what it held. Irreversible. */
  clear(): ServiceEndpoint[] {
    const removed = this.endpoints;
    this.endpoints = [];
    return removed;
  }
}

/**
 * Parse every address, build one endpoint per address in input order,
 * then shuffle the result once. Every address is validated before the
 * first endpoint is built. If building or shuffling fails, the endpoints
 * built so far are closed before the error is rethrown.
 *
 * @throws {InvalidAddressError} for an empty list or a malformed entry
 * @throws {RangeError} if the random source returns a value outside `[0, 1)`
 */
export function buildEndpointSet(
  addresses: readonly string[],
  options: EndpointSetOptions,
): { endpoints: EndpointSet; ha: HAConfig } {
  if (addresses.length === 0) {
    throw new InvalidAddressError('(none)', 'is empty: at least one endpoint address is required');
  }

  const parsed = addresses.map(parseEndpointAddress);
  const built: ServiceEndpoint[] = [];

  try {
    for (const address of parsed) {
      const service = options.createEndpoint({
        address,
        tokenService: options.tokenService,
        config: options.config,
        auth: options.auth,
      });
      built.push({ address, service });
    }
    shuffleInPlace(built, options.random ?? timeSeededRandom());
  } catch (err) {
    releaseEndpoints(built, options.logger ?? silentLogger);
    throw err;
  }

  return {
    endpoints: new EndpointSet(built),
    ha: deriveHaConfig(built.length, options.config.rpcMaxHaRetry),
  };
}

/**
 * Close endpoints abandoned by a failed build. Close failures are logged.
 */
function releaseEndpoints(endpoints: readonly ServiceEndpoint[], logger: Logger): void {
  for (const { address, service } of endpoints) {
    const report = (err: unknown) => {
      logger.warn(`Failed to close endpoint ${address.raw}: ${getErrorMessage(err)}`);
    };
    try {
      service.close().catch(report);
    } catch (err) {
      report(err);
    }
  }
}
