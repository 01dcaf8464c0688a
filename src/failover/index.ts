/**
 * Failover module — client-side HA across redundant metadata endpoints.
 *
 * @module
 */

export type {
  EndpointAddress,
  EndpointContext,
  EndpointFactory,
  ServiceEndpoint,
  HAConfig,
  EndpointSetOptions,
  MetadataServiceProxyConfig,
  FailureClass,
  FailoverStats,
} from './types.js';

export {
  InvalidAddressError,
  ClosedError,
  StandbyError,
  FailoverError,
  RpcError,
  InvariantViolationError,
} from './errors.js';

export { SeededRandom, timeSeededRandom, shuffleInPlace, type RandomSource } from './random.js';
export { EndpointSet, buildEndpointSet, parseEndpointAddress, deriveHaConfig } from './endpoint-set.js';
export { ActivePointer, type ActiveSnapshot } from './active-pointer.js';
export {
  RetryCoordinator,
  classifyFailure,
  type RetryCoordinatorOptions,
  type EndpointOperation,
} from './retry.js';
export { MetadataServiceProxy } from './proxy.js';
