/**
 * Configuration, classification and stats types for the failover proxy.
 *
 * @module
 */

import type { RemoteMetadataService, RpcAuth } from '../metadata/types.js';
import type { SessionConfig, SessionConfigInput } from '../config/types.js';
import type { Logger } from '../utils/logger.js';
import type { MetricsProvider } from '../telemetry/types.js';
import type { RandomSource } from './random.js';

// ============================================================================
// Endpoints
// ============================================================================

/** A `host:port` address split into its two tokens. */
export interface EndpointAddress {
  host: string;
  port: string;
  /** The address exactly as configured */
  raw: string;
}

/** Everything an endpoint transport needs to open its channel. */
export interface EndpointContext {
  address: EndpointAddress;
  /** Cluster name used to select delegation tokens */
  tokenService: string;
  config: SessionConfig;
  auth: RpcAuth;
}

/**
 * Builds one endpoint handle. Called once per address at construction.
 */
export type EndpointFactory = (context: EndpointContext) => RemoteMetadataService;

/** An endpoint handle with the address it was built for. */
export interface ServiceEndpoint {
  address: EndpointAddress;
  service: RemoteMetadataService;
}

export interface HAConfig {
  /** True when more than one endpoint is configured */
  enabled: boolean;
  /** Failovers allowed per call; 0 when disabled */
  maxRetry: number;
}

export interface EndpointSetOptions {
  tokenService: string;
  config: SessionConfig;
  auth: RpcAuth;
  createEndpoint: EndpointFactory;
  /** Source for the initial shuffle. Default: seeded from `Date.now()` */
  random?: RandomSource;
  /** Receives close failures of endpoints abandoned by a failed build */
  logger?: Logger;
}

export interface MetadataServiceProxyConfig {
  /** Endpoint addresses, each `host:port` (at least 1) */
  addresses: string[];
  tokenService: string;
  /** Session config; missing fields take defaults */
  config?: SessionConfigInput;
  auth: RpcAuth;
  createEndpoint: EndpointFactory;
  random?: RandomSource;
  logger?: Logger;
  metrics?: MetricsProvider;
}

// ============================================================================
// Failure classification
// ============================================================================

/**
 * How a failed call affects placement.
 *
 * - `standby`: a live endpoint said it is not active.
 * - `failover`: channel failure; `cause` is the unwrapped underlying error.
 * - `other`: not a placement failure; rethrown untouched.
 */
export type FailureClass =
  | { kind: 'standby'; error: Error }
  | { kind: 'failover'; error: Error; cause?: unknown }
  | { kind: 'other' };

// ============================================================================
// Stats
// ============================================================================

export interface FailoverStats {
  totalCalls: number;
  totalFailovers: number;
  totalStandby: number;
  totalFailoverErrors: number;
  totalExhausted: number;
  /** Address of the endpoint currently believed active, null once closed */
  activeEndpoint: string | null;
  endpointCount: number;
}
