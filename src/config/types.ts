/**
 * Session configuration shared by the proxy and every endpoint it builds.
 *
 * @module
 */

import type { LogLevel } from '../utils/logger.js';

export interface SessionConfig {
  /** Failovers allowed per call after the first attempt. Default: 15 */
  rpcMaxHaRetry: number;
  /** Per-call transport timeout in ms. Default: 3_600_000 */
  rpcTimeoutMs: number;
  /** Connection establishment timeout in ms. Default: 600_000 */
  rpcConnectTimeoutMs: number;
  /** Idle time before a pooled connection is closed, in ms. Default: 10_000 */
  rpcMaxIdleMs: number;
  /** Keep-alive ping interval in ms. Default: 10_000 */
  rpcPingTimeoutMs: number;
  /** Minimum level for the client's own log lines. Default: 'warn' */
  logLevel: LogLevel;
}

/** Input form: any subset of {@link SessionConfig}. */
export type SessionConfigInput = Partial<SessionConfig>;
