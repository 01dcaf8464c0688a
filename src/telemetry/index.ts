/**
 * Telemetry module.
 *
 * @module
 */

export type { MetricsProvider } from './types.js';
export { HA_METRIC_NAMES, type HaMetricName } from './metric-names.js';
