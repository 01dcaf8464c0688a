/**
 * Metric name constants reported by the failover proxy.
 *
 * @module
 */

export const HA_METRIC_NAMES = {
  CALLS_TOTAL: 'metadata_ha.calls.total',
  FAILOVERS_TOTAL: 'metadata_ha.failovers.total',
  EXHAUSTED_TOTAL: 'metadata_ha.exhausted.total',
  CALL_DURATION: 'metadata_ha.call.duration_ms',
} as const;

export type HaMetricName = (typeof HA_METRIC_NAMES)[keyof typeof HA_METRIC_NAMES];
