/**
 * Metrics hook for the failover proxy.
 *
 * Sinks are provided by the application; the proxy only reports.
 *
 * @module
 */

export interface MetricsProvider {
  counter(name: string, value?: number, labels?: Record<string, string>): void;
  histogram(name: string, value: number, labels?: Record<string, string>): void;
}
