/**
 * IMetricsCollector - Domain Contract
 *
 * Collects counters and duration summaries keyed by metric name and label
 * set. Exporters read point-in-time snapshots.
 *
 * @package @tracechain/metrics
 * @module metrics/domain
 */

export enum MetricType {
  COUNTER = 'counter',
  SUMMARY = 'summary',
}

export type MetricLabels = Record<string, string>;

export interface MetricDefinition {
  name: string;
  type: MetricType;
  /** HELP text */
  help: string;
}

/**
 * Observed distribution of a summary metric. Quantiles are computed over
 * the most recent observations only.
 */
export interface MetricDistribution {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface MetricSnapshot {
  name: string;
  type: MetricType;
  help: string;
  labels: MetricLabels;
  /** Counters only */
  value?: number;
  /** Summaries only */
  distribution?: MetricDistribution;
  /** Time of the last update (epoch ms) */
  timestamp: number;
}

export interface IMetricsCollector {
  /** Register a metric. Re-registering the same name and type is a no-op. */
  defineMetric(definition: MetricDefinition): void;

  incrementCounter(name: string, labels?: MetricLabels, delta?: number): void;

  recordSummary(name: string, value: number, labels?: MetricLabels): void;

  /** One snapshot per (metric, label set), ordered by metric definition */
  getSnapshot(): MetricSnapshot[];

  reset(): void;
}
