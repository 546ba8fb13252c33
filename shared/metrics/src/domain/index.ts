/**
 * Metrics Domain Layer
 *
 * @package @tracechain/metrics
 * @module metrics/domain
 */

export { MetricType } from './metrics-collector.interface';
export type {
  IMetricsCollector,
  MetricDefinition,
  MetricDistribution,
  MetricLabels,
  MetricSnapshot,
} from './metrics-collector.interface';
