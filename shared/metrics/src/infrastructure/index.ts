/**
 * Metrics Infrastructure Layer
 *
 * @package @tracechain/metrics
 * @module metrics/infrastructure
 */

export * from './metrics-collector.impl';
export * from './prometheus-exporter.impl';
