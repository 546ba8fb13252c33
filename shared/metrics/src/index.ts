/**
 * @tracechain/metrics - Metrics Collection and Export
 *
 * In-process counters and duration summaries with Prometheus text
 * exposition.
 *
 * @package @tracechain/metrics
 */

// Domain Layer
export * from './domain';

// Application Layer
export * from './application';

// Infrastructure Layer
export * from './infrastructure';
