/**
 * Metrics Application Layer
 *
 * @package @tracechain/metrics
 * @module metrics/application
 */

export * from './metrics-registry';
