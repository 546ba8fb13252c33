/**
 * MetricsRegistry - Application Layer
 *
 * Service-level metrics for a chain hop. Every series carries the
 * `service` label of the owning hop.
 *
 * @package @tracechain/metrics
 * @module metrics/application
 */

import { IMetricsCollector, MetricType } from '../domain/metrics-collector.interface';
import { InMemoryMetricsCollector } from '../infrastructure/metrics-collector.impl';
import { PrometheusExporter } from '../infrastructure/prometheus-exporter.impl';

export const METRIC_NAMES = {
  HTTP_REQUESTS: 'http_server_requests_total',
  HTTP_DURATION: 'http_server_request_duration_ms',
  FORWARDS: 'chain_forward_total',
  MESSAGES_CONSUMED: 'messages_consumed_total',
} as const;

export type ForwardTransport = 'http' | 'queue' | 'exchange' | 'terminal';
export type ForwardOutcome = 'success' | 'failure';

export interface HttpRequestObservation {
  method: string;
  route: string;
  status: number;
  durationMs: number;
}

export class MetricsRegistry {
  private readonly exporter: PrometheusExporter;

  constructor(
    private readonly serviceName: string,
    private readonly collector: IMetricsCollector = new InMemoryMetricsCollector()
  ) {
    collector.defineMetric({
      name: METRIC_NAMES.HTTP_REQUESTS,
      type: MetricType.COUNTER,
      help: 'HTTP requests handled, by route and outcome',
    });
    collector.defineMetric({
      name: METRIC_NAMES.HTTP_DURATION,
      type: MetricType.SUMMARY,
      help: 'HTTP request duration in milliseconds',
    });
    collector.defineMetric({
      name: METRIC_NAMES.FORWARDS,
      type: MetricType.COUNTER,
      help: 'Next-hop forwards, by transport and outcome',
    });
    collector.defineMetric({
      name: METRIC_NAMES.MESSAGES_CONSUMED,
      type: MetricType.COUNTER,
      help: 'Broker messages processed, by queue',
    });

    this.exporter = new PrometheusExporter(collector);
  }

  recordHttpRequest(observation: HttpRequestObservation): void {
    const outcome = observation.status >= 500 ? 'error' : 'success';
    this.collector.incrementCounter(METRIC_NAMES.HTTP_REQUESTS, {
      service: this.serviceName,
      method: observation.method,
      route: observation.route,
      status: String(observation.status),
      outcome,
    });
    this.collector.recordSummary(METRIC_NAMES.HTTP_DURATION, observation.durationMs, {
      service: this.serviceName,
      route: observation.route,
    });
  }

  recordForward(transport: ForwardTransport, outcome: ForwardOutcome): void {
    this.collector.incrementCounter(METRIC_NAMES.FORWARDS, {
      service: this.serviceName,
      transport,
      outcome,
    });
  }

  recordMessageConsumed(queue: string, outcome: ForwardOutcome = 'success'): void {
    this.collector.incrementCounter(METRIC_NAMES.MESSAGES_CONSUMED, {
      service: this.serviceName,
      queue,
      outcome,
    });
  }

  /** Prometheus text exposition of every series recorded so far. */
  render(): string {
    return this.exporter.export();
  }

  reset(): void {
    this.collector.reset();
  }
}
