/**
 * PrometheusExporter - Infrastructure Layer
 *
 * Renders collector snapshots in the Prometheus text exposition format
 * served at `/actuator/prometheus`.
 *
 * @see https://prometheus.io/docs/instrumenting/exposition_formats/
 *
 * @package @tracechain/metrics
 * @module metrics/infrastructure
 */

import {
  IMetricsCollector,
  MetricLabels,
  MetricSnapshot,
  MetricType,
} from '../domain/metrics-collector.interface';

export interface PrometheusExportConfig {
  /** Prepended to every metric name */
  metricPrefix: string;
  /** Labels added to every series; series labels win on conflict */
  defaultLabels: MetricLabels;
  /** Append the last-update time to each sample line */
  includeTimestamps: boolean;
}

const DEFAULT_CONFIG: PrometheusExportConfig = {
  metricPrefix: '',
  defaultLabels: {},
  includeTimestamps: false,
};

/**
 * Format:
 * ```
 * # HELP metric_name Description of metric
 * # TYPE metric_name counter
 * metric_name{label1="value1"} 42
 * ```
 *
 * @example
 * ```typescript
 * const exporter = new PrometheusExporter(collector, { defaultLabels: { application: 'service-a' } });
 * res.type('text/plain').send(exporter.export());
 * ```
 */
export class PrometheusExporter {
  private readonly config: PrometheusExportConfig;
  private readonly helpers = new PrometheusHelpers();

  constructor(
    private readonly collector: IMetricsCollector,
    config: Partial<PrometheusExportConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  export(): string {
    const lines: string[] = [];

    const grouped = new Map<string, MetricSnapshot[]>();
    for (const metric of this.collector.getSnapshot()) {
      const name = this.helpers.formatMetricName(this.config.metricPrefix + metric.name);
      const group = grouped.get(name) ?? [];
      group.push(metric);
      grouped.set(name, group);
    }

    for (const [name, metrics] of grouped) {
      const first = metrics[0];
      lines.push(this.helpers.generateHelpText(name, first.help));
      lines.push(this.helpers.generateTypeText(name, first.type));

      for (const metric of metrics) {
        const timestamp = this.config.includeTimestamps ? ` ${metric.timestamp}` : '';

        if (metric.type === MetricType.COUNTER) {
          lines.push(`${name}${this.formatLabels(metric.labels)} ${metric.value ?? 0}${timestamp}`);
          continue;
        }

        const dist = metric.distribution;
        if (!dist) continue;
        lines.push(`${name}${this.formatLabels({ ...metric.labels, quantile: '0.5' })} ${dist.p50}${timestamp}`);
        lines.push(`${name}${this.formatLabels({ ...metric.labels, quantile: '0.95' })} ${dist.p95}${timestamp}`);
        lines.push(`${name}${this.formatLabels({ ...metric.labels, quantile: '0.99' })} ${dist.p99}${timestamp}`);
        lines.push(`${name}_sum${this.formatLabels(metric.labels)} ${dist.sum}${timestamp}`);
        lines.push(`${name}_count${this.formatLabels(metric.labels)} ${dist.count}${timestamp}`);
      }
    }

    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  /**
   * Format: {label1="value1",label2="value2"}
   */
  private formatLabels(labels: MetricLabels): string {
    const entries = Object.entries({ ...this.config.defaultLabels, ...labels });
    if (entries.length === 0) {
      return '';
    }
    const pairs = entries.map(([key, value]) => `${key}="${this.helpers.escapeLabelValue(value)}"`);
    return `{${pairs.join(',')}}`;
  }
}

export class PrometheusHelpers {
  /**
   * Escapes: \, ", \n
   */
  escapeLabelValue(value: string): string {
    return value
      .replace(/\\/g, '\\\\')
      .replace(/"/g, '\\"')
      .replace(/\n/g, '\\n');
  }

  /**
   * Lowercase, non-alphanumerics folded to single underscores.
   */
  formatMetricName(name: string): string {
    return name
      .toLowerCase()
      .replace(/[^a-z0-9_]/g, '_')
      .replace(/_+/g, '_');
  }

  generateHelpText(name: string, description: string): string {
    return `# HELP ${name} ${description.replace(/\\/g, '\\\\').replace(/\n/g, '\\n')}`;
  }

  generateTypeText(name: string, type: string): string {
    return `# TYPE ${name} ${type}`;
  }
}
