/**
 * InMemoryMetricsCollector - Infrastructure Layer
 *
 * Process-local implementation of IMetricsCollector. Summaries keep a
 * bounded window of recent observations for quantiles; count and sum cover
 * every observation.
 *
 * @package @tracechain/metrics
 * @module metrics/infrastructure
 */

import {
  IMetricsCollector,
  MetricDefinition,
  MetricDistribution,
  MetricLabels,
  MetricSnapshot,
  MetricType,
} from '../domain/metrics-collector.interface';

interface CounterSeries {
  labels: MetricLabels;
  value: number;
  timestamp: number;
}

interface SummarySeries {
  labels: MetricLabels;
  count: number;
  sum: number;
  window: number[];
  timestamp: number;
}

interface MetricState {
  definition: MetricDefinition;
  counters: Map<string, CounterSeries>;
  summaries: Map<string, SummarySeries>;
}

export interface InMemoryMetricsCollectorOptions {
  /** Observations kept per summary series for quantiles (default: 1024) */
  summaryWindowSize?: number;
  clock?: () => number;
}

export class InMemoryMetricsCollector implements IMetricsCollector {
  private readonly metrics = new Map<string, MetricState>();
  private readonly summaryWindowSize: number;
  private readonly clock: () => number;

  constructor(options: InMemoryMetricsCollectorOptions = {}) {
    this.summaryWindowSize = options.summaryWindowSize ?? 1024;
    this.clock = options.clock ?? Date.now;
  }

  defineMetric(definition: MetricDefinition): void {
    const existing = this.metrics.get(definition.name);
    if (existing) {
      if (existing.definition.type !== definition.type) {
        throw new Error(
          `Metric ${definition.name} already defined as ${existing.definition.type}, cannot redefine as ${definition.type}`
        );
      }
      return;
    }
    this.metrics.set(definition.name, {
      definition,
      counters: new Map(),
      summaries: new Map(),
    });
  }

  incrementCounter(name: string, labels: MetricLabels = {}, delta = 1): void {
    if (!(delta >= 0)) {
      throw new RangeError(`Counter ${name} cannot be incremented by ${delta}`);
    }
    const state = this.requireMetric(name, MetricType.COUNTER);
    const key = labelKey(labels);
    const series = state.counters.get(key) ?? { labels: { ...labels }, value: 0, timestamp: 0 };
    series.value += delta;
    series.timestamp = this.clock();
    state.counters.set(key, series);
  }

  recordSummary(name: string, value: number, labels: MetricLabels = {}): void {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = this.requireMetric(name, MetricType.SUMMARY);
    const key = labelKey(labels);
    const series = state.summaries.get(key) ?? {
      labels: { ...labels },
      count: 0,
      sum: 0,
      window: [],
      timestamp: 0,
    };
    series.count++;
    series.sum += value;
    series.window.push(value);
    if (series.window.length > this.summaryWindowSize) {
      series.window.shift();
    }
    series.timestamp = this.clock();
    state.summaries.set(key, series);
  }

  getSnapshot(): MetricSnapshot[] {
    const snapshot: MetricSnapshot[] = [];

    for (const { definition, counters, summaries } of this.metrics.values()) {
      for (const series of counters.values()) {
        snapshot.push({
          name: definition.name,
          type: definition.type,
          help: definition.help,
          labels: { ...series.labels },
          value: series.value,
          timestamp: series.timestamp,
        });
      }
      for (const series of summaries.values()) {
        snapshot.push({
          name: definition.name,
          type: definition.type,
          help: definition.help,
          labels: { ...series.labels },
          distribution: distributionOf(series),
          timestamp: series.timestamp,
        });
      }
    }

    return snapshot;
  }

  /**
   * Drop all observations. Definitions are kept.
   */
  reset(): void {
    for (const state of this.metrics.values()) {
      state.counters.clear();
      state.summaries.clear();
    }
  }

  private requireMetric(name: string, type: MetricType): MetricState {
    const state = this.metrics.get(name);
    if (!state) {
      throw new Error(`Metric ${name} is not defined`);
    }
    if (state.definition.type !== type) {
      throw new Error(`Metric ${name} is a ${state.definition.type}, not a ${type}`);
    }
    return state;
  }
}

function labelKey(labels: MetricLabels): string {
  return Object.keys(labels)
    .sort()
    .map(key => `${key}=${labels[key]}`)
    .join('\u0000');
}

function distributionOf(series: SummarySeries): MetricDistribution {
  const sorted = [...series.window].sort((a, b) => a - b);
  return {
    count: series.count,
    sum: series.sum,
    p50: quantile(sorted, 0.5),
    p95: quantile(sorted, 0.95),
    p99: quantile(sorted, 0.99),
  };
}

/**
 * Nearest-rank quantile of an ascending list; 0 for an empty list.
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const rank = Math.ceil(q * sorted.length);
  return sorted[Math.min(Math.max(rank, 1), sorted.length) - 1];
}
