/**
 * InMemoryMetricsCollector Unit Tests
 *
 * @see metrics/infrastructure/metrics-collector.impl.ts
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  InMemoryMetricsCollector,
  quantile,
} from '../../src/infrastructure/metrics-collector.impl';
import { MetricType } from '../../src/domain/metrics-collector.interface';

describe('InMemoryMetricsCollector', () => {
  let collector: InMemoryMetricsCollector;

  beforeEach(() => {
    collector = new InMemoryMetricsCollector({ clock: () => 1000, summaryWindowSize: 4 });
    collector.defineMetric({ name: 'hits', type: MetricType.COUNTER, help: 'Hits' });
    collector.defineMetric({ name: 'latency', type: MetricType.SUMMARY, help: 'Latency' });
  });

  describe('counters', () => {
    it('should accumulate per label set regardless of label order', () => {
      collector.incrementCounter('hits', { a: '1', b: '2' });
      collector.incrementCounter('hits', { b: '2', a: '1' }, 2);
      collector.incrementCounter('hits', { a: 'other' });

      const snapshot = collector.getSnapshot();

      expect(snapshot).toEqual([
        { name: 'hits', type: MetricType.COUNTER, help: 'Hits', labels: { a: '1', b: '2' }, value: 3, timestamp: 1000 },
        { name: 'hits', type: MetricType.COUNTER, help: 'Hits', labels: { a: 'other' }, value: 1, timestamp: 1000 },
      ]);
    });

    it('should reject negative increments', () => {
      expect(() => collector.incrementCounter('hits', {}, -1)).toThrow(RangeError);
    });

    it('should reject undefined metrics and type mismatches', () => {
      expect(() => collector.incrementCounter('missing')).toThrow('Metric missing is not defined');
      expect(() => collector.incrementCounter('latency')).toThrow('Metric latency is a summary, not a counter');
    });
  });

  describe('summaries', () => {
    it('should track count and sum over all observations but quantiles over the window', () => {
      for (const value of [100, 1, 2, 3, 4]) {
        collector.recordSummary('latency', value);
      }

      const [series] = collector.getSnapshot();

      expect(series.distribution).toEqual({ count: 5, sum: 110, p50: 2, p95: 4, p99: 4 });
    });

    it('should ignore non-finite observations', () => {
      collector.recordSummary('latency', Number.NaN);

      expect(collector.getSnapshot()).toEqual([]);
    });
  });

  describe('defineMetric', () => {
    it('should accept re-definition with the same type', () => {
      expect(() =>
        collector.defineMetric({ name: 'hits', type: MetricType.COUNTER, help: 'Other help' })
      ).not.toThrow();
    });

    it('should refuse re-definition with another type', () => {
      expect(() =>
        collector.defineMetric({ name: 'hits', type: MetricType.SUMMARY, help: 'Hits' })
      ).toThrow('Metric hits already defined as counter, cannot redefine as summary');
    });
  });

  it('should keep definitions across reset', () => {
    collector.incrementCounter('hits');
    collector.reset();

    expect(collector.getSnapshot()).toEqual([]);
    collector.incrementCounter('hits');
    expect(collector.getSnapshot()).toHaveLength(1);
  });
});

describe('quantile', () => {
  it('should use the nearest rank', () => {
    const sorted = [10, 20, 30, 40];

    expect(quantile(sorted, 0.5)).toBe(20);
    expect(quantile(sorted, 0.95)).toBe(40);
    expect(quantile(sorted, 0)).toBe(10);
  });

  it('should return 0 for an empty list', () => {
    expect(quantile([], 0.5)).toBe(0);
  });
});
