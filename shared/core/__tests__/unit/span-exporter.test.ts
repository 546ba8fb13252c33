/**
 * Span Exporter Tests
 *
 * @see shared/core/src/tracing/span-exporter.ts
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import type { FinishedSpan } from '@tracechain/types';
import { createFetchRecorder } from '@tracechain/test-utils';
import {
  InMemorySpanExporter,
  OtlpHttpSpanExporter,
  toOtlpSpan,
} from '../../src/tracing/span-exporter';

const TRACE_ID = '4bf92f3577b34da6a3ce929d0e0e4736';

function finishedSpan(overrides: Partial<FinishedSpan> = {}): FinishedSpan {
  return {
    traceId: TRACE_ID,
    spanId: '00f067aa0ba902b7',
    parentSpanId: 'b7ad6b7169203331',
    sampled: true,
    name: 'tel.chain.queue receive',
    kind: 'CONSUMER',
    serviceName: 'service-c',
    attributes: { 'messaging.system': 'redis', 'request.size': 3, ratio: 0.5, fanout: false },
    status: { code: 'OK' },
    startTimeMs: 1_700_000_000_000,
    endTimeMs: 1_700_000_000_025,
    ...overrides,
  };
}

describe('InMemorySpanExporter', () => {
  it('should keep exported spans and find them', () => {
    const exporter = new InMemorySpanExporter();
    exporter.export(finishedSpan({ name: 'a' }));
    exporter.export(finishedSpan({ name: 'b', traceId: 'f'.repeat(32) }));

    expect(exporter.getFinishedSpans().map(span => span.name)).toEqual(['a', 'b']);
    expect(exporter.findByName('b')).toHaveLength(1);
    expect(exporter.findByTraceId(TRACE_ID).map(span => span.name)).toEqual(['a']);
  });

  it('should clear on reset and ignore spans after shutdown', async () => {
    const exporter = new InMemorySpanExporter();
    exporter.export(finishedSpan());
    exporter.reset();
    expect(exporter.getFinishedSpans()).toHaveLength(0);

    await exporter.shutdown();
    exporter.export(finishedSpan());
    expect(exporter.getFinishedSpans()).toHaveLength(0);
  });
});

describe('toOtlpSpan', () => {
  it('should convert identity, kind, timing and attributes', () => {
    expect(toOtlpSpan(finishedSpan())).toEqual({
      traceId: TRACE_ID,
      spanId: '00f067aa0ba902b7',
      parentSpanId: 'b7ad6b7169203331',
      name: 'tel.chain.queue receive',
      kind: 5,
      startTimeUnixNano: '1700000000000000000',
      endTimeUnixNano: '1700000000025000000',
      attributes: [
        { key: 'messaging.system', value: { stringValue: 'redis' } },
        { key: 'request.size', value: { intValue: '3' } },
        { key: 'ratio', value: { doubleValue: 0.5 } },
        { key: 'fanout', value: { boolValue: false } },
      ],
      status: { code: 1 },
    });
  });

  it('should map ERROR status and omit a missing parent', () => {
    const otlp = toOtlpSpan(finishedSpan({
      kind: 'SERVER',
      parentSpanId: undefined,
      status: { code: 'ERROR', description: 'ECONNREFUSED' },
    }));

    expect(otlp.kind).toBe(2);
    expect(otlp.status).toEqual({ code: 2, message: 'ECONNREFUSED' });
    expect('parentSpanId' in otlp).toBe(false);
  });
});

describe('OtlpHttpSpanExporter', () => {
  const exporters: OtlpHttpSpanExporter[] = [];

  afterEach(async () => {
    await Promise.all(exporters.splice(0).map(exporter => exporter.shutdown()));
  });

  function createExporter(
    recorder: ReturnType<typeof createFetchRecorder>,
    options: { batchSize?: number; maxQueueSize?: number } = {}
  ): OtlpHttpSpanExporter {
    const exporter = new OtlpHttpSpanExporter({
      endpoint: 'http://collector:4318',
      serviceName: 'service-c',
      resourceAttributes: { 'service.version': '1.0.0' },
      flushIntervalMs: 60_000,
      ...options,
    }, { fetchImpl: recorder.fetchImpl });
    exporters.push(exporter);
    return exporter;
  }

  it('should be a noop without configuration', async () => {
    const recorder = createFetchRecorder();
    const exporter = new OtlpHttpSpanExporter(undefined, { fetchImpl: recorder.fetchImpl });

    exporter.export(finishedSpan());
    await exporter.shutdown();

    expect(exporter.isNoop).toBe(true);
    expect(exporter.pendingCount).toBe(0);
    expect(recorder.requests).toHaveLength(0);
  });

  it('should POST batched spans to /v1/traces on flush', async () => {
    const recorder = createFetchRecorder();
    const exporter = createExporter(recorder);

    exporter.export(finishedSpan());
    exporter.export(finishedSpan({ spanId: 'a1b2c3d4e5f60718' }));
    expect(exporter.pendingCount).toBe(2);

    await exporter.flush();

    expect(recorder.requests).toHaveLength(1);
    expect(recorder.requests[0].url).toBe('http://collector:4318/v1/traces');
    expect(recorder.requests[0].method).toBe('POST');
    expect(recorder.requests[0].headers['content-type']).toBe('application/json');

    expect(recorder.jsonBodies()[0]).toEqual({
      resourceSpans: [
        {
          resource: {
            attributes: [
              { key: 'service.version', value: { stringValue: '1.0.0' } },
              { key: 'service.name', value: { stringValue: 'service-c' } },
            ],
          },
          scopeSpans: [
            {
              scope: { name: '@tracechain/core', version: '1.0.0' },
              spans: [toOtlpSpan(finishedSpan()), toOtlpSpan(finishedSpan({ spanId: 'a1b2c3d4e5f60718' }))],
            },
          ],
        },
      ],
    });
    expect(exporter.exportCount).toBe(2);
    expect(exporter.pendingCount).toBe(0);
  });

  it('should not POST when nothing is pending', async () => {
    const recorder = createFetchRecorder();
    const exporter = createExporter(recorder);

    await exporter.flush();

    expect(recorder.requests).toHaveLength(0);
  });

  it('should count rejected and failed batches as dropped', async () => {
    let call = 0;
    const recorder = createFetchRecorder(() => {
      call++;
      if (call === 1) return new Response('', { status: 503 });
      throw new TypeError('fetch failed');
    });
    const exporter = createExporter(recorder);

    exporter.export(finishedSpan());
    await exporter.flush();
    exporter.export(finishedSpan());
    exporter.export(finishedSpan());
    await expect(exporter.flush()).resolves.toBeUndefined();

    expect(exporter.dropCount).toBe(3);
    expect(exporter.exportCount).toBe(0);
  });

  it('should drop the oldest spans beyond maxQueueSize', async () => {
    const recorder = createFetchRecorder();
    const exporter = createExporter(recorder, { maxQueueSize: 2 });

    exporter.export(finishedSpan({ name: 'first' }));
    exporter.export(finishedSpan({ name: 'second' }));
    exporter.export(finishedSpan({ name: 'third' }));

    expect(exporter.pendingCount).toBe(2);
    expect(exporter.dropCount).toBe(1);

    await exporter.flush();
    expect(recorder.requests[0].body).toContain('"name":"second"');
    expect(recorder.requests[0].body).not.toContain('"name":"first"');
  });

  it('should flush on its own once a batch is full', async () => {
    const recorder = createFetchRecorder();
    const exporter = createExporter(recorder, { batchSize: 2 });

    exporter.export(finishedSpan());
    exporter.export(finishedSpan());
    await exporter.flush();

    expect(recorder.requests).toHaveLength(1);
    expect(exporter.exportCount).toBe(2);
  });
});
