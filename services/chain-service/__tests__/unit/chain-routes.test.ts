/**
 * Chain API Route Tests
 *
 * @see services/chain-service/src/api/index.ts
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  HttpHopPropagator,
  InMemorySpanExporter,
  MessageHopPropagator,
  NextHopClient,
  RecordingLogger,
  SpanRecorder,
} from '@tracechain/core';
import { MetricsRegistry } from '@tracechain/metrics';
import { httpGet, startTestServer } from '@tracechain/test-utils';
import type { TestServer } from '@tracechain/test-utils';
import { createChainApp } from '../../src/api';
import { ChainOrchestrator, SIMULATED_ERROR_MESSAGE } from '../../src/chain-orchestrator';

const NOW = new Date('2026-01-15T10:00:00.000Z');

describe('chain API routes', () => {
  let exporter: InMemorySpanExporter;
  let logger: RecordingLogger;
  let metrics: MetricsRegistry;
  let server: TestServer;

  beforeEach(async () => {
    exporter = new InMemorySpanExporter();
    logger = new RecordingLogger();
    metrics = new MetricsRegistry('gateway');

    const orchestrator = new ChainOrchestrator({
      serviceName: 'gateway',
      nextHop: { kind: 'terminal' },
      fanoutExchange: 'tel.fanout.exchange',
      recorder: new SpanRecorder({ serviceName: 'gateway', exporter, logger }),
      httpPropagator: new HttpHopPropagator(),
      messagePropagator: new MessageHopPropagator(),
      nextHopClient: new NextHopClient({ timeoutMs: 1000 }),
      metrics,
      logger,
      publishTimeoutMs: 250,
      delays: { processingMaxMs: 0, greetMaxMs: 0, consumerMs: 0 },
      random: () => 0,
      clock: () => NOW,
    });

    server = await startTestServer(createChainApp({ orchestrator, metrics, logger, clock: () => NOW }));
  });

  afterEach(async () => {
    await server.close();
  });

  describe('GET /api/chain', () => {
    it('should return the terminal response', async () => {
      const response = await httpGet(`${server.baseUrl}/api/chain?data=X`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        service: 'gateway',
        data: 'X',
        timestamp: '2026-01-15T10:00:00.000Z',
        traceId: exporter.getFinishedSpans()[0].traceId,
        message: 'End of chain',
      });
    });

    it('should default data to "data"', async () => {
      const response = await httpGet(`${server.baseUrl}/api/chain`);

      expect(response.body).toMatchObject({ data: 'data' });
    });

    it('should continue the trace of an incoming traceparent header', async () => {
      const response = await httpGet(`${server.baseUrl}/api/chain?data=X`, {
        traceparent: '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01',
      });

      expect(response.body).toMatchObject({ traceId: '4bf92f3577b34da6a3ce929d0e0e4736' });
      expect(exporter.getFinishedSpans()[0].parentSpanId).toBe('00f067aa0ba902b7');
    });
  });

  describe('GET /api/process', () => {
    it('should behave like /api/chain under its own route', async () => {
      const response = await httpGet(`${server.baseUrl}/api/process?data=Y`);

      expect(response.body).toMatchObject({ service: 'gateway', data: 'Y', message: 'End of chain' });
      expect(exporter.findByName('http get /api/process')).toHaveLength(1);
    });
  });

  describe('GET /api/greet', () => {
    it('should greet World by default', async () => {
      const response = await httpGet(`${server.baseUrl}/api/greet`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ message: 'hello', name: 'World', timestamp: '2026-01-15T10:00:00.000Z' });
    });

    it('should greet the given name', async () => {
      const response = await httpGet(`${server.baseUrl}/api/greet?name=tracer`);

      expect(response.body).toMatchObject({ name: 'tracer' });
    });
  });

  describe('GET /api/error', () => {
    it('should answer 500 with the trace id of the failed span', async () => {
      const response = await httpGet(`${server.baseUrl}/api/error`);

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        service: 'gateway',
        error: SIMULATED_ERROR_MESSAGE,
        traceId: exporter.getFinishedSpans()[0].traceId,
        timestamp: '2026-01-15T10:00:00.000Z',
      });
      expect(logger.hasLogMatching('error', 'Unhandled request error')).toBe(true);
    });
  });

  describe('GET /api/fanout without a broker', () => {
    it('should report the publish failure in a 200 response', async () => {
      const response = await httpGet(`${server.baseUrl}/api/fanout?data=F`);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        data: 'F',
        error: 'Failed to publish to exchange tel.fanout.exchange: Message broker is not configured',
      });
    });
  });

  describe('actuator', () => {
    it('should report health', async () => {
      const response = await httpGet(`${server.baseUrl}/actuator/health`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'UP', service: 'gateway' });
      expect(exporter.getFinishedSpans()).toHaveLength(0);
    });

    it('should expose request counters in Prometheus text format', async () => {
      await httpGet(`${server.baseUrl}/api/chain?data=X`);

      const response = await httpGet(`${server.baseUrl}/actuator/prometheus`);

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/^text\/plain; version=0\.0\.4/);
      expect(response.text).toContain('# TYPE http_server_requests_total counter');
      expect(response.text).toContain(
        'http_server_requests_total{service="gateway",method="GET",route="/api/chain",status="200",outcome="success"} 1'
      );
    });

    it('should count requests no route matched under one label', async () => {
      await httpGet(`${server.baseUrl}/api/unknown-1`);
      await httpGet(`${server.baseUrl}/favicon-2.ico`);

      const response = await httpGet(`${server.baseUrl}/actuator/prometheus`);

      expect(response.text).toContain(
        'http_server_requests_total{service="gateway",method="GET",route="unmatched",status="404",outcome="success"} 2'
      );
      expect(response.text).not.toContain('route="/api/unknown-1"');
    });
  });
});
