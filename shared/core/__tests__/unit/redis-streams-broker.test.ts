/**
 * RedisStreamsBroker Tests
 *
 * Queue and fanout exchange semantics on top of the in-process
 * RedisStreamsMock.
 *
 * @see shared/core/src/messaging/redis-streams-broker.ts
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { Delivery, TopologyDeclaration } from '@tracechain/types';
import { RedisStreamsMock, waitFor } from '@tracechain/test-utils';
import { ErrorCode, PublishError, TraceChainError } from '../../src/error-handling';
import { RecordingLogger } from '../../src/logging/testing-logger';
import { RedisStreamsBroker, encodeMessage } from '../../src/messaging/redis-streams-broker';

const TOPOLOGY: TopologyDeclaration = {
  queues: ['tel.chain.queue', 'tel.fanout.queue.a', 'tel.fanout.queue.b', 'tel.fanout.queue.c'],
  exchanges: {
    'tel.fanout.exchange': ['tel.fanout.queue.a', 'tel.fanout.queue.b', 'tel.fanout.queue.c'],
  },
};

describe('RedisStreamsBroker', () => {
  let redis: RedisStreamsMock;
  let logger: RecordingLogger;
  let broker: RedisStreamsBroker;

  beforeEach(() => {
    redis = new RedisStreamsMock();
    logger = new RecordingLogger();
    broker = new RedisStreamsBroker(redis.factory, { consumerName: 'test-consumer', blockMs: 20, logger });
  });

  afterEach(async () => {
    await broker.close();
  });

  // ===========================================================================
  // Encoding
  // ===========================================================================

  describe('encodeMessage', () => {
    it('should store the body as JSON and headers as prefixed fields', () => {
      expect(encodeMessage({
        body: { data: 'X', source_service: 'gateway' },
        properties: { headers: { traceId: 'abc', spanId: 'def' } },
      })).toEqual({
        data: '{"data":"X","source_service":"gateway"}',
        'header:traceId': 'abc',
        'header:spanId': 'def',
      });
    });
  });

  // ===========================================================================
  // Topology
  // ===========================================================================

  describe('declareTopology', () => {
    it('should create one group per queue and per bound queue on the exchange stream', async () => {
      await broker.declareTopology(TOPOLOGY);

      expect(redis.getGroupNames('tel.chain.queue')).toEqual(['tel.chain.queue']);
      expect(redis.getGroupNames('tel.fanout.exchange')).toEqual([
        'tel.fanout.queue.a',
        'tel.fanout.queue.b',
        'tel.fanout.queue.c',
      ]);
    });

    it('should be idempotent', async () => {
      await broker.declareTopology(TOPOLOGY);
      await expect(broker.declareTopology(TOPOLOGY)).resolves.toBeUndefined();
    });
  });

  // ===========================================================================
  // Publish / subscribe
  // ===========================================================================

  describe('publish', () => {
    it('should deliver a queue message to one subscriber with body and headers', async () => {
      await broker.declareTopology(TOPOLOGY);
      const deliveries: Delivery[] = [];
      await broker.subscribe('tel.chain.queue', async (delivery) => { deliveries.push(delivery); });

      const id = await broker.publish(
        { type: 'queue', name: 'tel.chain.queue' },
        { body: { data: 'X' }, properties: { headers: { traceparent: 'tp' } } }
      );
      await waitFor(() => deliveries.length === 1);

      expect(deliveries[0]).toEqual({
        id,
        queue: 'tel.chain.queue',
        body: { data: 'X' },
        properties: { headers: { traceparent: 'tp' } },
      });
    });

    it('should give every bound queue its own copy of an exchange message', async () => {
      await broker.declareTopology(TOPOLOGY);
      const received: string[] = [];
      for (const queue of TOPOLOGY.exchanges['tel.fanout.exchange']) {
        await broker.subscribe(queue, async (delivery) => { received.push(delivery.queue); });
      }

      await broker.publish(
        { type: 'exchange', name: 'tel.fanout.exchange' },
        { body: { data: 'fan' }, properties: { headers: {} } }
      );
      await waitFor(() => received.length === 3);

      expect([...received].sort()).toEqual(['tel.fanout.queue.a', 'tel.fanout.queue.b', 'tel.fanout.queue.c']);
    });

    it('should not deliver messages published before the queue was declared', async () => {
      await broker.publish({ type: 'queue', name: 'tel.chain.queue' }, { body: { n: 1 }, properties: { headers: {} } });
      await broker.declareTopology(TOPOLOGY);
      const deliveries: Delivery[] = [];
      await broker.subscribe('tel.chain.queue', async (delivery) => { deliveries.push(delivery); });

      await broker.publish({ type: 'queue', name: 'tel.chain.queue' }, { body: { n: 2 }, properties: { headers: {} } });
      await waitFor(() => deliveries.length === 1);

      expect(deliveries[0].body).toEqual({ n: 2 });
    });

    it('should wrap broker failures in PublishError', async () => {
      redis.failNext('XADD', new Error('READONLY You can\'t write against a read only replica.'));

      const result = broker.publish({ type: 'queue', name: 'tel.chain.queue' }, { body: {}, properties: { headers: {} } });

      await expect(result).rejects.toBeInstanceOf(PublishError);
      await expect(
        broker.publish({ type: 'queue', name: 'bad name' }, { body: {}, properties: { headers: {} } })
      ).rejects.toThrow('Invalid stream name: contains unsafe characters');
    });

    it('should time out a publish that never completes', async () => {
      const hanging = new RedisStreamsBroker(
        () => ({ send: () => new Promise<unknown>(() => undefined), close: async () => undefined }),
        { defaultPublishTimeoutMs: 20 }
      );

      await expect(
        hanging.publish({ type: 'queue', name: 'tel.chain.queue' }, { body: {}, properties: { headers: {} } })
      ).rejects.toThrow('Timeout: publish to queue tel.chain.queue exceeded 20ms');
      await hanging.close();
    });
  });

  // ===========================================================================
  // Delivery edge cases
  // ===========================================================================

  describe('subscribe', () => {
    it('should deliver an empty body and warn for non-JSON data', async () => {
      await broker.declareTopology(TOPOLOGY);
      const deliveries: Delivery[] = [];
      await broker.subscribe('tel.chain.queue', async (delivery) => { deliveries.push(delivery); });

      await redis.connect('raw').send('XADD', ['tel.chain.queue', '*', 'data', 'not json', 'header:traceId', 'abc']);
      await waitFor(() => deliveries.length === 1);

      expect(deliveries[0].body).toEqual({});
      expect(deliveries[0].properties.headers).toEqual({ traceId: 'abc' });
      expect(logger.hasLogMatching('warn', 'Message body is not a JSON object')).toBe(true);
    });

    it('should leave a message pending when the handler throws', async () => {
      await broker.declareTopology(TOPOLOGY);
      let attempts = 0;
      await broker.subscribe('tel.chain.queue', async () => {
        attempts++;
        throw new Error('consumer failed');
      });

      const id = await broker.publish({ type: 'queue', name: 'tel.chain.queue' }, { body: {}, properties: { headers: {} } });
      await waitFor(() => attempts === 1);

      await waitFor(() => logger.hasLogMatching('error', 'Stream message handler failed'));
      expect(redis.getPending('tel.chain.queue', 'tel.chain.queue')).toEqual([id]);
    });

    it('should release its connections on unsubscribe', async () => {
      await broker.declareTopology(TOPOLOGY);
      const subscription = await broker.subscribe('tel.fanout.queue.a', async () => undefined);
      const before = redis.openConnectionCount;

      await subscription.unsubscribe();

      // queue stream and exchange stream
      expect(redis.openConnectionCount).toBe(before - 2);
      expect(subscription.queue).toBe('tel.fanout.queue.a');
    });

    it('should release the connections of a subscription that fails to set up', async () => {
      await broker.declareTopology(TOPOLOGY);
      redis.failNext(
        'XGROUP',
        new Error('NOPERM this user has no permissions'),
        'consumer:tel.fanout.queue.a:tel.fanout.exchange'
      );

      await expect(broker.subscribe('tel.fanout.queue.a', async () => undefined)).rejects.toThrow('NOPERM');
      // publisher only
      expect(redis.openConnectionCount).toBe(1);

      await broker.close();
      expect(redis.openConnectionCount).toBe(0);
    });

    it('should refuse to subscribe or publish after close', async () => {
      await broker.close();

      const subscribing = broker.subscribe('tel.chain.queue', async () => undefined);
      await expect(subscribing).rejects.toBeInstanceOf(TraceChainError);
      await expect(broker.subscribe('tel.chain.queue', async () => undefined)).rejects.toMatchObject({
        code: ErrorCode.CONNECTION_CLOSED,
      });
      await expect(
        broker.publish({ type: 'queue', name: 'tel.chain.queue' }, { body: {}, properties: { headers: {} } })
      ).rejects.toThrow('Broker is closed');
    });

    it('should close every connection on close', async () => {
      await broker.declareTopology(TOPOLOGY);
      await broker.subscribe('tel.chain.queue', async () => undefined);
      await broker.subscribe('tel.fanout.queue.b', async () => undefined);

      await broker.close();

      expect(redis.openConnectionCount).toBe(0);
    });
  });
});
