import { describe, it, expect } from '@jest/globals';
import { BrokerTopology, FANOUT_CONSUMER_NAMES, SPAN_KINDS, TimeoutError } from '../../src';

describe('TimeoutError', () => {
  it('creates with operation and timeout', () => {
    const err = new TimeoutError('publish to queue tel.chain.queue', 5000);
    expect(err.operation).toBe('publish to queue tel.chain.queue');
    expect(err.timeoutMs).toBe(5000);
    expect(err.service).toBeUndefined();
    expect(err.message).toBe('Timeout: publish to queue tel.chain.queue exceeded 5000ms');
    expect(err.name).toBe('TimeoutError');
  });

  it('includes service in message when provided', () => {
    const err = new TimeoutError('GET /api/chain', 3000, 'gateway');
    expect(err.service).toBe('gateway');
    expect(err.message).toBe('Timeout: GET /api/chain exceeded 3000ms in gateway');
  });

  it('is instanceof Error', () => {
    const err = new TimeoutError('op', 1000);
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(TimeoutError);
  });
});

describe('BrokerTopology', () => {
  it('names a consumer for every fanout queue', () => {
    expect(BrokerTopology.FANOUT_QUEUES.map(queue => FANOUT_CONSUMER_NAMES[queue])).toEqual([
      'Consumer-A',
      'Consumer-B',
      'Consumer-C',
    ]);
  });
});

describe('SPAN_KINDS', () => {
  it('lists the five span kinds', () => {
    expect(SPAN_KINDS).toEqual(['SERVER', 'CLIENT', 'PRODUCER', 'CONSUMER', 'INTERNAL']);
  });
});
