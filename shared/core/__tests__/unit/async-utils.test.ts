/**
 * Async Utilities Tests
 *
 * @see shared/core/src/async/async-utils.ts
 * @see shared/core/src/async/lifecycle-utils.ts
 */

import { jest, describe, it, expect, afterEach } from '@jest/globals';
import {
  TimeoutError,
  clearTimeoutSafe,
  gracefulShutdown,
  randomDelay,
  sleep,
  withTimeout,
} from '../../src/async';

afterEach(() => {
  jest.useRealTimers();
});

// =============================================================================
// withTimeout
// =============================================================================

describe('withTimeout', () => {
  it('should resolve with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 100)).resolves.toBe('done');
  });

  it('should propagate the rejection of the wrapped promise', async () => {
    await expect(withTimeout(Promise.reject(new Error('inner')), 100)).rejects.toThrow('inner');
  });

  it('should reject with TimeoutError naming the operation', async () => {
    const never = new Promise<string>(() => undefined);

    const result = withTimeout(never, 20, 'publish to tel.chain.queue');

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(withTimeout(never, 20, 'publish to tel.chain.queue')).rejects.toThrow(
      'Timeout: publish to tel.chain.queue exceeded 20ms'
    );
  });

  it('should reject invalid timeouts', async () => {
    await expect(withTimeout(Promise.resolve(1), -1)).rejects.toThrow(TypeError);
    await expect(withTimeout(Promise.resolve(1), Number.NaN)).rejects.toThrow(TypeError);
  });
});

// =============================================================================
// Delays
// =============================================================================

describe('sleep', () => {
  it('should resolve after the given time', async () => {
    jest.useFakeTimers();
    const settled = jest.fn();

    const pending = sleep(100).then(settled);
    jest.advanceTimersByTime(99);
    await Promise.resolve();
    expect(settled).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    await pending;
    expect(settled).toHaveBeenCalledTimes(1);
  });
});

describe('randomDelay', () => {
  it('should resolve immediately when maxMs is not positive', async () => {
    const random = jest.fn(() => 0.5);

    await randomDelay(0, random);
    await randomDelay(-10, random);

    expect(random).not.toHaveBeenCalled();
  });

  it('should sleep for floor(random * maxMs)', async () => {
    jest.useFakeTimers();
    const settled = jest.fn();

    const pending = randomDelay(100, () => 0.257).then(settled);
    jest.advanceTimersByTime(24);
    await Promise.resolve();
    expect(settled).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    await pending;
    expect(settled).toHaveBeenCalledTimes(1);
  });
});

// =============================================================================
// gracefulShutdown
// =============================================================================

describe('gracefulShutdown', () => {
  it('should run cleanups in order', async () => {
    const order: string[] = [];

    await gracefulShutdown([
      { name: 'consumers', cleanup: async () => { order.push('consumers'); } },
      { name: 'http server', cleanup: async () => { order.push('http server'); } },
      { name: 'broker', cleanup: async () => { order.push('broker'); } },
    ], 100);

    expect(order).toEqual(['consumers', 'http server', 'broker']);
  });

  it('should keep going after a failed cleanup and log it', async () => {
    const warn = jest.fn();
    const later = jest.fn(async () => undefined);

    await gracefulShutdown([
      { name: 'exporter', cleanup: async () => { throw new Error('collector down'); } },
      { name: 'broker', cleanup: later },
    ], 100, { warn });

    expect(warn).toHaveBeenCalledWith('exporter cleanup failed', { error: 'collector down' });
    expect(later).toHaveBeenCalledTimes(1);
  });

  it('should bound a hanging cleanup by the timeout', async () => {
    const warn = jest.fn();
    const later = jest.fn(async () => undefined);

    await gracefulShutdown([
      { name: 'http server', cleanup: () => new Promise<void>(() => undefined) },
      { name: 'broker', cleanup: later },
    ], 20, { warn });

    expect(warn).toHaveBeenCalledWith('http server cleanup timed out', { timeoutMs: 20 });
    expect(later).toHaveBeenCalledTimes(1);
  });
});

// =============================================================================
// Lifecycle Utilities
// =============================================================================

describe('lifecycle utils', () => {
  it('clearTimeoutSafe should clear and return null', () => {
    jest.useFakeTimers();
    const fire = jest.fn();
    const timeout = setTimeout(fire, 10);

    expect(clearTimeoutSafe(timeout)).toBeNull();
    jest.advanceTimersByTime(50);

    expect(fire).not.toHaveBeenCalled();
    expect(clearTimeoutSafe(null)).toBeNull();
  });
});
