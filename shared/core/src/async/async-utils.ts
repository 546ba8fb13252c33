/**
 * Shared Async Utilities
 *
 * Timeout handling, delays and shutdown sequencing used by the broker,
 * the next-hop client and service bootstrap.
 */

import { TimeoutError } from '@tracechain/types';
import { getErrorMessage } from '../error-handling';

export { TimeoutError };

// =============================================================================
// Timeout Utilities
// =============================================================================

/**
 * Execute a promise with a timeout.
 *
 * @throws TimeoutError if the promise has not settled after `timeoutMs`
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new TypeError(`withTimeout: timeoutMs must be a non-negative finite number, got ${timeoutMs}`);
  }

  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operationName || 'operation', timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

// =============================================================================
// Delay Utilities
// =============================================================================

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Sleep for a uniformly random duration in [0, maxMs).
 * Resolves immediately when `maxMs` is not positive.
 */
export function randomDelay(maxMs: number, random: () => number = Math.random): Promise<void> {
  if (!(maxMs > 0)) {
    return Promise.resolve();
  }
  return sleep(Math.floor(random() * maxMs));
}

// =============================================================================
// Shutdown Utilities
// =============================================================================

/**
 * Run cleanups in order, each bounded by `timeoutMs`. A failed or timed-out
 * cleanup is logged and the rest still run.
 */
export async function gracefulShutdown(
  resources: Array<{ name: string; cleanup: () => Promise<void> }>,
  timeoutMs: number,
  logger?: { warn: (msg: string, meta?: Record<string, unknown>) => void }
): Promise<void> {
  for (const resource of resources) {
    try {
      await withTimeout(resource.cleanup(), timeoutMs, `${resource.name} cleanup`);
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger?.warn(`${resource.name} cleanup timed out`, { timeoutMs });
      } else {
        logger?.warn(`${resource.name} cleanup failed`, {
          error: getErrorMessage(error)
        });
      }
    }
  }
}
