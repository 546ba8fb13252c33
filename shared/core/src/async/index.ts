/**
 * Async Module
 *
 * @module async
 */

export {
  TimeoutError,
  withTimeout,
  sleep,
  randomDelay,
  gracefulShutdown,
} from './async-utils';

export { clearTimeoutSafe } from './lifecycle-utils';
