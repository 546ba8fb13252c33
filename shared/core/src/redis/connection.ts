/**
 * Redis Connection
 *
 * The stream client talks to Redis through a narrow command interface so
 * that tests can substitute the in-process stand-in from
 * @tracechain/test-utils without mocking ioredis.
 *
 * Blocking reads (XREADGROUP ... BLOCK) hold their connection, so the broker
 * opens one connection per consumer and one for publishing.
 *
 * @module redis/connection
 */

import Redis from 'ioredis';
import type { RedisOptions } from 'ioredis';
import type { ILogger } from '../logging/types';
import { NullLogger } from '../logging/testing-logger';

// =============================================================================
// Connection Contract
// =============================================================================

export interface StreamConnection {
  /** Send a raw command and resolve with its decoded reply */
  send(command: string, args: Array<string | number>): Promise<unknown>;
  close(): Promise<void>;
}

/**
 * Opens a new connection. Called once for the publisher and once per consumer.
 */
export type StreamConnectionFactory = (purpose: string) => StreamConnection;

// =============================================================================
// ioredis Implementation
// =============================================================================

/**
 * Redis constructor type for DI
 */
export type RedisConstructor = new (url: string, options: RedisOptions) => Redis;

export interface IoRedisConnectionDeps {
  RedisImpl?: RedisConstructor;
  logger?: ILogger;
}

export class IoRedisConnection implements StreamConnection {
  private readonly client: Redis;
  private readonly logger: ILogger;

  constructor(url: string, password?: string, deps: IoRedisConnectionDeps = {}) {
    this.logger = deps.logger ?? new NullLogger();

    const options: RedisOptions = {
      password: resolveRedisPassword(password),
      retryStrategy: (times: number) => {
        if (times > 3) {
          this.logger.error('Redis connection failed after 3 retries');
          return null;
        }
        return Math.min(times * 100, 3000);
      },
      maxRetriesPerRequest: 3,
      lazyConnect: true,
    };

    const RedisImpl = deps.RedisImpl ?? Redis;
    this.client = new RedisImpl(url, options);

    this.client.on('error', (err: Error) => {
      this.logger.error('Redis connection error', { error: err.message });
    });
    this.client.on('connect', () => {
      this.logger.debug('Redis connection established');
    });
  }

  send(command: string, args: Array<string | number>): Promise<unknown> {
    return this.client.call(command, args);
  }

  async close(): Promise<void> {
    // error listener stays attached: a pending blocking read rejects after disconnect
    this.client.removeAllListeners('connect');
    this.client.disconnect();
  }
}

/**
 * Connection factory for a Redis URL. Each call opens a separate client.
 */
export function createIoRedisConnectionFactory(
  url: string,
  password?: string,
  logger?: ILogger
): StreamConnectionFactory {
  return (purpose: string) =>
    new IoRedisConnection(url, password, { logger: logger?.child({ connection: purpose }) });
}

/**
 * Resolve Redis password from explicit parameter or environment variable.
 * Empty and whitespace-only values are treated as absent.
 */
export function resolveRedisPassword(password?: string): string | undefined {
  const raw = password ?? process.env.REDIS_PASSWORD;
  if (typeof raw !== 'string') return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
