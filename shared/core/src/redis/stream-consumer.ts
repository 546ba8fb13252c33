/**
 * Stream Consumer
 *
 * Polling consumer for one Redis stream and consumer group:
 * read → handle → acknowledge.
 *
 * A handler that throws leaves its entry unacknowledged in the group's
 * pending entries list. Pending entries are not reclaimed (no XPENDING or
 * XCLAIM): they stay until an operator acks or trims them. Read errors
 * back off exponentially up to 30s.
 *
 * @module redis/stream-consumer
 */

import { clearTimeoutSafe } from '../async/lifecycle-utils';
import { getErrorMessage } from '../error-handling';
import type { ILogger } from '../logging/types';
import { NullLogger } from '../logging/testing-logger';
import type { ConsumerGroupConfig, RedisStreamsClient, StreamEntry } from './streams';

// =============================================================================
// Types
// =============================================================================

export interface StreamConsumerConfig {
  config: ConsumerGroupConfig;
  handler: (entry: StreamEntry) => Promise<void>;
  /** Entries fetched per read (default: 10) */
  batchSize?: number;
  /** Block time in ms (default: 1000, 0 = non-blocking) */
  blockMs?: number;
  logger?: ILogger;
}

export interface StreamConsumerStats {
  messagesProcessed: number;
  messagesFailed: number;
  lastProcessedAt: number | null;
  isRunning: boolean;
}

// =============================================================================
// StreamConsumer Class
// =============================================================================

/**
 * ```ts
 * const consumer = new StreamConsumer(client, {
 *   config: { streamName: 'tel.chain.queue', groupName: 'tel.chain.queue', consumerName: 'service-c-1' },
 *   handler: async (entry) => { ... },
 * });
 * consumer.start();
 * // ... later
 * await consumer.stop();
 * ```
 */
export class StreamConsumer {
  private static readonly MAX_ERROR_BACKOFF_MS = 30_000;
  private static readonly BASE_ERROR_DELAY_MS = 100;
  private static readonly INTER_POLL_DELAY_MS = 10;

  private readonly client: RedisStreamsClient;
  private readonly config: StreamConsumerConfig;
  private readonly batchSize: number;
  private readonly blockMs: number;
  private readonly logger: ILogger;
  private running = false;
  private pollTimer: NodeJS.Timeout | null = null;
  private pollPromise: Promise<void> | null = null;
  /** Consecutive poll errors for exponential backoff */
  private consecutiveErrors = 0;
  private stats: StreamConsumerStats = {
    messagesProcessed: 0,
    messagesFailed: 0,
    lastProcessedAt: null,
    isRunning: false,
  };

  constructor(client: RedisStreamsClient, config: StreamConsumerConfig) {
    this.client = client;
    this.config = config;
    this.batchSize = config.batchSize ?? 10;
    this.blockMs = config.blockMs ?? 1000;
    this.logger = config.logger ?? new NullLogger();
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.stats.isRunning = true;
    this.schedulePoll();
  }

  /**
   * Stop polling and wait for the in-flight read and handlers to finish.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.stats.isRunning = false;
    this.pollTimer = clearTimeoutSafe(this.pollTimer);

    if (this.pollPromise) {
      await this.pollPromise;
      this.pollPromise = null;
    }
  }

  getStats(): StreamConsumerStats {
    return { ...this.stats };
  }

  get streamName(): string {
    return this.config.config.streamName;
  }

  private schedulePoll(): void {
    this.pollTimer = null;
    this.pollPromise = this.poll();
  }

  private async poll(): Promise<void> {
    if (!this.running) return;

    const { streamName, groupName } = this.config.config;
    let pollSucceeded = false;

    try {
      const entries = await this.client.xreadgroup(this.config.config, {
        count: this.batchSize,
        block: this.blockMs,
      });
      pollSucceeded = true;
      this.consecutiveErrors = 0;

      for (const entry of entries) {
        await this.handle(entry);
      }
    } catch (error) {
      // A read interrupted by stop() is not an error
      if (this.running) {
        this.consecutiveErrors++;
        this.logger.error('Error consuming stream', {
          error: getErrorMessage(error),
          stream: streamName,
          group: groupName,
          consecutiveErrors: this.consecutiveErrors,
        });
      }
    }

    if (this.running) {
      const delay = !pollSucceeded && this.consecutiveErrors > 0
        ? Math.min(
          StreamConsumer.BASE_ERROR_DELAY_MS * Math.pow(2, this.consecutiveErrors - 1),
          StreamConsumer.MAX_ERROR_BACKOFF_MS
        )
        : this.blockMs === 0 ? 0 : StreamConsumer.INTER_POLL_DELAY_MS;
      this.pollTimer = setTimeout(() => this.schedulePoll(), delay);
    }
  }

  private async handle(entry: StreamEntry): Promise<void> {
    const { streamName, groupName } = this.config.config;

    try {
      await this.config.handler(entry);
      this.stats.messagesProcessed++;
      this.stats.lastProcessedAt = Date.now();
    } catch (error) {
      this.stats.messagesFailed++;
      this.logger.error('Stream message handler failed', {
        error: getErrorMessage(error),
        stream: streamName,
        messageId: entry.id,
      });
      return;
    }

    try {
      await this.client.xack(streamName, groupName, entry.id);
    } catch (error) {
      this.logger.warn('Failed to acknowledge stream entry', {
        error: getErrorMessage(error),
        stream: streamName,
        messageId: entry.id,
      });
    }
  }
}
