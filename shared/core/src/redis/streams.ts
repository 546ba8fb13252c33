/**
 * Redis Streams Client
 *
 * Stream commands used by the message broker: XADD for publishing, consumer
 * groups (XGROUP CREATE / XREADGROUP / XACK) for delivery. Entries are flat
 * string field maps; the broker decides what the fields mean.
 *
 * Replies are decoded from `unknown` and anything that does not have the
 * documented shape is rejected.
 */

import { ErrorCode, getErrorMessage, TraceChainError } from '../error-handling';
import type { ILogger } from '../logging/types';
import { NullLogger } from '../logging/testing-logger';
import type { StreamConnection } from './connection';

// =============================================================================
// Types
// =============================================================================

export interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

export interface ConsumerGroupConfig {
  streamName: string;
  groupName: string;
  consumerName: string;
  /** Default '$' (only entries added after the group exists) */
  startId?: string;
}

export interface XReadGroupOptions {
  count?: number;
  /** Block time in ms; 0 is capped to maxBlockMs */
  block?: number;
  /** Safety cap for block (default 30000, 0 disables the cap) */
  maxBlockMs?: number;
}

const MAX_STREAM_NAME_LENGTH = 256;
const STREAM_NAME_PATTERN = /^[a-zA-Z0-9\-_:.]+$/;

// =============================================================================
// Client
// =============================================================================

export class RedisStreamsClient {
  private readonly connection: StreamConnection;
  private readonly logger: ILogger;

  constructor(connection: StreamConnection, logger: ILogger = new NullLogger()) {
    this.connection = connection;
    this.logger = logger;
  }

  // ===========================================================================
  // XADD - Add entry to stream
  // ===========================================================================

  async xadd(streamName: string, fields: Record<string, string>): Promise<string> {
    validateStreamName(streamName);

    const args: Array<string | number> = [streamName, '*'];
    for (const [key, value] of Object.entries(fields)) {
      args.push(key, value);
    }

    const reply = await this.connection.send('XADD', args);
    if (typeof reply !== 'string') {
      throw new TraceChainError('Unexpected XADD reply', ErrorCode.REDIS_STREAM_ERROR, {
        context: { streamName },
      });
    }
    return reply;
  }

  // ===========================================================================
  // Consumer Groups
  // ===========================================================================

  /**
   * Create the group (and the stream, if missing). An existing group is left
   * as it is.
   */
  async createConsumerGroup(config: ConsumerGroupConfig): Promise<void> {
    validateStreamName(config.streamName);

    try {
      await this.connection.send('XGROUP', [
        'CREATE',
        config.streamName,
        config.groupName,
        config.startId ?? '$',
        'MKSTREAM',
      ]);
      this.logger.info('Consumer group created', {
        stream: config.streamName,
        group: config.groupName,
      });
    } catch (error) {
      if (getErrorMessage(error).includes('BUSYGROUP')) {
        this.logger.debug('Consumer group already exists', {
          stream: config.streamName,
          group: config.groupName,
        });
        return;
      }
      throw error;
    }
  }

  /**
   * Read entries never delivered to this group. Resolves with an empty list
   * when the block time elapses without entries.
   */
  async xreadgroup(config: ConsumerGroupConfig, options: XReadGroupOptions = {}): Promise<StreamEntry[]> {
    const args: Array<string | number> = ['GROUP', config.groupName, config.consumerName];

    if (options.count) {
      args.push('COUNT', options.count);
    }
    if (options.block !== undefined) {
      const maxBlockMs = options.maxBlockMs ?? 30000;
      let effectiveBlock = options.block;
      if (maxBlockMs > 0 && (options.block === 0 || options.block > maxBlockMs)) {
        effectiveBlock = maxBlockMs;
      }
      args.push('BLOCK', effectiveBlock);
    }
    args.push('STREAMS', config.streamName, '>');

    const reply = await this.connection.send('XREADGROUP', args);
    return parseStreamReply(reply);
  }

  async xack(streamName: string, groupName: string, ...ids: string[]): Promise<number> {
    const reply = await this.connection.send('XACK', [streamName, groupName, ...ids]);
    return typeof reply === 'number' ? reply : 0;
  }

  async disconnect(): Promise<void> {
    await this.connection.close();
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function validateStreamName(streamName: string): void {
  if (!streamName) {
    throw new TraceChainError('Invalid stream name: must be non-empty string', ErrorCode.INVALID_ARGUMENT);
  }
  if (streamName.length > MAX_STREAM_NAME_LENGTH) {
    throw new TraceChainError('Invalid stream name: too long', ErrorCode.INVALID_ARGUMENT);
  }
  if (!STREAM_NAME_PATTERN.test(streamName)) {
    throw new TraceChainError('Invalid stream name: contains unsafe characters', ErrorCode.INVALID_ARGUMENT);
  }
}

/**
 * Decode an XREAD/XREADGROUP reply:
 * `[[streamName, [[id, [field, value, ...]], ...]], ...]` or null.
 */
export function parseStreamReply(reply: unknown): StreamEntry[] {
  if (reply === null || reply === undefined) {
    return [];
  }
  if (!Array.isArray(reply)) {
    throw new TraceChainError('Unexpected stream reply', ErrorCode.REDIS_STREAM_ERROR);
  }

  const entries: StreamEntry[] = [];
  for (const streamReply of reply) {
    if (!Array.isArray(streamReply) || !Array.isArray(streamReply[1])) {
      continue;
    }
    for (const rawEntry of streamReply[1]) {
      const entry = parseEntry(rawEntry);
      if (entry) {
        entries.push(entry);
      }
    }
  }
  return entries;
}

function parseEntry(rawEntry: unknown): StreamEntry | null {
  if (!Array.isArray(rawEntry)) return null;

  const [id, rawFields] = rawEntry;
  if (typeof id !== 'string' || !Array.isArray(rawFields)) return null;

  const fields: Record<string, string> = {};
  for (let i = 0; i + 1 < rawFields.length; i += 2) {
    const key = rawFields[i];
    const value = rawFields[i + 1];
    if (typeof key === 'string' && typeof value === 'string') {
      fields[key] = value;
    }
  }
  return { id, fields };
}
