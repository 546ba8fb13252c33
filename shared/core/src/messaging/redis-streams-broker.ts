/**
 * Redis Streams Message Broker
 *
 * Maps queue/exchange semantics onto streams and consumer groups:
 *
 * - queue Q        → stream Q, consumer group Q
 * - exchange E     → stream E, one consumer group per bound queue
 *                    (group name = queue name)
 *
 * A consumer of Q therefore reads from stream Q and from every exchange
 * stream Q is bound to, always with group Q. Each bound queue's group gets
 * its own copy of an exchange entry; consumers within one group compete.
 *
 * Entry layout:
 *   data           JSON-encoded message body
 *   header:<name>  one field per message header
 *
 * Groups start at '$': messages published before a queue is declared are
 * not delivered to it.
 */

import { randomUUID } from 'crypto';
import type {
  BrokerMessage,
  Delivery,
  Destination,
  MessageBody,
  TopologyDeclaration,
} from '@tracechain/types';
import { withTimeout } from '../async/async-utils';
import { ErrorCode, getErrorMessage, PublishError, TraceChainError } from '../error-handling';
import type { ILogger } from '../logging/types';
import { NullLogger } from '../logging/testing-logger';
import type { StreamConnectionFactory } from '../redis/connection';
import { StreamConsumer } from '../redis/stream-consumer';
import { RedisStreamsClient } from '../redis/streams';
import type { StreamEntry } from '../redis/streams';
import type { MessageBroker, MessageHandler, Subscription } from './message-broker';

const DATA_FIELD = 'data';
const HEADER_PREFIX = 'header:';

export interface RedisStreamsBrokerOptions {
  /** Consumer name within each group (default: random per broker instance) */
  consumerName?: string;
  /** XREADGROUP block time in ms (default: 1000) */
  blockMs?: number;
  /** Entries fetched per read (default: 10) */
  batchSize?: number;
  /** Publish timeout used when the caller passes none (default: 5000) */
  defaultPublishTimeoutMs?: number;
  logger?: ILogger;
}

interface ActiveSubscription extends Subscription {
  readonly consumers: ReadonlyArray<{ consumer: StreamConsumer; client: RedisStreamsClient }>;
}

export class RedisStreamsBroker implements MessageBroker {
  private readonly connectionFactory: StreamConnectionFactory;
  private readonly consumerName: string;
  private readonly blockMs: number;
  private readonly batchSize: number;
  private readonly defaultPublishTimeoutMs: number;
  private readonly logger: ILogger;
  /** queue → exchanges it is bound to */
  private readonly bindings = new Map<string, Set<string>>();
  private readonly subscriptions = new Set<ActiveSubscription>();
  private publisher: RedisStreamsClient | null = null;
  private closed = false;

  constructor(connectionFactory: StreamConnectionFactory, options: RedisStreamsBrokerOptions = {}) {
    this.connectionFactory = connectionFactory;
    this.consumerName = options.consumerName ?? `consumer-${randomUUID().slice(0, 8)}`;
    this.blockMs = options.blockMs ?? 1000;
    this.batchSize = options.batchSize ?? 10;
    this.defaultPublishTimeoutMs = options.defaultPublishTimeoutMs ?? 5000;
    this.logger = options.logger ?? new NullLogger();
  }

  async declareTopology(topology: TopologyDeclaration): Promise<void> {
    const client = this.getPublisher();

    for (const queue of topology.queues) {
      await client.createConsumerGroup({ streamName: queue, groupName: queue, consumerName: this.consumerName });
    }

    for (const [exchange, queues] of Object.entries(topology.exchanges)) {
      for (const queue of queues) {
        await client.createConsumerGroup({ streamName: exchange, groupName: queue, consumerName: this.consumerName });
        this.bind(queue, exchange);
      }
    }

    this.logger.info('Broker topology declared', {
      queues: topology.queues.length,
      exchanges: Object.keys(topology.exchanges),
    });
  }

  async publish(destination: Destination, message: BrokerMessage, timeoutMs?: number): Promise<string> {
    if (this.closed) {
      throw new PublishError('Broker is closed', destination.name);
    }

    const fields = encodeMessage(message);
    const limit = timeoutMs ?? this.defaultPublishTimeoutMs;

    try {
      return await withTimeout(
        this.getPublisher().xadd(destination.name, fields),
        limit,
        `publish to ${destination.type} ${destination.name}`
      );
    } catch (error) {
      throw new PublishError(getErrorMessage(error), destination.name, {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async subscribe(queue: string, handler: MessageHandler): Promise<Subscription> {
    if (this.closed) {
      throw new TraceChainError('Broker is closed', ErrorCode.CONNECTION_CLOSED, { context: { queue } });
    }

    const sources = [queue, ...(this.bindings.get(queue) ?? [])];
    const consumers: Array<{ consumer: StreamConsumer; client: RedisStreamsClient }> = [];

    const clients: RedisStreamsClient[] = [];

    try {
      for (const streamName of sources) {
        const client = new RedisStreamsClient(
          this.connectionFactory(`consumer:${queue}:${streamName}`),
          this.logger
        );
        clients.push(client);
        const config = { streamName, groupName: queue, consumerName: this.consumerName };
        await client.createConsumerGroup(config);

        const consumer = new StreamConsumer(client, {
          config,
          handler: (entry: StreamEntry) => handler(this.decodeDelivery(entry, queue)),
          blockMs: this.blockMs,
          batchSize: this.batchSize,
          logger: this.logger.child({ queue, stream: streamName }),
        });
        consumers.push({ consumer, client });
      }
    } catch (error) {
      await Promise.all(clients.map(client => client.disconnect()));
      throw error;
    }

    const subscription: ActiveSubscription = {
      queue,
      consumers,
      unsubscribe: async () => {
        this.subscriptions.delete(subscription);
        await Promise.all(consumers.map(({ consumer }) => consumer.stop()));
        await Promise.all(consumers.map(({ client }) => client.disconnect()));
      },
    };
    this.subscriptions.add(subscription);

    for (const { consumer } of consumers) {
      consumer.start();
    }

    this.logger.info('Subscribed to queue', { queue, streams: sources });
    return subscription;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await Promise.all([...this.subscriptions].map(subscription => subscription.unsubscribe()));

    if (this.publisher) {
      await this.publisher.disconnect();
      this.publisher = null;
    }
  }

  private getPublisher(): RedisStreamsClient {
    if (!this.publisher) {
      this.publisher = new RedisStreamsClient(this.connectionFactory('publisher'), this.logger);
    }
    return this.publisher;
  }

  private bind(queue: string, exchange: string): void {
    const exchanges = this.bindings.get(queue) ?? new Set<string>();
    exchanges.add(exchange);
    this.bindings.set(queue, exchanges);
  }

  private decodeDelivery(entry: StreamEntry, queue: string): Delivery {
    const headers: Record<string, string> = {};
    for (const [field, value] of Object.entries(entry.fields)) {
      if (field.startsWith(HEADER_PREFIX)) {
        headers[field.slice(HEADER_PREFIX.length)] = value;
      }
    }

    const body = decodeBody(entry.fields[DATA_FIELD]);
    if (!body) {
      this.logger.warn('Message body is not a JSON object', { queue, messageId: entry.id });
    }

    return {
      id: entry.id,
      queue,
      body: body ?? {},
      properties: { headers },
    };
  }
}

// =============================================================================
// Encoding
// =============================================================================

export function encodeMessage(message: BrokerMessage): Record<string, string> {
  const fields: Record<string, string> = { [DATA_FIELD]: JSON.stringify(message.body) };
  for (const [name, value] of Object.entries(message.properties.headers)) {
    fields[`${HEADER_PREFIX}${name}`] = value;
  }
  return fields;
}

function decodeBody(raw: string | undefined): MessageBody | null {
  if (raw === undefined) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return null;
    }
    return { ...parsed };
  } catch {
    // not JSON
    return null;
  }
}
