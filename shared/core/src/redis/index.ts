/**
 * Redis Module
 *
 * - StreamConnection / IoRedisConnection: command transport
 * - RedisStreamsClient: stream and consumer group commands
 * - StreamConsumer: polling read → handle → ack loop
 *
 * @module redis
 */

export * from './connection';
export * from './streams';
export * from './stream-consumer';
