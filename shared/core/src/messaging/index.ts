/**
 * Messaging Module
 *
 * @module messaging
 */

export type { MessageBroker, MessageHandler, Subscription } from './message-broker';

export { RedisStreamsBroker, encodeMessage } from './redis-streams-broker';
export type { RedisStreamsBrokerOptions } from './redis-streams-broker';
