/**
 * Broker vocabulary: destinations, messages and the demo topology.
 */

/**
 * Fixed broker topology used by the chain services.
 * The fanout exchange delivers one copy of each message to every bound queue.
 */
export const BrokerTopology = {
  CHAIN_QUEUE: 'tel.chain.queue',
  FANOUT_EXCHANGE: 'tel.fanout.exchange',
  FANOUT_QUEUES: ['tel.fanout.queue.a', 'tel.fanout.queue.b', 'tel.fanout.queue.c'],
} as const;

/** Display name of the consumer attached to each fanout queue */
export const FANOUT_CONSUMER_NAMES: Readonly<Record<string, string>> = {
  'tel.fanout.queue.a': 'Consumer-A',
  'tel.fanout.queue.b': 'Consumer-B',
  'tel.fanout.queue.c': 'Consumer-C',
};

/**
 * Queues and exchange bindings a broker must hold before publishing.
 * `exchanges` maps an exchange name to the queues bound to it.
 */
export interface TopologyDeclaration {
  queues: readonly string[];
  exchanges: Readonly<Record<string, readonly string[]>>;
}

export type Destination =
  | { type: 'queue'; name: string }
  | { type: 'exchange'; name: string };

export interface MessageProperties {
  headers: Record<string, string>;
}

export type MessageBody = Record<string, unknown>;

export interface BrokerMessage {
  body: MessageBody;
  properties: MessageProperties;
}

/**
 * A message handed to a queue consumer.
 */
export interface Delivery extends BrokerMessage {
  /** Broker-assigned message id */
  id: string;
  /** Queue the message was consumed from */
  queue: string;
}
