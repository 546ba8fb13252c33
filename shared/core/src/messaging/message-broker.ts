/**
 * Message broker contract used by chain hops.
 *
 * Queues are point-to-point (competing consumers); an exchange delivers one
 * copy of each published message to every queue bound to it.
 */

import type { BrokerMessage, Delivery, Destination, TopologyDeclaration } from '@tracechain/types';

export type MessageHandler = (delivery: Delivery) => Promise<void>;

export interface Subscription {
  readonly queue: string;
  /** Stop consuming and wait for in-flight handlers */
  unsubscribe(): Promise<void>;
}

export interface MessageBroker {
  /**
   * Create queues, exchanges and bindings. Idempotent.
   */
  declareTopology(topology: TopologyDeclaration): Promise<void>;

  /**
   * Hand a message to the broker.
   *
   * @returns broker-assigned message id
   * @throws PublishError when the broker rejects the message or `timeoutMs` elapses
   */
  publish(destination: Destination, message: BrokerMessage, timeoutMs?: number): Promise<string>;

  /**
   * Start delivering messages of `queue` to `handler`. A handler that throws
   * leaves its message unacknowledged.
   */
  subscribe(queue: string, handler: MessageHandler): Promise<Subscription>;

  /** Stop every subscription and release connections */
  close(): Promise<void>;
}

