/**
 * Message bus types
 */

import type { RoleId } from '../roles/types.js';
import type { BrokerConfig } from './schemas.js';

export const EXCHANGE_NAMES = [
  'agent.activities',
  'code.changes',
  'protocol.updates',
  'governance.reviews',
  'feature.insights',
] as const;

export type ExchangeName = (typeof EXCHANGE_NAMES)[number];

export type ExchangeType = 'topic' | 'direct' | 'fanout' | 'headers';

export type ConnectionState = 'connected' | 'disconnected';

/**
 * blocking: resolve only once the bus is closed or the connection is lost
 * background: attach consumers and resolve immediately
 */
export type ConsumeMode = 'blocking' | 'background';

/**
 * Opaque message body. Must survive a JSON round trip.
 */
export type MessagePayload = Record<string, unknown>;

/**
 * Wire format of every published message. Frozen at publish time.
 */
export interface MessageEnvelope {
  readonly timestamp: string;
  readonly source: RoleId | null;
  readonly routingKey: string;
  readonly data: Readonly<MessagePayload>;
}

/**
 * Invoked once per delivered message. Resolving acks the message,
 * throwing (or rejecting) drops it without requeue.
 */
export type MessageHandler = (
  envelope: MessageEnvelope,
  role: RoleId | null
) => void | Promise<void>;

export interface ExchangeBinding {
  exchange: ExchangeName;
  pattern: string;
}

export interface QueueDeclaration {
  queue: string;
  bindings: readonly ExchangeBinding[];
}

/**
 * Broker capability. Two implementations: a live AMQP bus and a no-op bus
 * for offline mode, selected once when the bus is created.
 */
export interface IMessageBus {
  isConnected(): boolean;

  /**
   * Never throws. Failure leaves the bus disconnected.
   */
  connect(config: BrokerConfig): Promise<ConnectionState>;

  /**
   * Declare the five exchanges and one queue per consuming role
   */
  declareTopology(): Promise<boolean>;

  /**
   * Declare a durable queue and bind it
   */
  declareQueue(declaration: QueueDeclaration): Promise<boolean>;

  /**
   * Returns false (message dropped, never retried) when disconnected
   */
  publish(
    exchange: ExchangeName,
    routingKey: string,
    payload: MessagePayload,
    sourceRole: RoleId | null
  ): boolean;

  subscribe(queue: string, handler: MessageHandler, role: RoleId | null): boolean;

  startConsuming(mode: ConsumeMode): Promise<void>;

  close(): Promise<void>;
}
