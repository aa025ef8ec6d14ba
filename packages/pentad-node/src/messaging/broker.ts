/**
 * The slice of an AMQP connection/channel the bus relies on. amqplib's
 * objects satisfy it structurally; tests supply in-memory fakes.
 */

import amqp from 'amqplib';
import type { BrokerConfig } from '@pentad/core';

export interface BrokerMessage {
  content: Buffer;
  fields: {
    routingKey: string;
    deliveryTag: number;
  };
}

export interface BrokerPublishOptions {
  persistent?: boolean;
  contentType?: string;
  timestamp?: number;
}

export interface BrokerChannel {
  assertExchange(exchange: string, type: string, options?: { durable?: boolean }): Promise<unknown>;
  assertQueue(queue: string, options?: { durable?: boolean }): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options?: BrokerPublishOptions
  ): boolean;
  consume(
    queue: string,
    onMessage: (message: BrokerMessage | null) => void,
    options?: { noAck?: boolean }
  ): Promise<{ consumerTag: string }>;
  cancel(consumerTag: string): Promise<unknown>;
  ack(message: BrokerMessage): void;
  nack(message: BrokerMessage, allUpTo?: boolean, requeue?: boolean): void;
  close(): Promise<void>;
  on(event: 'close' | 'error', listener: (error?: unknown) => void): unknown;
}

export interface BrokerConnection {
  createChannel(): Promise<BrokerChannel>;
  close(): Promise<void>;
  on(event: 'close' | 'error', listener: (error?: unknown) => void): unknown;
}

export type BrokerConnector = (config: BrokerConfig) => Promise<BrokerConnection>;

/**
 * Open a connection with amqplib
 */
export const connectAmqp: BrokerConnector = (config) =>
  amqp.connect(
    {
      protocol: 'amqp',
      hostname: config.host,
      port: config.port,
      vhost: config.virtualHost,
      username: config.username,
      password: config.password,
      heartbeat: config.heartbeatSeconds,
    },
    { timeout: config.connectTimeoutMs }
  );
