/**
 * Message bus used when no broker is reachable. Every operation is inert
 * and deterministic.
 */

import type { ILogger } from '../shared/logging/ILogger.js';
import type { RoleId } from '../roles/types.js';
import type {
  ConnectionState,
  ConsumeMode,
  ExchangeName,
  IMessageBus,
  MessageHandler,
  MessagePayload,
  QueueDeclaration,
} from './types.js';

export class NoOpMessageBus implements IMessageBus {
  constructor(private readonly logger?: ILogger) {}

  isConnected(): boolean {
    return false;
  }

  async connect(): Promise<ConnectionState> {
    return 'disconnected';
  }

  async declareTopology(): Promise<boolean> {
    return false;
  }

  async declareQueue(_declaration: QueueDeclaration): Promise<boolean> {
    return false;
  }

  publish(
    _exchange: ExchangeName,
    routingKey: string,
    _payload: MessagePayload,
    _sourceRole: RoleId | null
  ): boolean {
    this.logger?.debug('Message dropped, bus is offline', { routingKey });
    return false;
  }

  subscribe(_queue: string, _handler: MessageHandler, _role: RoleId | null): boolean {
    return false;
  }

  async startConsuming(_mode: ConsumeMode): Promise<void> {
    // Nothing to consume
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
