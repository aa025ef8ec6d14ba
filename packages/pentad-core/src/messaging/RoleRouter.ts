import type { ILogger } from '../shared/logging/ILogger.js';
import type { RoleId } from '../roles/types.js';
import { BaseRoleRouter } from './BaseRoleRouter.js';
import type {
  ConsumeMode,
  ExchangeName,
  IMessageBus,
  MessageHandler,
  MessagePayload,
  QueueDeclaration,
} from './types.js';

/**
 * Router backed by a connected message bus
 */
export class RoleRouter extends BaseRoleRouter {
  constructor(
    role: RoleId,
    private readonly bus: IMessageBus,
    logger: ILogger
  ) {
    super(role, logger);
  }

  get online(): boolean {
    return this.bus.isConnected();
  }

  startConsuming(mode: ConsumeMode): Promise<void> {
    return this.bus.startConsuming(mode);
  }

  close(): Promise<void> {
    return this.bus.close();
  }

  protected deliver(exchange: ExchangeName, routingKey: string, data: MessagePayload): boolean {
    return this.bus.publish(exchange, routingKey, data, this.role);
  }

  protected async listen(declaration: QueueDeclaration, handler: MessageHandler): Promise<boolean> {
    const declared = await this.bus.declareQueue(declaration);
    if (!declared) {
      return false;
    }
    return this.bus.subscribe(declaration.queue, handler, this.role);
  }
}
