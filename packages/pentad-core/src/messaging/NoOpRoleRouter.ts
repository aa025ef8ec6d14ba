import { BaseRoleRouter } from './BaseRoleRouter.js';
import type {
  ConsumeMode,
  ExchangeName,
  MessageHandler,
  MessagePayload,
  QueueDeclaration,
} from './types.js';

const EXCHANGE_LABELS: Record<ExchangeName, string> = {
  'agent.activities': 'Activity',
  'code.changes': 'Code change',
  'protocol.updates': 'Protocol update',
  'governance.reviews': 'Governance review',
  'feature.insights': 'Feature insight',
};

/**
 * Offline router: every send is logged as [OFFLINE] and reported as
 * successful. A send the role may not make is also warned about. Listens are
 * inert, and listen permissions still apply.
 */
export class NoOpRoleRouter extends BaseRoleRouter {
  readonly online = false;

  async startConsuming(_mode: ConsumeMode): Promise<void> {
    // Nothing to consume offline
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  protected deliver(exchange: ExchangeName, routingKey: string, data: MessagePayload): boolean {
    this.logger.info(`[OFFLINE] ${EXCHANGE_LABELS[exchange]}: ${routingKey}`, { data });
    return true;
  }

  protected refusedPublish(exchange: ExchangeName, routingKey: string, data: MessagePayload): boolean {
    return this.deliver(exchange, routingKey, data);
  }

  protected async listen(declaration: QueueDeclaration, _handler: MessageHandler): Promise<boolean> {
    this.logger.info(`[OFFLINE] Listening on ${declaration.queue} disabled`);
    return true;
  }
}
