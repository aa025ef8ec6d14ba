/**
 * BaseRoleRouter - permission checks and routing-key construction shared by
 * the live and offline routers
 */

import type { ILogger } from '../shared/logging/ILogger.js';
import { PermissionViolation } from '../shared/utils/errors.js';
import type { RoleId } from '../roles/types.js';
import type { IRoleRouter } from './IRoleRouter.js';
import {
  EXCHANGES,
  RESTRICTED_FEEDS,
  ROLE_QUEUES,
  canPublish,
  feedQueueFor,
  routingKeyFor,
  type RestrictedFeed,
} from './topology.js';
import type {
  ConsumeMode,
  ExchangeName,
  MessageHandler,
  MessagePayload,
  QueueDeclaration,
} from './types.js';

export abstract class BaseRoleRouter implements IRoleRouter {
  abstract readonly online: boolean;

  constructor(
    public readonly role: RoleId,
    protected readonly logger: ILogger
  ) {}

  sendActivity(type: string, data: MessagePayload): boolean {
    return this.publish('agent.activities', type, data);
  }

  sendCodeChange(type: string, data: MessagePayload): boolean {
    return this.publish('code.changes', type, data);
  }

  sendProtocolUpdate(type: string, data: MessagePayload): boolean {
    return this.publish('protocol.updates', type, data);
  }

  sendGovernanceReview(type: string, data: MessagePayload): boolean {
    return this.publish('governance.reviews', type, data);
  }

  sendFeatureInsight(type: string, data: MessagePayload): boolean {
    return this.publish('feature.insights', type, data);
  }

  publish(exchange: ExchangeName, type: string, data: MessagePayload): boolean {
    if (!canPublish(this.role, exchange)) {
      const violation = new PermissionViolation(
        `Only ${EXCHANGES[exchange].publisher} can publish to ${exchange}`,
        this.role,
        exchange
      );
      this.logger.warn(violation.message, { role: this.role, exchange });
      return this.refusedPublish(exchange, routingKeyFor(exchange, this.role, type), data);
    }

    return this.deliver(exchange, routingKeyFor(exchange, this.role, type), data);
  }

  /**
   * Result of a publish the role is not allowed to make, after the warning
   * has been logged
   */
  protected refusedPublish(
    _exchange: ExchangeName,
    _routingKey: string,
    _data: MessagePayload
  ): boolean {
    return false;
  }

  listenForProtocolUpdates(handler: MessageHandler): Promise<boolean> {
    return this.listenOnFeed('protocolUpdates', handler);
  }

  listenForGovernanceFeedback(handler: MessageHandler): Promise<boolean> {
    return this.listenOnFeed('governanceFeedback', handler);
  }

  listenOnRoleQueue(handler: MessageHandler): Promise<boolean> {
    return this.listen(ROLE_QUEUES[this.role], handler);
  }

  abstract startConsuming(mode: ConsumeMode): Promise<void>;
  abstract close(): Promise<void>;

  protected abstract deliver(
    exchange: ExchangeName,
    routingKey: string,
    data: MessagePayload
  ): boolean;

  protected abstract listen(
    declaration: QueueDeclaration,
    handler: MessageHandler
  ): Promise<boolean>;

  private async listenOnFeed(feed: RestrictedFeed, handler: MessageHandler): Promise<boolean> {
    const definition = RESTRICTED_FEEDS[feed];
    if (!definition.consumers.includes(this.role)) {
      const violation = new PermissionViolation(
        `Only ${definition.consumers.join(', ')} should listen for ${definition.label}`,
        this.role,
        definition.exchange
      );
      this.logger.warn(violation.message, { role: this.role, exchange: definition.exchange });
      return false;
    }

    return this.listen(feedQueueFor(feed, this.role), handler);
  }
}
