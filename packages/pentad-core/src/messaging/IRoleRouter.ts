import type { RoleId } from '../roles/types.js';
import type { ConsumeMode, ExchangeName, MessageHandler, MessagePayload } from './types.js';

/**
 * Role-aware publishing/listening facade over the message bus.
 *
 * Send operations return false on a permission violation or when the
 * underlying publish fails. Offline routers log instead and return true.
 */
export interface IRoleRouter {
  readonly role: RoleId;
  readonly online: boolean;

  sendActivity(type: string, data: MessagePayload): boolean;
  sendCodeChange(type: string, data: MessagePayload): boolean;
  sendProtocolUpdate(type: string, data: MessagePayload): boolean;
  sendGovernanceReview(type: string, data: MessagePayload): boolean;
  sendFeatureInsight(type: string, data: MessagePayload): boolean;
  publish(exchange: ExchangeName, type: string, data: MessagePayload): boolean;

  /** Interactive and fixer only */
  listenForProtocolUpdates(handler: MessageHandler): Promise<boolean>;

  /** Governor only */
  listenForGovernanceFeedback(handler: MessageHandler): Promise<boolean>;

  /** Attach to the queue this role owns in the declared topology */
  listenOnRoleQueue(handler: MessageHandler): Promise<boolean>;

  startConsuming(mode: ConsumeMode): Promise<void>;
  close(): Promise<void>;
}
