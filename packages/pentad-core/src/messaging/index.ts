export { EXCHANGE_NAMES } from './types.js';
export type {
  ConnectionState,
  ConsumeMode,
  ExchangeBinding,
  ExchangeName,
  ExchangeType,
  IMessageBus,
  MessageEnvelope,
  MessageHandler,
  MessagePayload,
  QueueDeclaration,
} from './types.js';
export {
  BrokerConfigSchema,
  DEFAULT_EXCHANGE_TYPES,
  ExchangeTypeSchema,
  MessageEnvelopeSchema,
} from './schemas.js';
export type { BrokerConfig } from './schemas.js';
export {
  EXCHANGES,
  RESTRICTED_FEEDS,
  ROLE_QUEUES,
  canPublish,
  feedQueueFor,
  routingKeyFor,
} from './topology.js';
export type { RestrictedFeed } from './topology.js';
export { createEnvelope, decodeEnvelope, encodeEnvelope } from './envelope.js';
export { NoOpMessageBus } from './NoOpMessageBus.js';
export type { IRoleRouter } from './IRoleRouter.js';
export { BaseRoleRouter } from './BaseRoleRouter.js';
export { RoleRouter } from './RoleRouter.js';
export { NoOpRoleRouter } from './NoOpRoleRouter.js';
export { createRoleRouter } from './createRoleRouter.js';
