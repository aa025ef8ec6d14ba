/**
 * Fixed exchange/queue topology and the role → exchange publish table
 */

import type { RoleId } from '../roles/types.js';
import type { ExchangeName, QueueDeclaration } from './types.js';

interface ExchangeDefinition {
  /** 'any' means every role, scoped under its own id */
  publisher: RoleId | 'any';
  routingKey(role: RoleId, type: string): string;
}

export const EXCHANGES: Record<ExchangeName, ExchangeDefinition> = {
  'agent.activities': {
    publisher: 'any',
    routingKey: (role, type) => `${role}.activity.${type}`,
  },
  'code.changes': {
    publisher: 'any',
    routingKey: (role, type) => `${role}.code.${type}`,
  },
  'protocol.updates': {
    publisher: 'governor',
    routingKey: (_role, type) => `protocol.${type}`,
  },
  'governance.reviews': {
    publisher: 'auditor',
    routingKey: (_role, type) => `governance.${type}`,
  },
  'feature.insights': {
    publisher: 'insight',
    routingKey: (_role, type) => `feature.${type}`,
  },
};

/**
 * The queue each consuming role owns in the declared topology
 */
export const ROLE_QUEUES: Record<RoleId, QueueDeclaration> = {
  interactive: {
    queue: 'interactive.feature-insights',
    bindings: [{ exchange: 'feature.insights', pattern: 'feature.*' }],
  },
  fixer: {
    queue: 'fixer.interactive-events',
    bindings: [
      { exchange: 'agent.activities', pattern: 'interactive.activity.*' },
      { exchange: 'code.changes', pattern: 'interactive.code.*' },
    ],
  },
  governor: {
    queue: 'governor.activities',
    bindings: [{ exchange: 'agent.activities', pattern: '*.activity.*' }],
  },
  auditor: {
    queue: 'auditor.protocol-reviews',
    bindings: [{ exchange: 'protocol.updates', pattern: 'protocol.*' }],
  },
  insight: {
    queue: 'insight.code-changes',
    bindings: [{ exchange: 'code.changes', pattern: '*.code.*' }],
  },
};

export type RestrictedFeed = 'protocolUpdates' | 'governanceFeedback';

interface RestrictedFeedDefinition {
  label: string;
  consumers: readonly RoleId[];
  exchange: ExchangeName;
  pattern: string;
  queueSuffix: string;
}

/**
 * Feeds only specific roles may listen to
 */
export const RESTRICTED_FEEDS: Record<RestrictedFeed, RestrictedFeedDefinition> = {
  protocolUpdates: {
    label: 'protocol updates',
    consumers: ['interactive', 'fixer'],
    exchange: 'protocol.updates',
    pattern: 'protocol.*',
    queueSuffix: 'protocol-updates',
  },
  governanceFeedback: {
    label: 'governance feedback',
    consumers: ['governor'],
    exchange: 'governance.reviews',
    pattern: 'governance.*',
    queueSuffix: 'governance-feedback',
  },
};

export function canPublish(role: RoleId, exchange: ExchangeName): boolean {
  const publisher = EXCHANGES[exchange].publisher;
  return publisher === 'any' || publisher === role;
}

export function routingKeyFor(exchange: ExchangeName, role: RoleId, type: string): string {
  return EXCHANGES[exchange].routingKey(role, type);
}

export function feedQueueFor(feed: RestrictedFeed, role: RoleId): QueueDeclaration {
  const definition = RESTRICTED_FEEDS[feed];
  return {
    queue: `${role}.${definition.queueSuffix}`,
    bindings: [{ exchange: definition.exchange, pattern: definition.pattern }],
  };
}
