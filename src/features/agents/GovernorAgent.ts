/**
 * GovernorAgent - turns recurring activity into protocol rules
 */

import type { MessageEnvelope } from '@pentad/core';
import { BaseAgent } from './BaseAgent.js';
import { GovernanceReviewSchema, parseRoutingKey } from './payloads.js';
import type { AgentContext, AgentTimers } from './types.js';

/** Lifecycle and bookkeeping activities never become rules */
const IGNORED_ACTIVITIES = new Set([
  'startup',
  'shutdown',
  'periodic_check',
  'protocol_received',
]);

export const PATTERN_THRESHOLD = 3;

export interface GovernorOptions extends AgentTimers {
  threshold?: number;
}

export class GovernorAgent extends BaseAgent {
  private counts = new Map<string, number>();
  private readonly threshold: number;

  constructor(context: AgentContext, options: GovernorOptions = {}) {
    super(context, options);
    this.threshold = options.threshold ?? PATTERN_THRESHOLD;
  }

  protected async subscribe(): Promise<void> {
    await this.context.router.listenOnRoleQueue((envelope) => this.observeActivity(envelope));
    await this.context.router.listenForGovernanceFeedback((envelope) =>
      this.onGovernanceFeedback(envelope)
    );
  }

  occurrences(activityType: string): number {
    return this.counts.get(activityType) ?? 0;
  }

  async observeActivity(envelope: MessageEnvelope): Promise<void> {
    const { source, kind, type } = parseRoutingKey(envelope.routingKey);
    if (kind !== 'activity' || IGNORED_ACTIVITIES.has(type)) {
      return;
    }

    const count = this.occurrences(type) + 1;
    this.counts.set(type, count);

    if (count === this.threshold) {
      await this.recordPattern(type, count, source ?? envelope.source);
    }
  }

  private async recordPattern(activityType: string, occurrences: number, source: string | null): Promise<void> {
    await this.reloadProtocols();

    const rule = `recurring_${activityType}`;
    if (rule in this.protocols.rules) {
      return;
    }
    if (Object.keys(this.protocols.rules).length >= this.protocols.maxRulesLimit) {
      this.context.logger.warn('Rule limit reached, pattern not recorded', {
        activityType,
        maxRulesLimit: this.protocols.maxRulesLimit,
      });
      return;
    }

    const text = `Handle recurring "${activityType}" activity consistently`;
    this.protocols = { ...this.protocols, rules: { ...this.protocols.rules, [rule]: text } };
    await this.context.configLoader.saveProtocolRules(this.context.projectRoot, this.protocols);

    this.context.router.sendProtocolUpdate('pattern_detected', {
      rule,
      text,
      activityType,
      occurrences,
      source,
    });
    this.context.logger.info('Pattern recorded as rule', { rule, occurrences });
  }

  private onGovernanceFeedback(envelope: MessageEnvelope): void {
    const parsed = GovernanceReviewSchema.safeParse(envelope.data);
    if (!parsed.success) {
      this.context.logger.warn('Unreadable governance feedback', { routingKey: envelope.routingKey });
      return;
    }
    const { verdict, findings } = parsed.data;
    if (verdict === 'approved') {
      this.context.logger.info('Protocol change approved', { routingKey: envelope.routingKey });
    } else {
      this.context.logger.warn('Protocol change needs revision', { findings });
    }
  }
}
