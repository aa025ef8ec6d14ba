/**
 * AuditorAgent - reviews every protocol change the governor publishes
 */

import type { MessageEnvelope } from '@pentad/core';
import { BaseAgent } from './BaseAgent.js';
import type { ProtocolRules } from '../../shared/config/schemas.js';

export const MAX_RULE_LENGTH = 200;

export type Verdict = 'approved' | 'revise';

export interface ProtocolReview {
  verdict: Verdict;
  findings: string[];
}

export function reviewProtocols(protocols: ProtocolRules): ProtocolReview {
  const findings: string[] = [];
  const rules = Object.entries(protocols.rules);

  if (rules.length > protocols.maxRulesLimit) {
    findings.push(`Rule count ${rules.length} exceeds limit ${protocols.maxRulesLimit}`);
  }
  for (const [name, text] of rules) {
    if (text.length > MAX_RULE_LENGTH) {
      findings.push(`Rule "${name}" exceeds ${MAX_RULE_LENGTH} characters`);
    }
  }

  return { verdict: findings.length === 0 ? 'approved' : 'revise', findings };
}

export class AuditorAgent extends BaseAgent {
  protected async subscribe(): Promise<void> {
    await this.context.router.listenOnRoleQueue((envelope) => this.auditUpdate(envelope));
  }

  async auditUpdate(envelope: MessageEnvelope): Promise<void> {
    await this.reloadProtocols();
    const review = reviewProtocols(this.protocols);

    this.context.router.sendGovernanceReview('protocol_review', {
      updateType: envelope.routingKey,
      verdict: review.verdict,
      ruleCount: Object.keys(this.protocols.rules).length,
      maxRulesLimit: this.protocols.maxRulesLimit,
      findings: review.findings,
    });
    this.context.logger.info('Protocol reviewed', { verdict: review.verdict });
  }
}
