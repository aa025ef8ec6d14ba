/**
 * InsightAgent - keeps features/insights.md in step with reported changes
 */

import type { MessageEnvelope } from '@pentad/core';
import { BaseAgent } from './BaseAgent.js';
import { CodeChangeSchema, parseRoutingKey } from './payloads.js';

const INSIGHTS_HEADER = '# Feature Insights\n\n';

export function formatInsightLine(
  timestamp: string,
  source: string,
  changeType: string,
  files: string[]
): string {
  const detail = files.length > 0 ? `: ${files.join(', ')}` : '';
  return `- ${timestamp} [${source}] ${changeType}${detail}\n`;
}

export class InsightAgent extends BaseAgent {
  protected async subscribe(): Promise<void> {
    await this.context.router.listenOnRoleQueue((envelope) => this.recordChange(envelope));
  }

  async recordChange(envelope: MessageEnvelope): Promise<void> {
    const { source: keySource, type } = parseRoutingKey(envelope.routingKey);
    const source = keySource ?? envelope.source ?? 'unknown';
    const { files } = CodeChangeSchema.parse(envelope.data);
    const target = this.context.paths.insights;

    if (!(await this.context.fs.exists(target))) {
      await this.context.fs.mkdir(this.context.paths.features, { recursive: true });
      await this.context.fs.writeFile(target, INSIGHTS_HEADER);
    }
    await this.context.fs.appendFile(target, formatInsightLine(envelope.timestamp, source, type, files));

    this.context.router.sendFeatureInsight('change_recorded', {
      source,
      changeType: type,
      files,
      summary: `${source} ${type} (${files.length} files)`,
    });
  }
}
