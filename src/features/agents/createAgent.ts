import { BaseAgent } from './BaseAgent.js';
import { InteractiveAgent } from './InteractiveAgent.js';
import { FixerAgent } from './FixerAgent.js';
import { GovernorAgent } from './GovernorAgent.js';
import { AuditorAgent } from './AuditorAgent.js';
import { InsightAgent } from './InsightAgent.js';
import type { AgentContext, AgentIO } from './types.js';

/**
 * Build the runtime for the context's role. `io` only matters to the
 * interactive hub; null runs it headless.
 */
export function createAgent(context: AgentContext, io: AgentIO | null = null): BaseAgent {
  switch (context.definition.role) {
    case 'interactive':
      return new InteractiveAgent(context, io);
    case 'fixer':
      return new FixerAgent(context);
    case 'governor':
      return new GovernorAgent(context);
    case 'auditor':
      return new AuditorAgent(context);
    case 'insight':
      return new InsightAgent(context);
  }
}
