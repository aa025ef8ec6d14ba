/**
 * Agent command handler (internal; used by the supervisor)
 */

import chalk from 'chalk';
import { ROLE_IDS, isRoleId } from '@pentad/core';
import { runAgent } from '../../features/agents/runAgent.js';

export class AgentCommand {
  async execute(role: string, projectRoot: string): Promise<boolean> {
    if (!isRoleId(role)) {
      console.log(chalk.red(`❌ Unknown agent role "${role}". Expected one of: ${ROLE_IDS.join(', ')}`));
      return false;
    }
    return (await runAgent(role, projectRoot)) === 0;
  }
}
