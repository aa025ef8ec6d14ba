/**
 * Status command handler
 * Reports the process registry and goal state; never probes the processes
 */

import chalk from 'chalk';
import { ROLE_IDS, type IFileSystem, type ILogger, type IProcessExecutor } from '@pentad/core';
import { workspacePaths } from '../../shared/config/paths.js';
import { GoalStore } from '../../features/goals/GoalStore.js';
import { createSupervisor } from '../../features/supervisor/createSupervisor.js';

export class StatusCommand {
  constructor(
    private fs: IFileSystem,
    private executor: IProcessExecutor,
    private logger: ILogger
  ) {}

  async execute(projectRoot: string): Promise<boolean> {
    const supervisor = createSupervisor({
      projectRoot,
      fs: this.fs,
      executor: this.executor,
      logger: this.logger,
    });

    const status = await supervisor.status();
    const goal = await new GoalStore(this.fs, workspacePaths(projectRoot).goal, this.logger).load();

    for (const role of ROLE_IDS) {
      const pid = status.entries[role];
      if (pid !== undefined) {
        console.log(`  ${chalk.cyan(role.padEnd(12))} PID ${pid}`);
      }
    }

    const goalText = goal.goal !== null ? goal.goal.primary : `goal ${goal.status}`;
    const count = Object.keys(status.entries).length;
    const summary = status.running
      ? chalk.green(`📊 ${count} agents registered · ${goalText}`)
      : chalk.yellow(`📊 Not running · ${goalText}`);
    console.log(summary);
    return true;
  }
}
