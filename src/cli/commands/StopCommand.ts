/**
 * Stop command handler
 */

import chalk from 'chalk';
import type { IFileSystem, ILogger, IProcessExecutor } from '@pentad/core';
import { createSupervisor } from '../../features/supervisor/createSupervisor.js';

export class StopCommand {
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

    const summary = await supervisor.stopAll();
    if (!summary.stopped) {
      console.log(chalk.yellow('⚠️  No running agents found'));
      return true;
    }

    const warnings = summary.warnings.length > 0 ? ` (${summary.warnings.length} warnings, see log)` : '';
    console.log(chalk.green(`🛑 Stopped ${summary.terminated.length} agents${warnings}`));
    return true;
  }
}
