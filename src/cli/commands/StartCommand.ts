/**
 * Start command handler
 * Launches the five agent processes
 */

import chalk from 'chalk';
import ora from 'ora';
import type { IFileSystem, ILogger, IProcessExecutor } from '@pentad/core';
import { ConfigLoader } from '../../shared/config/ConfigLoader.js';
import { workspacePaths } from '../../shared/config/paths.js';
import { titleOverrides } from '../../shared/utils/titles.js';
import { PentadInitializer } from '../../core/PentadInitializer.js';
import { DependencyChecker } from '../../core/DependencyChecker.js';
import { GoalStore } from '../../features/goals/GoalStore.js';
import { createSupervisor } from '../../features/supervisor/createSupervisor.js';

export interface StartOptions {
  /** Start without the broker binary; agents log messages locally */
  offline?: boolean;
}

export class StartCommand {
  constructor(
    private fs: IFileSystem,
    private executor: IProcessExecutor,
    private configLoader: ConfigLoader,
    private logger: ILogger
  ) {}

  async execute(projectRoot: string, options: StartOptions = {}): Promise<boolean> {
    const initializer = new PentadInitializer(this.fs, this.configLoader, this.logger);
    if (!(await initializer.isWorkspaceInitialized(projectRoot))) {
      console.log(chalk.red('❌ Workspace not initialized. Run "pentad init" first.'));
      return false;
    }

    if (!options.offline) {
      const report = await new DependencyChecker(this.executor, this.logger).check();
      if (!report.ok) {
        const missing = report.dependencies
          .filter((dependency) => !dependency.found)
          .map((dependency) => dependency.name);
        console.log(
          chalk.red(`❌ Missing dependencies: ${missing.join(', ')}. Install them or use --offline.`)
        );
        return false;
      }
    }

    const config = await this.configLoader.load({ projectRoot });
    const supervisor = createSupervisor({
      projectRoot,
      fs: this.fs,
      executor: this.executor,
      logger: this.logger,
      offline: options.offline,
      titles: titleOverrides(config),
    });

    if ((await supervisor.status()).running) {
      console.log(chalk.yellow('⚠️  Agents already running. Run "pentad stop" first.'));
      return false;
    }

    const goal = await new GoalStore(this.fs, workspacePaths(projectRoot).goal, this.logger).load();
    if (goal.status !== 'ok') {
      this.logger.warn('Agents start without a usable goal', { status: goal.status });
    }

    const spinner = ora('Launching agents...').start();
    const summary = await supervisor.launchAll();
    spinner.stop();

    const total = summary.launched.length + summary.skipped.length + summary.failed.length;
    if (summary.launched.length === 0) {
      console.log(chalk.red(`❌ No agents launched (${summary.failed.length} failed, ${summary.skipped.length} skipped)`));
      return false;
    }

    const mode = options.offline ? ' (offline)' : '';
    const problems = summary.failed.length + summary.skipped.length;
    const line = `🚀 Launched ${summary.launched.length}/${total} agents${mode}`;
    console.log(problems > 0 ? chalk.yellow(`${line}; not started: ${[...summary.failed, ...summary.skipped].join(', ')}`) : chalk.green(line));
    return summary.failed.length === 0;
  }
}
