/**
 * Init command handler
 * Initializes the Pentad workspace in the target project
 */

import chalk from 'chalk';
import type { IFileSystem, ILogger, IProcessExecutor } from '@pentad/core';
import { ConfigLoader } from '../../shared/config/ConfigLoader.js';
import { PentadInitializer } from '../../core/PentadInitializer.js';
import { DependencyChecker } from '../../core/DependencyChecker.js';

export class InitCommand {
  private initializer: PentadInitializer;
  private dependencies: DependencyChecker;

  constructor(
    fs: IFileSystem,
    executor: IProcessExecutor,
    configLoader: ConfigLoader,
    private logger: ILogger
  ) {
    this.initializer = new PentadInitializer(fs, configLoader, logger);
    this.dependencies = new DependencyChecker(executor, logger);
  }

  async execute(projectRoot: string): Promise<boolean> {
    this.logger.info('Initializing Pentad', { projectRoot });

    const result = await this.initializer.initializeWorkspace(projectRoot);
    if (!result.success) {
      console.log(chalk.red(`❌ Initialization failed: ${result.errors.join('; ')}`));
      return false;
    }

    const report = await this.dependencies.check();
    if (!report.ok) {
      const missing = report.dependencies.filter((dependency) => !dependency.found);
      console.log(
        chalk.yellow(
          `⚠️  Pentad initialized with missing dependencies: ${missing.map((dependency) => dependency.name).join(', ')}`
        )
      );
      return true;
    }

    console.log(
      chalk.green(`✅ Pentad initialized in ${projectRoot} (${result.created.length} items created)`)
    );
    return true;
  }
}
