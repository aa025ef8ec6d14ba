/**
 * Pentad CLI entry point
 *
 * Note: Shebang is NOT included in source code.
 * bin/pentad.js registers the TypeScript loader and imports this file.
 */

import path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { describeError } from '@pentad/core';
import { FileSystemAdapter, ProcessExecutorAdapter } from '@pentad/node';
import { ConfigLoader } from './shared/config/ConfigLoader.js';
import { workspacePaths } from './shared/config/paths.js';
import { findProjectRoot } from './shared/utils/projectRoot.js';
import { Logger } from './shared/utils/logger.js';
import { InitCommand } from './cli/commands/InitCommand.js';
import { StartCommand } from './cli/commands/StartCommand.js';
import { StopCommand } from './cli/commands/StopCommand.js';
import { StatusCommand } from './cli/commands/StatusCommand.js';
import { AgentCommand } from './cli/commands/AgentCommand.js';

const fs = new FileSystemAdapter();
const executor = new ProcessExecutorAdapter();

async function resolveProject(project: string | undefined): Promise<string> {
  return project !== undefined ? path.resolve(project) : findProjectRoot(fs, process.cwd());
}

/**
 * Run one command against a project with a per-run log file, then exit
 * with 0 on success and 1 otherwise
 */
async function run(
  project: string | undefined,
  command: (projectRoot: string, logger: Logger) => Promise<boolean>
): Promise<void> {
  const projectRoot = await resolveProject(project);
  const logger = new Logger({ logDir: workspacePaths(projectRoot).logs, console: false });

  let ok = false;
  try {
    ok = await command(projectRoot, logger);
  } catch (error) {
    logger.error('Command failed', {
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    console.error(chalk.red(`❌ Error: ${describeError(error)}`));
  }

  await logger.close();
  process.exit(ok ? 0 : 1);
}

const program = new Command();

program
  .name('pentad')
  .description('Coordinate five cooperating development agents over a message broker')
  .version('0.1.0');

program
  .command('init [project]')
  .description('Create the .pentad workspace in a project')
  .action((project: string | undefined) =>
    run(project, (projectRoot, logger) =>
      new InitCommand(fs, executor, new ConfigLoader(fs, logger.child('config')), logger).execute(projectRoot)
    )
  );

program
  .command('start [project]', { isDefault: true })
  .description('Launch the five agents')
  .option('--offline', 'Start without a message broker')
  .action((project: string | undefined, options: { offline?: boolean }) =>
    run(project, (projectRoot, logger) =>
      new StartCommand(fs, executor, new ConfigLoader(fs, logger.child('config')), logger).execute(
        projectRoot,
        { offline: options.offline === true }
      )
    )
  );

program
  .command('stop [project]')
  .description('Stop every registered agent')
  .action((project: string | undefined) =>
    run(project, (projectRoot, logger) => new StopCommand(fs, executor, logger).execute(projectRoot))
  );

program
  .command('status [project]')
  .description('Show registered agents and the repository goal')
  .action((project: string | undefined) =>
    run(project, (projectRoot, logger) => new StatusCommand(fs, executor, logger).execute(projectRoot))
  );

program
  .command('agent <role> [project]', { hidden: true })
  .description('Run one agent in the foreground')
  .action(async (role: string, project: string | undefined) => {
    const projectRoot = await resolveProject(project);
    const ok = await new AgentCommand().execute(role, projectRoot);
    process.exit(ok ? 0 : 1);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`❌ Error: ${describeError(error)}`));
  process.exit(1);
});
