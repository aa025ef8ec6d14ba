/**
 * Agent process entry: wires logger, config, bus and router for one role
 * and runs it until signalled
 */

import {
  NoOpMessageBus,
  RoleRegistry,
  createRoleRouter,
  describeError,
  type RoleId,
} from '@pentad/core';
import { FileSystemAdapter, createMessageBus } from '@pentad/node';
import { Logger } from '../../shared/utils/logger.js';
import { ConfigLoader } from '../../shared/config/ConfigLoader.js';
import { workspacePaths } from '../../shared/config/paths.js';
import { titleOverrides } from '../../shared/utils/titles.js';
import { GoalStore } from '../goals/GoalStore.js';
import { createAgent } from './createAgent.js';
import { TerminalIO } from './TerminalIO.js';

export interface RunAgentOptions {
  /** Skip the broker; defaults to PENTAD_OFFLINE=1 in the environment */
  offline?: boolean;
}

/**
 * Resolves with the process exit code
 */
export async function runAgent(
  role: RoleId,
  projectRoot: string,
  options: RunAgentOptions = {}
): Promise<number> {
  const paths = workspacePaths(projectRoot);
  const logger = new Logger({ logDir: paths.logs, fileName: `${role}.log`, console: false });
  const fs = new FileSystemAdapter();

  // A signal that lands before the agent exists is replayed once it does
  const pending: { signal?: string } = {};
  let shutdown = (reason: string): void => {
    pending.signal = reason;
  };
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info('Signal received', { role, signal });
    shutdown(signal);
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const configLoader = new ConfigLoader(fs, logger.child('config'));
    const config = await configLoader.load({ projectRoot });

    const offline = options.offline ?? process.env.PENTAD_OFFLINE === '1';
    const busLogger = logger.child('bus');
    const bus = offline
      ? new NoOpMessageBus(busLogger)
      : await createMessageBus(config.broker, busLogger);

    const definition = new RoleRegistry(titleOverrides(config)).get(role);
    process.title = definition.title;

    const io = role === 'interactive' && process.stdin.isTTY === true ? new TerminalIO() : null;
    const agent = createAgent(
      {
        definition,
        projectRoot,
        paths,
        router: createRoleRouter(role, bus, logger.child('router')),
        fs,
        configLoader,
        goals: new GoalStore(fs, paths.goal, logger.child('goal')),
        logger: logger.child(role),
      },
      io
    );

    shutdown = (reason) => {
      agent.shutdown(reason).catch((error: unknown) => {
        logger.error('Shutdown failed', { role, error: describeError(error) });
      });
    };
    if (pending.signal !== undefined) {
      shutdown(pending.signal);
    }

    await agent.run();
    return 0;
  } catch (error) {
    logger.error('Agent failed', {
      role,
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 1;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
    await logger.close();
  }
}
