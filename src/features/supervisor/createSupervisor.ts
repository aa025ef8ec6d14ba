/**
 * Builds a ProcessSupervisor that launches agents through this package's
 * own CLI entry (`pentad agent <role> <project>`)
 */

import path from 'path';
import { fileURLToPath } from 'url';
import {
  ProcessSupervisor,
  RoleRegistry,
  type AgentLaunchSpec,
  type AgentRoleDefinition,
  type IFileSystem,
  type ILogger,
  type IProcessExecutor,
  type RoleId,
} from '@pentad/core';
import { workspacePaths } from '../../shared/config/paths.js';

const PACKAGE_ROOT = fileURLToPath(new URL('../../../', import.meta.url));

export const CLI_ENTRY = path.join(PACKAGE_ROOT, 'bin', 'pentad.js');

export interface SupervisorFactoryOptions {
  projectRoot: string;
  fs: IFileSystem;
  executor: IProcessExecutor;
  logger: ILogger;
  /** Agents start without a broker */
  offline?: boolean;
  titles?: Partial<Record<RoleId, string>>;
}

export function resolveAgentLaunch(
  definition: AgentRoleDefinition,
  projectRoot: string,
  entry: string = CLI_ENTRY
): AgentLaunchSpec {
  return {
    role: definition.role,
    title: definition.title,
    command: process.execPath,
    args: [entry, 'agent', definition.role, projectRoot],
    script: entry,
  };
}

export function createSupervisor(options: SupervisorFactoryOptions): ProcessSupervisor {
  const paths = workspacePaths(options.projectRoot);
  const baseEnv: Record<string, string> = options.offline ? { PENTAD_OFFLINE: '1' } : {};

  return new ProcessSupervisor({
    projectRoot: options.projectRoot,
    registryPath: paths.registry,
    registryDir: paths.communication,
    fs: options.fs,
    executor: options.executor,
    logger: options.logger,
    roles: new RoleRegistry(options.titles),
    resolveLaunch: (definition) => resolveAgentLaunch(definition, options.projectRoot),
    moduleSearchPath: path.join(PACKAGE_ROOT, 'node_modules'),
    baseEnv,
  });
}
