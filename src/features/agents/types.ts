/**
 * Agent runtime types
 */

import type { AgentRoleDefinition, IFileSystem, ILogger, IRoleRouter } from '@pentad/core';
import type { ConfigLoader } from '../../shared/config/ConfigLoader.js';
import type { WorkspacePaths } from '../../shared/config/paths.js';
import type { GoalStore } from '../goals/GoalStore.js';

/**
 * Line-based terminal I/O for the human-facing agent
 */
export interface AgentIO {
  print(line: string): void;
  /** Null once input is exhausted */
  read(prompt: string): Promise<string | null>;
  close(): void;
}

/**
 * Everything an agent process needs, built once by runAgent
 */
export interface AgentContext {
  definition: AgentRoleDefinition;
  projectRoot: string;
  paths: WorkspacePaths;
  router: IRoleRouter;
  fs: IFileSystem;
  configLoader: ConfigLoader;
  goals: GoalStore;
  logger: ILogger;
  clock?: () => Date;
}

export interface AgentTimers {
  /** Idle heartbeat after consumption returns */
  heartbeatMs?: number;
}
