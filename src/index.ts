/**
 * Main entry point for Pentad
 * Exports public API
 */

export * from '@pentad/core';
export * from './shared/config/ConfigLoader.js';
export * from './shared/config/schemas.js';
export { workspacePaths, WORKSPACE_DIR } from './shared/config/paths.js';
export type { WorkspacePaths } from './shared/config/paths.js';
export { Logger, runStamp } from './shared/utils/logger.js';
export type { LoggerOptions, LogLevel } from './shared/utils/logger.js';
export { findProjectRoot } from './shared/utils/projectRoot.js';
export { PentadInitializer } from './core/PentadInitializer.js';
export { DependencyChecker, BROKER_BINARY } from './core/DependencyChecker.js';
export { GoalStore } from './features/goals/GoalStore.js';
export type { GoalLoadResult, GoalStatus } from './features/goals/GoalStore.js';
export { createSupervisor, resolveAgentLaunch } from './features/supervisor/createSupervisor.js';
export * from './features/agents/index.js';
