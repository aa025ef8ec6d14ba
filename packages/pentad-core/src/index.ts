// Main entry point - re-export all modules

export * from './roles/index.js';
export * from './messaging/index.js';
export * from './goals/index.js';
export * from './supervisor/index.js';

export type { ILogger } from './shared/logging/ILogger.js';
export type {
  IFileSystem,
  IProcessExecutor,
  ExecOptions,
  ExecResult,
  SpawnOptions,
  SpawnResult,
  TerminationSignal,
} from './shared/platform/index.js';
export {
  PentadError,
  ConfigurationError,
  ConnectivityError,
  GoalParseError,
  ProcessError,
  PermissionViolation,
  TimeoutError,
  describeError,
} from './shared/utils/errors.js';
export { withTimeout, delay } from './shared/utils/timeout.js';
