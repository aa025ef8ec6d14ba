/**
 * Platform abstraction exports
 */

export type { IFileSystem } from './IFileSystem.js';
export type {
  IProcessExecutor,
  ExecOptions,
  ExecResult,
  SpawnOptions,
  SpawnResult,
  TerminationSignal,
} from './IProcessExecutor.js';
