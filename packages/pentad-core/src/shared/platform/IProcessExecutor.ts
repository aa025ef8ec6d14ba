/**
 * Platform-agnostic process execution interface
 * Implementation uses execa
 */

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeout?: number;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  command: string;
  timedOut: boolean;
}

export interface SpawnOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Called when the child fails after spawning (e.g. exec error reported asynchronously) */
  onError?: (error: Error) => void;
}

export interface SpawnResult {
  pid: number;
}

export type TerminationSignal = 'SIGTERM' | 'SIGKILL';

export interface IProcessExecutor {
  /**
   * Execute command and wait for completion
   */
  execute(command: string, args?: string[], options?: ExecOptions): Promise<ExecResult>;

  /**
   * Spawn a detached process that outlives the caller.
   * Throws ProcessError when no PID could be obtained.
   */
  spawnDetached(command: string, args: string[], options?: SpawnOptions): SpawnResult;

  /**
   * Deliver a signal to a PID. Throws when the process is gone or not signalable.
   */
  kill(pid: number, signal: TerminationSignal): void;

  /**
   * Whether a signal could currently be delivered to the PID
   */
  isReachable(pid: number): boolean;
}
