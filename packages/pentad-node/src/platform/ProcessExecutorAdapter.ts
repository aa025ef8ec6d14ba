/**
 * ProcessExecutorAdapter - Cross-platform process execution implementation
 * Uses execa for command execution and detached agent launches
 */

import {
  ProcessError,
  type ExecOptions,
  type ExecResult,
  type IProcessExecutor,
  type SpawnOptions,
  type SpawnResult,
  type TerminationSignal,
} from '@pentad/core';
import { execa } from 'execa';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class ProcessExecutorAdapter implements IProcessExecutor {
  /**
   * Execute command and wait for completion
   */
  async execute(
    command: string,
    args: string[] = [],
    options: ExecOptions = {}
  ): Promise<ExecResult> {
    try {
      const result = await execa(command, args, {
        cwd: options.cwd,
        env: options.env,
        timeout: options.timeout,
        reject: false, // Don't throw on non-zero exit codes
      });

      return {
        stdout: result.stdout,
        stderr: result.stderr,
        // No exit code means the process never ran or was killed
        exitCode: result.exitCode ?? (result.failed ? 127 : 0),
        command: result.command,
        timedOut: result.timedOut ?? false,
      };
    } catch (error) {
      // ENOENT (command not found) maps to the shell's 127
      return {
        stdout: '',
        stderr: error instanceof Error ? error.message : String(error),
        exitCode: errorCode(error) === 'ENOENT' ? 127 : 1,
        command: `${command} ${args.join(' ')}`.trim(),
        timedOut: false,
      };
    }
  }

  /**
   * Start a process in its own process group with no stdio attached, so it
   * survives the caller
   */
  spawnDetached(command: string, args: string[], options: SpawnOptions = {}): SpawnResult {
    const subprocess = execa(command, args, {
      cwd: options.cwd,
      env: options.env,
      detached: true,
      stdio: 'ignore',
      cleanup: false,
      reject: false,
    });

    if (subprocess.pid === undefined) {
      throw new ProcessError(`Failed to start ${command}`);
    }
    const pid = subprocess.pid;

    subprocess.unref();
    subprocess
      .then((result) => {
        if (result.failed && result.signal === undefined) {
          options.onError?.(
            new ProcessError(`${command} exited with code ${result.exitCode}`, undefined, pid)
          );
        }
      })
      .catch((error: unknown) => {
        options.onError?.(error instanceof Error ? error : new Error(String(error)));
      });

    return { pid };
  }

  kill(pid: number, signal: TerminationSignal): void {
    process.kill(pid, signal);
  }

  isReachable(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      // Exists but owned by another user
      return errorCode(error) === 'EPERM';
    }
  }
}
