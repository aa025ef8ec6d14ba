/**
 * ProcessSupervisor - launches, tracks and terminates the agent processes
 */

import type { ILogger } from '../shared/logging/ILogger.js';
import type { IFileSystem } from '../shared/platform/IFileSystem.js';
import type { IProcessExecutor } from '../shared/platform/IProcessExecutor.js';
import { ConfigurationError, describeError } from '../shared/utils/errors.js';
import { delay } from '../shared/utils/timeout.js';
import { RoleRegistry } from '../roles/RoleRegistry.js';
import { ROLE_IDS, type AgentRoleDefinition, type RoleId } from '../roles/types.js';
import { ProcessRegistry } from './ProcessRegistry.js';
import type {
  AgentLaunchSpec,
  AgentProcess,
  LaunchSummary,
  ProcessRegistryEntries,
  StopSummary,
  SupervisorStatus,
} from './types.js';

export interface ProcessSupervisorOptions {
  projectRoot: string;
  /** Full path of the role → PID file */
  registryPath: string;
  /** Directory holding the registry file */
  registryDir: string;
  fs: IFileSystem;
  executor: IProcessExecutor;
  logger: ILogger;
  resolveLaunch: (definition: AgentRoleDefinition) => AgentLaunchSpec;
  roles?: RoleRegistry;
  /** Exposed to agents as NODE_PATH */
  moduleSearchPath?: string;
  baseEnv?: Record<string, string>;
  /** Delay between SIGTERM and SIGKILL */
  graceDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

export class ProcessSupervisor {
  private readonly registry: ProcessRegistry;
  private readonly roles: RoleRegistry;
  private readonly graceDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => Date;
  private processes: Map<RoleId, AgentProcess> = new Map();

  constructor(private readonly options: ProcessSupervisorOptions) {
    this.registry = new ProcessRegistry(options.fs, options.registryPath, options.registryDir);
    this.roles = options.roles ?? new RoleRegistry();
    this.graceDelayMs = options.graceDelayMs ?? 1500;
    this.sleep = options.sleep ?? delay;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Processes started (or attempted) by this supervisor instance
   */
  getProcesses(): AgentProcess[] {
    return [...this.processes.values()];
  }

  async launchAll(roles: readonly RoleId[] = ROLE_IDS): Promise<LaunchSummary> {
    const summary: LaunchSummary = { launched: [], skipped: [], failed: [], processes: [] };
    const entries: ProcessRegistryEntries = {};

    for (const role of roles) {
      const spec = this.options.resolveLaunch(this.roles.get(role));
      const agent: AgentProcess = {
        role,
        title: spec.title,
        command: spec.command,
        args: spec.args,
        status: 'pending',
      };

      if (spec.script !== undefined && !(await this.options.fs.exists(spec.script))) {
        this.options.logger.warn('Agent script not found, skipping', {
          role,
          script: spec.script,
        });
        summary.skipped.push(role);
        continue;
      }

      this.processes.set(role, agent);
      summary.processes.push(agent);

      try {
        const { pid } = this.options.executor.spawnDetached(spec.command, spec.args, {
          cwd: this.options.projectRoot,
          env: this.environmentFor(role),
          onError: (error) => {
            this.options.logger.error('Agent process failed after launch', {
              role,
              error: error.message,
            });
          },
        });

        agent.status = 'running';
        agent.pid = pid;
        agent.startedAt = this.clock();
        entries[role] = pid;
        summary.launched.push(role);
        this.options.logger.info('Agent launched', { role, pid, title: spec.title });
      } catch (error) {
        agent.status = 'failed';
        agent.error = describeError(error);
        summary.failed.push(role);
        this.options.logger.error('Agent launch failed', { role, error: agent.error });
      }
    }

    if (Object.keys(entries).length === 0) {
      await this.registry.remove();
      this.options.logger.warn('No agents launched, process registry not saved', {
        path: this.registry.path,
      });
      return summary;
    }

    await this.registry.write(entries);
    this.options.logger.info('Process registry saved', {
      path: this.registry.path,
      agents: Object.keys(entries).length,
    });

    return summary;
  }

  /**
   * Reads the registry only. A recorded PID may belong to a process that
   * has already exited; a registry without entries counts as not running.
   */
  async status(): Promise<SupervisorStatus> {
    const entries = await this.registry.read();
    return entries === null || Object.keys(entries).length === 0
      ? { running: false, entries: {} }
      : { running: true, entries };
  }

  /**
   * SIGTERM every recorded PID, wait, then SIGKILL whatever is still
   * reachable. The registry is removed regardless of the outcome.
   */
  async stopAll(): Promise<StopSummary> {
    const summary: StopSummary = { stopped: false, terminated: [], killed: [], warnings: [] };

    let entries: ProcessRegistryEntries | null;
    try {
      entries = await this.registry.read();
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      this.warn(summary, error.message);
      await this.registry.remove();
      return summary;
    }

    if (entries === null) {
      this.options.logger.warn('No running agents found', { path: this.registry.path });
      return summary;
    }

    const recorded = ROLE_IDS.flatMap((role) => {
      const pid = entries?.[role];
      return pid === undefined ? [] : [{ role, pid }];
    });

    for (const { role, pid } of recorded) {
      try {
        this.options.executor.kill(pid, 'SIGTERM');
        summary.terminated.push(role);
        this.options.logger.info('Sent SIGTERM', { role, pid });
      } catch (error) {
        this.warn(summary, `Could not terminate ${role} (PID ${pid}): ${describeError(error)}`);
      }
    }

    if (recorded.length > 0) {
      await this.sleep(this.graceDelayMs);
    }

    for (const { role, pid } of recorded) {
      if (!this.options.executor.isReachable(pid)) {
        continue;
      }
      try {
        this.options.executor.kill(pid, 'SIGKILL');
        summary.killed.push(role);
        this.options.logger.info('Sent SIGKILL', { role, pid });
      } catch (error) {
        this.warn(summary, `Could not kill ${role} (PID ${pid}): ${describeError(error)}`);
      }
    }

    await this.registry.remove();
    for (const agent of this.processes.values()) {
      if (agent.status === 'running') {
        agent.status = 'stopped';
      }
    }

    summary.stopped = true;
    return summary;
  }

  private environmentFor(role: RoleId): Record<string, string> {
    const env: Record<string, string> = {
      ...this.options.baseEnv,
      PENTAD_ROLE: role,
      PENTAD_PROJECT_ROOT: this.options.projectRoot,
    };
    if (this.options.moduleSearchPath !== undefined) {
      env.NODE_PATH = this.options.moduleSearchPath;
    }
    return env;
  }

  private warn(summary: StopSummary, message: string): void {
    summary.warnings.push(message);
    this.options.logger.warn(message);
  }
}
