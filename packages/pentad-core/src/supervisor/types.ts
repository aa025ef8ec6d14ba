/**
 * Process supervision types
 */

import type { RoleId } from '../roles/types.js';

export type AgentProcessStatus = 'pending' | 'running' | 'stopped' | 'failed';

/**
 * How to start one agent. `script` is checked for existence before spawning.
 */
export interface AgentLaunchSpec {
  role: RoleId;
  title: string;
  command: string;
  args: string[];
  script?: string;
}

export interface AgentProcess {
  role: RoleId;
  title: string;
  command: string;
  args: string[];
  status: AgentProcessStatus;
  pid?: number;
  startedAt?: Date;
  error?: string;
}

/**
 * role → PID, as persisted in the registry file
 */
export type ProcessRegistryEntries = Partial<Record<RoleId, number>>;

export interface LaunchSummary {
  launched: RoleId[];
  skipped: RoleId[];
  failed: RoleId[];
  processes: AgentProcess[];
}

export interface SupervisorStatus {
  /** Registry file present. Never cross-checked against the OS. */
  running: boolean;
  entries: ProcessRegistryEntries;
}

export interface StopSummary {
  /** False when there was no registry to act on */
  stopped: boolean;
  terminated: RoleId[];
  killed: RoleId[];
  warnings: string[];
}
