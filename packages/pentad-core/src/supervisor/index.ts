export { ProcessSupervisor } from './ProcessSupervisor.js';
export type { ProcessSupervisorOptions } from './ProcessSupervisor.js';
export { ProcessRegistry, ProcessRegistrySchema } from './ProcessRegistry.js';
export type {
  AgentLaunchSpec,
  AgentProcess,
  AgentProcessStatus,
  LaunchSummary,
  ProcessRegistryEntries,
  StopSummary,
  SupervisorStatus,
} from './types.js';
