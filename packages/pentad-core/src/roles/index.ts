export { RoleRegistry, isRoleId } from './RoleRegistry.js';
export { ROLE_IDS } from './types.js';
export type { RoleId, AgentRoleDefinition, ConsumptionStyle } from './types.js';
