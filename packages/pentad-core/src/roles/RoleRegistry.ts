/**
 * RoleRegistry - the fixed set of agent roles
 */

import { ROLE_IDS, type AgentRoleDefinition, type RoleId } from './types.js';

const STANDARD_ROLES: readonly AgentRoleDefinition[] = [
  {
    role: 'interactive',
    title: 'Pentad-Dev-Interactive',
    description: 'Human interactive development hub. The only role a person types into.',
    consumption: 'background',
  },
  {
    role: 'fixer',
    title: 'Pentad-QA-Fixer',
    description: 'Silent fixer. Analyses prompts and code changes from the interactive hub.',
    consumption: 'blocking',
  },
  {
    role: 'governor',
    title: 'Pentad-Protocol-Manager',
    description: 'Pattern learning governor. Turns recurring activity into protocol rules.',
    consumption: 'blocking',
  },
  {
    role: 'auditor',
    title: 'Pentad-Governance-Auditor',
    description: 'Governance auditor. Reviews every protocol change the governor makes.',
    consumption: 'blocking',
  },
  {
    role: 'insight',
    title: 'Pentad-Feature-Intelligence',
    description: 'Feature insight documentarian. Records what changed and why.',
    consumption: 'blocking',
  },
];

export function isRoleId(value: string): value is RoleId {
  return ROLE_IDS.some((role) => role === value);
}

/**
 * Registry for agent role definitions
 */
export class RoleRegistry {
  private roles: Map<RoleId, AgentRoleDefinition> = new Map();

  constructor(titles: Partial<Record<RoleId, string>> = {}) {
    for (const definition of STANDARD_ROLES) {
      this.roles.set(definition.role, {
        ...definition,
        title: titles[definition.role] ?? definition.title,
      });
    }
  }

  get(role: RoleId): AgentRoleDefinition {
    const definition = this.roles.get(role);
    if (!definition) {
      // Unreachable while the constructor registers every ROLE_IDS entry
      throw new Error(`Unknown role: ${role}`);
    }
    return definition;
  }

  /**
   * All roles in launch order
   */
  list(): AgentRoleDefinition[] {
    return ROLE_IDS.map((role) => this.get(role));
  }
}
