/**
 * Agent role types
 */

export const ROLE_IDS = ['interactive', 'fixer', 'governor', 'auditor', 'insight'] as const;

/**
 * The five fixed agent roles
 */
export type RoleId = (typeof ROLE_IDS)[number];

/**
 * How an agent process spends its lifetime on the bus
 */
export type ConsumptionStyle = 'background' | 'blocking';

export interface AgentRoleDefinition {
  /**
   * Role identifier, also the routing-key prefix for its own events
   */
  role: RoleId;

  /**
   * Display title (window/process title)
   */
  title: string;

  /**
   * Human-readable description
   */
  description: string;

  /**
   * Only the human-facing role keeps a foreground loop
   */
  consumption: ConsumptionStyle;
}
