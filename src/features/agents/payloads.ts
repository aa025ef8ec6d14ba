/**
 * Shapes of the message payloads agents read from each other
 */

import { z } from 'zod';
import { isRoleId, type RoleId } from '@pentad/core';

export const UserPromptSchema = z.object({
  prompt: z.string(),
});

export const CodeChangeSchema = z.object({
  files: z.array(z.string()).catch([]),
});

export const GovernanceReviewSchema = z.object({
  verdict: z.enum(['approved', 'revise']),
  findings: z.array(z.string()).catch([]),
});

export const FeatureInsightSchema = z.object({
  summary: z.string(),
});

export interface RoutingKeyParts {
  source: RoleId | null;
  kind: string;
  type: string;
}

/**
 * Split `<role>.<kind>.<type>` (open exchanges) or `<kind>.<type>`
 * (restricted exchanges)
 */
export function parseRoutingKey(routingKey: string): RoutingKeyParts {
  const parts = routingKey.split('.');
  const head = parts[0] ?? '';
  if (parts.length >= 3 && isRoleId(head)) {
    return { source: head, kind: parts[1] ?? '', type: parts.slice(2).join('.') };
  }
  return { source: null, kind: head, type: parts.slice(1).join('.') };
}
