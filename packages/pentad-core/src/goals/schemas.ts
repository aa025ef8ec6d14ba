/**
 * Goal document schema (snake_case, as stored on disk)
 */

import { z } from 'zod';
import type { RepositoryGoal } from './types.js';

const TextSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

const TextMapSchema = z
  .record(TextSchema)
  .nullish()
  .transform((value) => value ?? {});

export const GoalDocumentSchema = z.object({
  goal: z
    .object({ primary: TextSchema, description: TextSchema })
    .nullish()
    .transform((value) => value ?? { primary: '', description: '' }),
  success_criteria: z
    .array(TextSchema)
    .nullish()
    .transform((value) => value ?? []),
  constraints: TextMapSchema,
  stakeholders: TextMapSchema,
  scope: z
    .object({ included: TextSchema, excluded: TextSchema })
    .nullish()
    .transform((value) => value ?? { included: '', excluded: '' }),
  metadata: TextMapSchema,
  created: TextSchema,
  last_updated: TextSchema,
  version: TextSchema,
});

export type GoalDocument = z.infer<typeof GoalDocumentSchema>;

/**
 * Metadata may sit at the top level (as `init` writes it) or under a
 * `metadata` map. Top-level keys win.
 */
export function toRepositoryGoal(document: GoalDocument): RepositoryGoal {
  const metadata = document.metadata;
  return {
    primary: document.goal.primary.trim(),
    description: document.goal.description,
    successCriteria: document.success_criteria,
    constraints: document.constraints,
    stakeholders: document.stakeholders,
    scope: document.scope,
    metadata: {
      created: document.created || metadata.created || '',
      lastUpdated: document.last_updated || metadata.last_updated || '',
      version: document.version || metadata.version || '1.0',
    },
  };
}

export function toGoalDocument(goal: RepositoryGoal): Record<string, unknown> {
  return {
    goal: {
      primary: goal.primary,
      description: goal.description,
    },
    success_criteria: [...goal.successCriteria],
    constraints: { ...goal.constraints },
    stakeholders: { ...goal.stakeholders },
    scope: {
      included: goal.scope.included,
      excluded: goal.scope.excluded,
    },
    created: goal.metadata.created,
    last_updated: goal.metadata.lastUpdated,
    version: goal.metadata.version,
  };
}
