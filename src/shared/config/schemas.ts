/**
 * Configuration schemas with Zod validation
 */

import { z } from 'zod';
import { BrokerConfigSchema, ROLE_IDS } from '@pentad/core';

export const AgentSettingsSchema = z.object({
  title: z.string().min(1).optional(),
});

export const CommunicationConfigSchema = z.object({
  broker: BrokerConfigSchema.default({}),
  agents: z.record(z.enum(ROLE_IDS), AgentSettingsSchema).default({}),
});

/**
 * Shape accepted from config.yml: every key optional
 */
export const CommunicationFileSchema = z.object({
  broker: BrokerConfigSchema.partial().optional(),
  agents: z.record(z.enum(ROLE_IDS), AgentSettingsSchema).optional(),
});

export const AutoFixPatternsSchema = z.object({
  enabled: z.boolean().default(true),
  performanceFirst: z.boolean().default(true),
  escalateComplex: z.boolean().default(true),
});

export const ProtocolRulesSchema = z.object({
  version: z.string().default('1.0.0'),
  created: z.string().default(''),
  repositoryGoalFocus: z.boolean().default(true),
  maxRulesLimit: z.number().int().positive().default(10),
  rules: z.record(z.string()).default({}),
  autoFixPatterns: AutoFixPatternsSchema.default({}),
});

export type AgentSettings = z.infer<typeof AgentSettingsSchema>;
export type CommunicationConfig = z.infer<typeof CommunicationConfigSchema>;
export type CommunicationFile = z.infer<typeof CommunicationFileSchema>;
export type ProtocolRules = z.infer<typeof ProtocolRulesSchema>;
