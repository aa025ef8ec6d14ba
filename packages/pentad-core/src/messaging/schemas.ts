/**
 * Broker configuration and wire schemas with Zod validation
 */

import { z } from 'zod';
import { ROLE_IDS } from '../roles/types.js';
import type { ExchangeName, ExchangeType } from './types.js';

export const DEFAULT_EXCHANGE_TYPES: Record<ExchangeName, ExchangeType> = {
  'agent.activities': 'topic',
  'code.changes': 'topic',
  'protocol.updates': 'topic',
  'governance.reviews': 'topic',
  'feature.insights': 'topic',
};

export const ExchangeTypeSchema = z.enum(['topic', 'direct', 'fanout', 'headers']);

export const BrokerConfigSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(5672),
  virtualHost: z.string().default('/'),
  username: z.string().default('guest'),
  password: z.string().default('guest'),
  heartbeatSeconds: z.number().int().min(0).default(60),
  connectTimeoutMs: z.number().int().positive().default(5000),
  exchanges: z.record(ExchangeTypeSchema).default({ ...DEFAULT_EXCHANGE_TYPES }),
});

export const MessageEnvelopeSchema = z.object({
  timestamp: z.string(),
  source: z.enum(ROLE_IDS).nullable(),
  routingKey: z.string(),
  data: z.record(z.unknown()),
});

export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;
