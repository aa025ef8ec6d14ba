import type { RoleId } from '../roles/types.js';
import { MessageEnvelopeSchema } from './schemas.js';
import type { MessageEnvelope, MessagePayload } from './types.js';

/**
 * Wrap a payload for publishing. Timestamp and source are fixed here and
 * the result is frozen.
 */
export function createEnvelope(
  routingKey: string,
  data: MessagePayload,
  source: RoleId | null,
  now: Date = new Date()
): MessageEnvelope {
  return Object.freeze({
    timestamp: now.toISOString(),
    source,
    routingKey,
    data: Object.freeze({ ...data }),
  });
}

export function encodeEnvelope(envelope: MessageEnvelope): string {
  return JSON.stringify(envelope);
}

/**
 * Throws on malformed JSON or a body that is not an envelope
 */
export function decodeEnvelope(content: string): MessageEnvelope {
  const parsed = MessageEnvelopeSchema.parse(JSON.parse(content));
  return Object.freeze({ ...parsed, data: Object.freeze(parsed.data) });
}
