/**
 * Connected IMessageBus that routes in process. Queues buffer envelopes
 * until flush() hands them to their subscribers.
 */

import { createEnvelope } from '../../src/messaging/envelope.js';
import type { RoleId } from '../../src/roles/types.js';
import type {
  ConnectionState,
  ConsumeMode,
  ExchangeBinding,
  ExchangeName,
  IMessageBus,
  MessageEnvelope,
  MessageHandler,
  MessagePayload,
  QueueDeclaration,
} from '../../src/messaging/types.js';

export interface PublishedMessage {
  exchange: ExchangeName;
  envelope: MessageEnvelope;
}

interface QueueState {
  bindings: ExchangeBinding[];
  pending: MessageEnvelope[];
  handler?: { handler: MessageHandler; role: RoleId | null };
}

export class InMemoryMessageBus implements IMessageBus {
  readonly published: PublishedMessage[] = [];
  readonly failures: Array<{ routingKey: string; error: unknown }> = [];
  consumeModes: ConsumeMode[] = [];
  closed = false;

  private queues = new Map<string, QueueState>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  isConnected(): boolean {
    return !this.closed;
  }

  async connect(): Promise<ConnectionState> {
    return this.closed ? 'disconnected' : 'connected';
  }

  async declareTopology(): Promise<boolean> {
    return !this.closed;
  }

  async declareQueue(declaration: QueueDeclaration): Promise<boolean> {
    if (this.closed) {
      return false;
    }
    const existing = this.queues.get(declaration.queue);
    if (existing) {
      existing.bindings = [...existing.bindings, ...declaration.bindings];
    } else {
      this.queues.set(declaration.queue, { bindings: [...declaration.bindings], pending: [] });
    }
    return true;
  }

  publish(
    exchange: ExchangeName,
    routingKey: string,
    payload: MessagePayload,
    sourceRole: RoleId | null
  ): boolean {
    if (this.closed) {
      return false;
    }
    const envelope = createEnvelope(routingKey, payload, sourceRole, this.now());
    this.published.push({ exchange, envelope });

    for (const queue of this.queues.values()) {
      const bound = queue.bindings.some(
        (binding) => binding.exchange === exchange && topicMatches(binding.pattern, routingKey)
      );
      if (bound) {
        queue.pending.push(envelope);
      }
    }
    return true;
  }

  subscribe(queue: string, handler: MessageHandler, role: RoleId | null): boolean {
    const state = this.queues.get(queue);
    if (this.closed || !state) {
      return false;
    }
    state.handler = { handler, role };
    return true;
  }

  async startConsuming(mode: ConsumeMode): Promise<void> {
    this.consumeModes.push(mode);
  }

  /**
   * Deliver everything buffered, including messages published by handlers
   * along the way. Handler failures drop the message, as the live bus does.
   */
  async flush(): Promise<number> {
    let delivered = 0;
    for (;;) {
      const next = this.nextPending();
      if (!next) {
        return delivered;
      }
      const { state, envelope } = next;
      try {
        await state.handler?.handler(envelope, state.handler.role);
      } catch (error) {
        this.failures.push({ routingKey: envelope.routingKey, error });
      }
      delivered += 1;
    }
  }

  queueNames(): string[] {
    return Array.from(this.queues.keys()).sort();
  }

  pendingCount(queue: string): number {
    return this.queues.get(queue)?.pending.length ?? 0;
  }

  routingKeys(exchange?: ExchangeName): string[] {
    return this.published
      .filter((message) => exchange === undefined || message.exchange === exchange)
      .map((message) => message.envelope.routingKey);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private nextPending(): { state: QueueState; envelope: MessageEnvelope } | null {
    for (const state of this.queues.values()) {
      if (state.handler === undefined) {
        continue;
      }
      const envelope = state.pending.shift();
      if (envelope) {
        return { state, envelope };
      }
    }
    return null;
  }
}

/**
 * AMQP topic matching: `*` is one word, `#` zero or more
 */
export function topicMatches(pattern: string, routingKey: string): boolean {
  const match = (patternWords: string[], keyWords: string[]): boolean => {
    const [head, ...rest] = patternWords;
    if (head === undefined) {
      return keyWords.length === 0;
    }
    if (head === '#') {
      return keyWords.some((_, index) => match(rest, keyWords.slice(index))) || match(rest, []);
    }
    const [word, ...remaining] = keyWords;
    return word !== undefined && (head === '*' || head === word) && match(rest, remaining);
  };
  return match(pattern.split('.'), routingKey.split('.'));
}
