/**
 * BaseAgent - lifecycle shared by the five agent processes
 *
 * run(): load protocols and goal, announce startup, attach listeners,
 * consume, then idle on a heartbeat until shutdown() is called.
 */

import {
  describeError,
  type MessageEnvelope,
  type RepositoryGoal,
  type RoleId,
} from '@pentad/core';
import type { ProtocolRules } from '../../shared/config/schemas.js';
import type { AgentContext, AgentTimers } from './types.js';

const DEFAULT_HEARTBEAT_MS = 30_000;

export abstract class BaseAgent {
  protected protocols: ProtocolRules;
  protected goal: RepositoryGoal | null = null;

  private heartbeat: NodeJS.Timeout | null = null;
  private releaseIdle: (() => void) | null = null;
  private stopping: Promise<void> | null = null;
  private readonly heartbeatMs: number;

  constructor(
    protected readonly context: AgentContext,
    timers: AgentTimers = {}
  ) {
    this.protocols = context.configLoader.getDefaultRules();
    this.heartbeatMs = timers.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
  }

  get role(): RoleId {
    return this.context.definition.role;
  }

  get stopped(): boolean {
    return this.stopping !== null;
  }

  async run(): Promise<void> {
    await this.reloadProtocols();
    this.goal = (await this.context.goals.load()).goal;

    this.context.router.sendActivity('startup', {
      title: this.context.definition.title,
      projectRoot: this.context.projectRoot,
      online: this.context.router.online,
      rulesLoaded: Object.keys(this.protocols.rules).length,
    });
    this.context.logger.info('Agent started', {
      role: this.role,
      online: this.context.router.online,
    });

    await this.subscribe();
    await this.work();
  }

  /**
   * Stop the agent once; later calls share the first call's promise
   */
  shutdown(reason = 'signal'): Promise<void> {
    if (this.stopping === null) {
      this.stopping = this.stop(reason);
    }
    return this.stopping;
  }

  /** Attach the role's listeners */
  protected abstract subscribe(): Promise<void>;

  protected async work(): Promise<void> {
    await this.context.router.startConsuming(this.context.definition.consumption);
    await this.idle();
  }

  protected async onShutdown(): Promise<void> {}

  protected now(): Date {
    return (this.context.clock ?? (() => new Date()))();
  }

  protected async reloadProtocols(): Promise<void> {
    this.protocols = await this.context.configLoader.loadProtocolRules(this.context.projectRoot);
  }

  /**
   * Reload rules after a protocol update and tell the other roles
   */
  protected async acknowledgeProtocolUpdate(envelope: MessageEnvelope): Promise<void> {
    await this.reloadProtocols();
    this.context.logger.info('Protocol update received', {
      routingKey: envelope.routingKey,
      rules: Object.keys(this.protocols.rules).length,
    });
    this.context.router.sendActivity('protocol_received', {
      updateType: envelope.routingKey,
      acknowledged: true,
    });
  }

  protected idle(): Promise<void> {
    if (this.stopping !== null) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.releaseIdle = resolve;
      this.heartbeat = setInterval(() => {
        this.context.logger.debug('Heartbeat', { role: this.role });
      }, this.heartbeatMs);
    });
  }

  private async stop(reason: string): Promise<void> {
    this.context.router.sendActivity('shutdown', { reason });

    if (this.heartbeat !== null) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }

    try {
      await this.onShutdown();
    } catch (error) {
      this.context.logger.error('Shutdown hook failed', { error: describeError(error) });
    }

    await this.context.router.close();
    this.releaseIdle?.();
    this.releaseIdle = null;
    this.context.logger.info('Agent stopped', { role: this.role, reason });
  }
}
