/**
 * Checks for the external programs the agents need
 */

import type { IProcessExecutor, ILogger } from '@pentad/core';

export const BROKER_BINARY = 'rabbitmq-server';

export interface DependencyStatus {
  name: string;
  found: boolean;
  location?: string;
}

export interface DependencyReport {
  ok: boolean;
  dependencies: DependencyStatus[];
}

export class DependencyChecker {
  constructor(
    private executor: IProcessExecutor,
    private logger: ILogger,
    private platform: NodeJS.Platform = process.platform,
    private timeoutMs = 10_000
  ) {}

  async check(): Promise<DependencyReport> {
    const broker = await this.locate(BROKER_BINARY);
    return { ok: broker.found, dependencies: [broker] };
  }

  async locate(binary: string): Promise<DependencyStatus> {
    const lookup = this.platform === 'win32' ? 'where' : 'which';
    const result = await this.executor.execute(lookup, [binary], { timeout: this.timeoutMs });

    if (result.timedOut) {
      this.logger.warn('Dependency check timed out', { binary, timeoutMs: this.timeoutMs });
      return { name: binary, found: false };
    }
    if (result.exitCode !== 0) {
      this.logger.warn('Dependency not found', { binary });
      return { name: binary, found: false };
    }

    const location = result.stdout.split(/\r?\n/)[0]?.trim();
    this.logger.debug('Dependency found', { binary, location });
    return location ? { name: binary, found: true, location } : { name: binary, found: true };
  }
}
