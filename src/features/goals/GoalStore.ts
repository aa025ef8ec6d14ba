/**
 * GoalStore - reads and updates the project's goal file
 */

import {
  GoalParser,
  describeError,
  updateGoalPrimary,
  type IFileSystem,
  type ILogger,
  type RepositoryGoal,
} from '@pentad/core';

export type GoalStatus = 'missing' | 'invalid' | 'ok';

export interface GoalLoadResult {
  status: GoalStatus;
  goal: RepositoryGoal | null;
}

export class GoalStore {
  private parser: GoalParser;

  constructor(
    private fs: IFileSystem,
    private goalPath: string,
    private logger: ILogger
  ) {
    this.parser = new GoalParser(logger);
  }

  get path(): string {
    return this.goalPath;
  }

  async load(): Promise<GoalLoadResult> {
    if (!(await this.fs.exists(this.goalPath))) {
      return { status: 'missing', goal: null };
    }

    try {
      const goal = this.parser.parse(await this.fs.readFile(this.goalPath));
      return goal === null ? { status: 'invalid', goal: null } : { status: 'ok', goal };
    } catch (error) {
      this.logger.error('Failed to read goal file', {
        path: this.goalPath,
        error: describeError(error),
      });
      return { status: 'invalid', goal: null };
    }
  }

  /**
   * Rewrite goal.primary (and last_updated), then re-read the file
   */
  async updatePrimary(primary: string, now: Date = new Date()): Promise<RepositoryGoal | null> {
    const current = (await this.fs.exists(this.goalPath))
      ? await this.fs.readFile(this.goalPath)
      : '';
    await this.fs.writeFile(this.goalPath, updateGoalPrimary(current, primary, now.toISOString()));
    this.logger.info('Goal updated', { primary });
    return (await this.load()).goal;
  }
}
