/**
 * GoalParser - two-tier parse of the goal file: YAML first, then the
 * line parser for documents the YAML parser rejects
 */

import { parse as parseYaml } from 'yaml';
import type { ILogger } from '../shared/logging/ILogger.js';
import { GoalParseError, describeError } from '../shared/utils/errors.js';
import { parseGoalLines } from './LineGoalParser.js';
import { GoalDocumentSchema, toRepositoryGoal } from './schemas.js';
import type { RepositoryGoal } from './types.js';

const EXAMPLE_START = '# Example Configuration:';
const EXAMPLE_END = '# Metadata';

/**
 * Drop the commented example block and comment lines that carry no `key:`
 */
export function stripTemplateNoise(rawText: string): string {
  const kept: string[] = [];
  let inExample = false;

  for (const line of rawText.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (trimmed.startsWith(EXAMPLE_START)) {
      inExample = true;
      continue;
    }
    if (inExample) {
      if (trimmed.startsWith(EXAMPLE_END)) {
        inExample = false;
        kept.push(line);
      }
      continue;
    }
    if (trimmed.startsWith('#') && !trimmed.includes(':')) {
      continue;
    }
    kept.push(line);
  }

  return kept.join('\n');
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class GoalParser {
  constructor(private readonly logger?: ILogger) {}

  /**
   * Returns null when neither parser understands the text or `primary` is empty
   */
  parse(rawText: string): RepositoryGoal | null {
    const cleaned = stripTemplateNoise(rawText);
    const document = this.parseDocument(cleaned);
    if (document === null) {
      return null;
    }

    const result = GoalDocumentSchema.safeParse(document);
    if (!result.success) {
      this.logger?.warn('Goal document has an unexpected shape', {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return null;
    }

    const goal = toRepositoryGoal(result.data);
    if (goal.primary === '') {
      this.logger?.debug('Goal document has no primary goal');
      return null;
    }
    return goal;
  }

  private parseDocument(text: string): Record<string, unknown> | null {
    try {
      const value: unknown = parseYaml(text);
      if (isMapping(value)) {
        return value;
      }
      this.logger?.warn('Goal document is not a mapping, falling back to line parser');
    } catch (error) {
      this.logger?.warn(`YAML parsing failed: ${describeError(error)}, falling back to line parser`);
    }

    try {
      return parseGoalLines(text);
    } catch (error) {
      if (error instanceof GoalParseError) {
        this.logger?.warn(`Goal file could not be parsed: ${error.message}`, { line: error.line });
        return null;
      }
      throw error;
    }
  }
}
