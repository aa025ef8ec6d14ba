/**
 * Goal serialization and in-place updates
 */

import { isMap, parseDocument, stringify } from 'yaml';
import { ConfigurationError } from '../shared/utils/errors.js';
import { toGoalDocument } from './schemas.js';
import type { RepositoryGoal } from './types.js';

/**
 * Canonical snake_case document for a goal
 */
export function serializeGoal(goal: RepositoryGoal): string {
  return stringify(toGoalDocument(goal));
}

/**
 * Rewrite `goal.primary` and `last_updated`, keeping the rest of the
 * document (comments included)
 */
export function updateGoalPrimary(rawText: string, primary: string, timestamp: string): string {
  const value = primary.trim();
  if (value === '') {
    throw new ConfigurationError('Goal primary must not be empty');
  }

  const document = parseDocument(rawText);
  if (document.errors.length === 0 && (document.contents === null || isMap(document.contents))) {
    const goal = document.get('goal');
    if (goal === undefined || goal === null || isMap(goal)) {
      document.setIn(['goal', 'primary'], value);
      document.set('last_updated', timestamp);
      return document.toString();
    }
  }

  return updateGoalLines(rawText, value, timestamp);
}

/**
 * Line-level edit for documents the YAML parser rejects
 */
function updateGoalLines(rawText: string, primary: string, timestamp: string): string {
  const lines = rawText.split('\n');
  let inGoal = false;
  let primaryWritten = false;
  let timestampWritten = false;

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index] ?? '';

    if (/^\S/.test(line) && !line.startsWith('#')) {
      inGoal = /^goal\s*:\s*$/.test(line);
    }

    const indent = /^(\s+)primary\s*:/.exec(line)?.[1];
    if (inGoal && !primaryWritten && indent !== undefined) {
      lines[index] = `${indent}primary: ${JSON.stringify(primary)}`;
      primaryWritten = true;
    } else if (/^last_updated\s*:/.test(line)) {
      lines[index] = `last_updated: ${JSON.stringify(timestamp)}`;
      timestampWritten = true;
    }
  }

  if (!primaryWritten) {
    throw new ConfigurationError('Goal document has no goal.primary entry to update');
  }
  if (!timestampWritten) {
    lines.push(`last_updated: ${JSON.stringify(timestamp)}`);
  }
  return lines.join('\n');
}
