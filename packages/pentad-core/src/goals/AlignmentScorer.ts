/**
 * Keyword-overlap alignment between a request and the repository goal
 */

import { extractKeywords } from './keywords.js';
import type { AlignmentParameters, AlignmentResult, RepositoryGoal } from './types.js';

export const DEFAULT_ALIGNMENT_PARAMETERS: Readonly<AlignmentParameters> = Object.freeze({
  threshold: 0.3,
  neutralConfidence: 0.5,
  excludedScopeConfidence: 0.9,
});

/**
 * Keywords of the primary goal and every constraint value
 */
export function focusKeywords(goal: RepositoryGoal): Set<string> {
  const keywords = extractKeywords(goal.primary);
  for (const constraint of Object.values(goal.constraints)) {
    for (const keyword of extractKeywords(constraint)) {
      keywords.add(keyword);
    }
  }
  return keywords;
}

export function computeAlignment(
  goal: RepositoryGoal,
  requestText: string,
  parameters: Partial<AlignmentParameters> = {}
): AlignmentResult {
  const { threshold, neutralConfidence, excludedScopeConfidence } = {
    ...DEFAULT_ALIGNMENT_PARAMETERS,
    ...parameters,
  };

  const focus = focusKeywords(goal);
  const request = extractKeywords(requestText);
  const matchingKeywords = [...focus].filter((keyword) => request.has(keyword)).sort();

  const excluded = goal.scope.excluded.trim();
  if (excluded !== '') {
    const excludedKeywords = extractKeywords(excluded);
    if ([...request].some((keyword) => excludedKeywords.has(keyword))) {
      return {
        aligned: false,
        confidence: excludedScopeConfidence,
        matchingKeywords,
        reason: `Request may fall under excluded scope: ${excluded}`,
      };
    }
  }

  const confidence = focus.size === 0 ? neutralConfidence : matchingKeywords.length / focus.size;

  return {
    aligned: confidence > threshold,
    confidence,
    matchingKeywords,
    reason: `Keyword match: ${matchingKeywords.length}/${focus.size} (${(confidence * 100).toFixed(1)}%)`,
  };
}

/**
 * Alignment check that tolerates a missing goal
 */
export function checkRequestAlignment(
  goal: RepositoryGoal | null,
  requestText: string,
  parameters?: Partial<AlignmentParameters>
): AlignmentResult {
  if (goal === null) {
    return {
      aligned: true,
      confidence: 0,
      matchingKeywords: [],
      reason: 'No goal to check against',
    };
  }
  return computeAlignment(goal, requestText, parameters);
}

/**
 * One-line digest for agent prompts and the `goal` command
 */
export function summarizeGoal(goal: RepositoryGoal | null): string {
  if (goal === null) {
    return 'No repository goal defined';
  }

  const parts = [`PRIMARY GOAL: ${goal.primary}`];

  const description = goal.description.trim();
  if (description !== '') {
    parts.push(`DESCRIPTION: ${description}`);
  }
  if (goal.successCriteria.length > 0) {
    parts.push(`SUCCESS CRITERIA: ${goal.successCriteria.join(' | ')}`);
  }

  const constraints = Object.entries(goal.constraints).map(
    ([key, value]) => `${key.toUpperCase()}: ${value}`
  );
  if (constraints.length > 0) {
    parts.push(`CONSTRAINTS: ${constraints.join(' | ')}`);
  }

  const excluded = goal.scope.excluded.trim();
  if (excluded !== '') {
    parts.push(`EXCLUDED: ${excluded}`);
  }

  return parts.join(' || ');
}
