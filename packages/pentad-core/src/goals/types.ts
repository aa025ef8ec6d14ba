/**
 * Repository goal types
 */

export interface GoalScope {
  included: string;
  excluded: string;
}

export interface GoalMetadata {
  created: string;
  lastUpdated: string;
  version: string;
}

/**
 * Declared objective of the target project. Stored as snake_case YAML.
 */
export interface RepositoryGoal {
  primary: string;
  description: string;
  successCriteria: string[];
  constraints: Record<string, string>;
  stakeholders: Record<string, string>;
  scope: GoalScope;
  metadata: GoalMetadata;
}

export interface AlignmentResult {
  aligned: boolean;
  /** 0.0 - 1.0 */
  confidence: number;
  /** Unique, sorted */
  matchingKeywords: string[];
  reason: string;
}

export interface AlignmentParameters {
  /** Confidence must exceed this to count as aligned */
  threshold: number;
  /** Used when the goal yields no keywords at all */
  neutralConfidence: number;
  /** Reported when the request touches excluded scope */
  excludedScopeConfidence: number;
}
