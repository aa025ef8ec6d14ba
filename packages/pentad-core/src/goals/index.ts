export type {
  AlignmentParameters,
  AlignmentResult,
  GoalMetadata,
  GoalScope,
  RepositoryGoal,
} from './types.js';
export { GoalParser, stripTemplateNoise } from './GoalParser.js';
export { parseGoalLines } from './LineGoalParser.js';
export { serializeGoal, updateGoalPrimary } from './GoalSerializer.js';
export { extractKeywords } from './keywords.js';
export {
  DEFAULT_ALIGNMENT_PARAMETERS,
  checkRequestAlignment,
  computeAlignment,
  focusKeywords,
  summarizeGoal,
} from './AlignmentScorer.js';
