// src/decision/index.ts

export { RequestClassifier } from './engine.js';
export type { RequestClassifierOptions } from './engine.js';
export { buildPlan, conservativePlan, planSuitability, rankAlternatives, PLAN_KINDS } from './plans.js';
export { DEFAULT_SCORERS, toScale, fromScale, scoreLevel } from './scoring.js';
export { DIMENSIONS, SCORE_MIN, SCORE_MAX } from './types.js';
export type {
  Classification,
  Dimension,
  DimensionScorer,
  OwnershipModel,
  PhaseDefinition,
  PlanAlternative,
  PlanKind,
  Score,
  ScoreLevel,
  WorkflowPlan
} from './types.js';
