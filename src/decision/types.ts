// src/decision/types.ts

import type { RiskTier, TaskRequest, VerificationLevel } from '../types.js';
import type { ClassificationRules } from '../rules/index.js';
import type { TierDecision } from '../risk/index.js';

export type Dimension =
  | 'technicalComplexity'
  | 'scope'
  | 'risk'
  | 'contextLoad'
  | 'timePressure'
  | 'minimalism'
  | 'security'
  | 'reusability';

export const DIMENSIONS: readonly Dimension[] = [
  'technicalComplexity',
  'scope',
  'risk',
  'contextLoad',
  'timePressure',
  'minimalism',
  'security',
  'reusability'
];

export const SCORE_MIN = 1;
export const SCORE_MAX = 10;

export type ScoreLevel = 'Very Low' | 'Low' | 'Medium' | 'High' | 'Very High';

/**
 * Scores a single dimension. Returns a raw value in [0, 1]; out-of-range
 * results are clamped, a thrown error or a non-finite number marks the
 * dimension unscorable.
 */
export type DimensionScorer = (request: TaskRequest, rules: ClassificationRules) => number;

export interface Score {
  /** Per-dimension score on the 1–10 scale */
  readonly dimensions: Readonly<Record<Dimension, number>>;
  /** Weighted mean of the dimension scores */
  readonly aggregate: number;
  readonly levels: Readonly<Record<Dimension, ScoreLevel>>;
  readonly unscorable: readonly Dimension[];
}

export type PlanKind = 'direct' | 'standard' | 'phased';

export type OwnershipModel = 'single' | 'swarm';

export interface PhaseDefinition {
  readonly name: string;
  readonly ownership: OwnershipModel;
  readonly verification: VerificationLevel;
  /** Phase only reads resources; its tasks claim none */
  readonly readOnly: boolean;
}

export interface WorkflowPlan {
  readonly kind: PlanKind;
  readonly phases: readonly PhaseDefinition[];
  /** Checkpoint session state between phases */
  readonly checkpointing: boolean;
  readonly tier: RiskTier;
}

export interface PlanAlternative {
  kind: PlanKind;
  suitability: number;
}

export interface Classification {
  readonly score: Score;
  readonly plan: WorkflowPlan;
  readonly risk: TierDecision;
  readonly confidence: number;
  /** Name of the selection rule that chose the plan */
  readonly rule: string;
  readonly decisionFactors: readonly string[];
  readonly alternatives: readonly PlanAlternative[];
}
