// src/risk/types.ts

import type {
  RiskTier,
  RiskFlags,
  RiskAssessmentAnswers,
  VerificationLevel
} from '../types.js';

/**
 * What the risk classifier looks at for one task unit.
 */
export interface TaskDescriptor {
  description: string;
  flags?: Readonly<RiskFlags>;
  /** Modules touched by the task; derived from `resources` when absent */
  modules?: readonly string[];
  resources?: readonly string[];
  assessment?: Readonly<RiskAssessmentAnswers>;
}

export type ReviewType = 'self' | 'peer' | 'security';
export type ApprovalMode = 'automatic' | 'human';

/**
 * Controls required by a tier.
 */
export interface TierControls {
  verification: VerificationLevel;
  review: ReviewType;
  approval: ApprovalMode;
}

export const TIER_CONTROLS: Readonly<Record<RiskTier, TierControls>> = {
  T0: { verification: 'none', review: 'self', approval: 'automatic' },
  T1: { verification: 'basic', review: 'peer', approval: 'automatic' },
  T2: { verification: 'full', review: 'security', approval: 'automatic' },
  T3: { verification: 'full_security_rollback', review: 'security', approval: 'human' }
};

export type TierRule =
  | 'irreversible-or-regulated'
  | 'security-privacy-integrity'
  | 'user-visible-or-multi-module'
  | 'default';

export interface TierDecision {
  tier: RiskTier;
  /** Decision-tree branch that matched */
  rule: TierRule;
  /** Flags or keywords that triggered the branch */
  signals: string[];
  controls: TierControls;
}

/**
 * A tier decision whose assessment gate passed.
 */
export interface RiskClassification extends TierDecision {
  ready: true;
}

export interface RiskLedgerEntry {
  key: string;
  requested: RiskTier;
  effective: RiskTier;
  source: 'classification' | 'escalation';
  reason?: string;
  at: number;
}
