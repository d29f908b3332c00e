// src/decision/plans.ts

/**
 * Workflow plan templates and plan suitability.
 */

import type { RiskTier, VerificationLevel } from '../types.js';
import { maxVerification } from '../types.js';
import { TIER_CONTROLS } from '../risk/index.js';
import type {
  Dimension,
  PhaseDefinition,
  PlanAlternative,
  PlanKind,
  WorkflowPlan
} from './types.js';

export const PLAN_KINDS: readonly PlanKind[] = ['direct', 'standard', 'phased'];

export function buildPlan(
  kind: PlanKind,
  tier: RiskTier,
  minimumVerification: VerificationLevel = 'none'
): WorkflowPlan {
  const level = maxVerification(TIER_CONTROLS[tier].verification, minimumVerification);
  const phase = (
    name: string,
    ownership: PhaseDefinition['ownership'],
    verification: VerificationLevel,
    readOnly = false
  ): PhaseDefinition => ({ name, ownership, verification, readOnly });

  switch (kind) {
    case 'direct':
      return {
        kind,
        tier,
        checkpointing: false,
        phases: [phase('execute', 'swarm', level)]
      };
    case 'standard':
      return {
        kind,
        tier,
        checkpointing: false,
        phases: [
          phase('plan', 'single', 'none', true),
          phase('implement', 'swarm', level),
          phase('verify', 'single', level, true)
        ]
      };
    case 'phased':
      return {
        kind,
        tier,
        checkpointing: true,
        phases: [
          phase('analyze', 'single', 'none', true),
          phase('implement-core', 'swarm', level),
          phase('integrate', 'swarm', level),
          phase('verify', 'single', level, true)
        ]
      };
  }
}

/**
 * Most conservative plan: fully phased with at least full verification.
 */
export function conservativePlan(tier: RiskTier): WorkflowPlan {
  return buildPlan('phased', tier, 'full');
}

type SuitabilityProfile = ReadonlyArray<readonly [Dimension, number]>;

// direct favours low values, the others favour high values
const SUITABILITY_PROFILES: Record<PlanKind, { invert: boolean; weights: SuitabilityProfile }> = {
  direct: {
    invert: true,
    weights: [['technicalComplexity', 0.4], ['scope', 0.2], ['risk', 0.2], ['contextLoad', 0.1], ['timePressure', 0.1]]
  },
  standard: {
    invert: false,
    weights: [['technicalComplexity', 0.25], ['scope', 0.2], ['risk', 0.35], ['contextLoad', 0.15], ['timePressure', 0.05]]
  },
  phased: {
    invert: false,
    weights: [['technicalComplexity', 0.15], ['scope', 0.35], ['risk', 0.15], ['contextLoad', 0.3], ['timePressure', 0.05]]
  }
};

export function planSuitability(kind: PlanKind, normalized: Readonly<Record<Dimension, number>>): number {
  const profile = SUITABILITY_PROFILES[kind];
  let total = 0;
  for (const [dimension, weight] of profile.weights) {
    const value = normalized[dimension];
    total += weight * (profile.invert ? 1 - value : value);
  }
  return Math.max(0, Math.min(1, total));
}

/**
 * Other plan kinds with a suitability above 0.2, best first, at most three.
 */
export function rankAlternatives(
  selected: PlanKind,
  normalized: Readonly<Record<Dimension, number>>
): PlanAlternative[] {
  return PLAN_KINDS
    .filter(kind => kind !== selected)
    .map(kind => ({ kind, suitability: Math.round(planSuitability(kind, normalized) * 1000) / 1000 }))
    .filter(alternative => alternative.suitability > 0.2)
    .sort((a, b) => b.suitability - a.suitability)
    .slice(0, 3);
}
