// src/risk/classifier.ts

/**
 * Risk Classifier
 *
 * Decision tree over task semantics, evaluated top-down, first match wins:
 *
 *   irreversible / regulated effect        → T3
 *   security, privacy or data integrity    → T2
 *   user-visible change or multiple modules → T1
 *   otherwise                              → T0
 *
 * Explicit flags win over keyword signals. `determine` is pure; `classify`
 * adds the assessment gate for T1 and above.
 */

import { posix } from 'node:path';
import type { RiskAssessmentAnswers, RiskTier } from '../types.js';
import type { ClassificationRules } from '../rules/index.js';
import { matchedKeywords } from '../rules/index.js';
import {
  ASSESSMENT_FIELDS,
  AssessmentField,
  IncompleteRiskAssessmentError
} from '../errors.js';
import { createComponentLogger } from '../utils/logger.js';
import {
  TaskDescriptor,
  TierDecision,
  TierRule,
  RiskClassification,
  TIER_CONTROLS
} from './types.js';

const log = createComponentLogger('risk');

/**
 * Module of a resource path: its directory, or the path itself at the root.
 */
export function moduleOf(resource: string): string {
  const normalized = posix.normalize(resource.replace(/\\/g, '/'));
  const dir = posix.dirname(normalized);
  return dir === '.' ? normalized : dir;
}

function distinctModules(descriptor: TaskDescriptor): number {
  if (descriptor.modules) {
    return new Set(descriptor.modules).size;
  }
  return new Set((descriptor.resources ?? []).map(moduleOf)).size;
}

/**
 * Assessment fields that are missing or blank for a given tier.
 */
export function missingAssessmentFields(
  tier: RiskTier,
  answers: Readonly<RiskAssessmentAnswers> | undefined
): AssessmentField[] {
  if (tier === 'T0') return [];
  return ASSESSMENT_FIELDS.filter(field => {
    const answer = answers?.[field];
    return typeof answer !== 'string' || answer.trim().length === 0;
  });
}

export class RiskClassifier {
  constructor(private readonly rules: ClassificationRules) {}

  /**
   * Tier for a task without the assessment gate.
   */
  determine(descriptor: TaskDescriptor): TierDecision {
    const flags = descriptor.flags ?? {};
    const text = descriptor.description;
    const tiers = this.rules.tiers;

    const signals: string[] = [];
    const branch = (tier: RiskTier, rule: TierRule): TierDecision => ({
      tier,
      rule,
      signals,
      controls: TIER_CONTROLS[tier]
    });

    if (flags.irreversible) signals.push('flag:irreversible');
    if (flags.regulatedData) signals.push('flag:regulatedData');
    signals.push(...matchedKeywords(text, tiers.irreversible).map(k => `irreversible:${k}`));
    signals.push(...matchedKeywords(text, tiers.regulated).map(k => `regulated:${k}`));
    if (signals.length > 0) return branch('T3', 'irreversible-or-regulated');

    if (flags.securityOrPrivacy) signals.push('flag:securityOrPrivacy');
    if (flags.dataIntegrity) signals.push('flag:dataIntegrity');
    signals.push(...matchedKeywords(text, tiers.security).map(k => `security:${k}`));
    signals.push(...matchedKeywords(text, tiers.dataIntegrity).map(k => `dataIntegrity:${k}`));
    if (signals.length > 0) return branch('T2', 'security-privacy-integrity');

    if (flags.userVisible) signals.push('flag:userVisible');
    signals.push(...matchedKeywords(text, tiers.userVisible).map(k => `userVisible:${k}`));
    const modules = distinctModules(descriptor);
    if (modules >= tiers.multiModuleThreshold) signals.push(`modules:${modules}`);
    if (signals.length > 0) return branch('T1', 'user-visible-or-multi-module');

    return branch('T0', 'default');
  }

  /**
   * Tier for a task that is ready for execution.
   *
   * @throws IncompleteRiskAssessmentError when a T1+ task lacks any of the
   * four assessment answers
   */
  classify(descriptor: TaskDescriptor): RiskClassification {
    const decision = this.determine(descriptor);
    const missing = missingAssessmentFields(decision.tier, descriptor.assessment);

    if (missing.length > 0) {
      log.warn({ tier: decision.tier, missing }, 'Risk assessment incomplete');
      throw new IncompleteRiskAssessmentError(decision.tier, missing);
    }

    log.debug({ tier: decision.tier, rule: decision.rule, signals: decision.signals }, 'Risk tier assigned');
    return { ...decision, ready: true };
  }
}
