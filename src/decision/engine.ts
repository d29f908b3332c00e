// src/decision/engine.ts

/**
 * Request Classifier
 *
 * Scores a request across eight dimensions and selects a workflow plan.
 * Selection rules are evaluated in order, first match wins:
 *
 *   1. any dimension unscorable       → conservative phased plan
 *   2. context load at its ceiling    → phased (context bound dominates)
 *   3. high complexity or aggregate   → phased
 *   4. low aggregate, low context, T0 → direct
 *   5. otherwise                      → standard
 *
 * Classification never throws for a well-formed request.
 */

import type { TaskRequest } from '../types.js';
import { config as defaultConfig, EngineConfig } from '../config.js';
import type { ClassificationRules } from '../rules/index.js';
import { RiskClassifier, TierDecision } from '../risk/index.js';
import { Memo } from '../utils/cache.js';
import { createComponentLogger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import {
  Classification,
  Dimension,
  DimensionScorer,
  DIMENSIONS,
  PlanKind,
  Score,
  ScoreLevel,
  SCORE_MAX
} from './types.js';
import { DEFAULT_SCORERS, fromScale, scoreLevel, toScale } from './scoring.js';
import { buildPlan, conservativePlan, planSuitability, rankAlternatives } from './plans.js';

const log = createComponentLogger('decision');

type DecisionConfig = EngineConfig['decision'];

const DIMENSION_LABELS: Record<Dimension, string> = {
  technicalComplexity: 'Technical complexity',
  scope: 'Scope impact',
  risk: 'Risk factors',
  contextLoad: 'Context load',
  timePressure: 'Time pressure',
  minimalism: 'Minimalism pressure',
  security: 'Security sensitivity',
  reusability: 'Pattern reusability'
};

const PLAN_REASONS: Record<PlanKind, string> = {
  direct: 'Suitable for single-phase direct execution',
  standard: 'Plan, implement and verify in fixed phases',
  phased: 'Benefits from phase-based execution with checkpoints'
};

interface RuleInput {
  score: Score;
  risk: TierDecision;
  config: DecisionConfig;
}

interface SelectionRule {
  name: string;
  kind: PlanKind;
  confidence: number;
  when: (input: RuleInput) => boolean;
}

const SELECTION_RULES: readonly SelectionRule[] = [
  {
    name: 'Context Overflow Protection',
    kind: 'phased',
    confidence: 0.95,
    when: ({ score, config }) => score.dimensions.contextLoad >= config.contextCeiling
  },
  {
    name: 'High Complexity Task',
    kind: 'phased',
    confidence: 0.85,
    when: ({ score, config }) =>
      score.dimensions.technicalComplexity >= config.phasedMinComplexity
      || score.aggregate >= config.phasedMinAggregate
  },
  {
    name: 'Simple Low-Risk Task',
    kind: 'direct',
    confidence: 0.85,
    when: ({ score, risk, config }) =>
      score.aggregate <= config.directMaxAggregate
      && score.dimensions.contextLoad <= config.directMaxContext
      && risk.tier === 'T0'
  }
];

export interface RequestClassifierOptions {
  rules: ClassificationRules;
  config?: DecisionConfig;
  /** Replaces the built-in scorer of individual dimensions */
  scorers?: Partial<Record<Dimension, DimensionScorer>>;
}

export class RequestClassifier {
  private readonly rules: ClassificationRules;
  private readonly config: DecisionConfig;
  private readonly scorers: Record<Dimension, DimensionScorer>;
  private readonly riskClassifier: RiskClassifier;
  private readonly memo: Memo<Classification>;

  constructor(options: RequestClassifierOptions) {
    this.rules = options.rules;
    this.config = options.config ?? defaultConfig.decision;
    this.scorers = { ...DEFAULT_SCORERS, ...options.scorers };
    this.riskClassifier = new RiskClassifier(options.rules);
    this.memo = new Memo<Classification>('classification', this.config.memoSize);
  }

  classify(request: TaskRequest): Classification {
    const key = {
      description: request.description,
      fileHints: request.fileHints,
      session: request.session,
      riskFlags: request.riskFlags
    };
    const cached = this.memo.get(key);
    if (cached) return cached;

    const classification = this.evaluate(request);
    this.memo.set(key, classification);

    log.info({
      requestId: request.id,
      plan: classification.plan.kind,
      tier: classification.risk.tier,
      aggregate: classification.score.aggregate,
      rule: classification.rule
    }, 'Request classified');

    return classification;
  }

  score(request: TaskRequest): Score {
    const dimensions: Partial<Record<Dimension, number>> = {};
    const levels: Partial<Record<Dimension, ScoreLevel>> = {};
    const unscorable: Dimension[] = [];

    for (const dimension of DIMENSIONS) {
      const raw = this.scoreDimension(dimension, request);
      if (raw === null) {
        unscorable.push(dimension);
        dimensions[dimension] = SCORE_MAX;
        levels[dimension] = 'Very High';
        continue;
      }
      dimensions[dimension] = toScale(raw);
      levels[dimension] = scoreLevel(raw);
    }

    const complete = completeRecord(dimensions, SCORE_MAX);
    return {
      dimensions: complete,
      aggregate: this.aggregate(complete),
      levels: completeRecord(levels, 'Very High'),
      unscorable
    };
  }

  /**
   * Drops memoised classifications.
   */
  reset(): void {
    this.memo.clear();
  }

  getStats() {
    return this.memo.getStats();
  }

  private evaluate(request: TaskRequest): Classification {
    const score = this.score(request);
    const risk = this.riskClassifier.determine({
      description: request.description,
      flags: request.riskFlags,
      resources: request.fileHints
    });
    const normalized = normalize(score);

    if (score.unscorable.length > 0) {
      log.warn({ requestId: request.id, unscorable: score.unscorable }, 'Falling back to conservative plan');
      return {
        score,
        risk,
        plan: conservativePlan(risk.tier),
        confidence: 0.6,
        rule: 'Unscorable Dimension Fallback',
        decisionFactors: [
          `Unscorable dimensions: ${score.unscorable.join(', ')}`,
          PLAN_REASONS.phased
        ],
        alternatives: rankAlternatives('phased', normalized)
      };
    }

    const input: RuleInput = { score, risk, config: this.config };
    const matched = SELECTION_RULES.find(rule => rule.when(input));

    let kind: PlanKind;
    let confidence: number;
    let rule: string;

    if (matched) {
      kind = matched.kind;
      confidence = matched.confidence;
      rule = matched.name;
    } else {
      // Confidence grows with the margin over the next best plan
      kind = 'standard';
      const standard = planSuitability('standard', normalized);
      const others = Math.max(planSuitability('direct', normalized), planSuitability('phased', normalized));
      confidence = Math.round(Math.min(0.9, Math.max(0.5, 0.5 + standard - others)) * 100) / 100;
      rule = 'Weighted Factor Analysis';
    }

    return {
      score,
      risk,
      plan: buildPlan(kind, risk.tier),
      confidence,
      rule,
      decisionFactors: decisionFactors(score, kind),
      alternatives: rankAlternatives(kind, normalized)
    };
  }

  private scoreDimension(dimension: Dimension, request: TaskRequest): number | null {
    try {
      const raw = this.scorers[dimension](request, this.rules);
      if (!Number.isFinite(raw)) {
        log.warn({ dimension, raw }, 'Scorer returned a non-finite value');
        return null;
      }
      return Math.max(0, Math.min(1, raw));
    } catch (error) {
      log.warn({ dimension, error: errorMessage(error) }, 'Scorer failed');
      return null;
    }
  }

  private aggregate(dimensions: Readonly<Record<Dimension, number>>): number {
    const weights = this.config.weights;
    let weighted = 0;
    let total = 0;
    for (const dimension of DIMENSIONS) {
      weighted += dimensions[dimension] * weights[dimension];
      total += weights[dimension];
    }
    const mean = total > 0
      ? weighted / total
      : DIMENSIONS.reduce((sum, d) => sum + dimensions[d], 0) / DIMENSIONS.length;
    return Math.round(mean * 100) / 100;
  }
}

function completeRecord<T>(partial: Partial<Record<Dimension, T>>, fallback: T): Record<Dimension, T> {
  return {
    technicalComplexity: partial.technicalComplexity ?? fallback,
    scope: partial.scope ?? fallback,
    risk: partial.risk ?? fallback,
    contextLoad: partial.contextLoad ?? fallback,
    timePressure: partial.timePressure ?? fallback,
    minimalism: partial.minimalism ?? fallback,
    security: partial.security ?? fallback,
    reusability: partial.reusability ?? fallback
  };
}

function normalize(score: Score): Record<Dimension, number> {
  const normalized: Partial<Record<Dimension, number>> = {};
  for (const dimension of DIMENSIONS) {
    normalized[dimension] = fromScale(score.dimensions[dimension]);
  }
  return completeRecord(normalized, 1);
}

function decisionFactors(score: Score, kind: PlanKind): string[] {
  const factors = DIMENSIONS
    .filter(dimension => score.levels[dimension] === 'High' || score.levels[dimension] === 'Very High')
    .map(dimension => `${DIMENSION_LABELS[dimension]}: ${score.levels[dimension]} (${score.dimensions[dimension]}/10)`);
  factors.push(PLAN_REASONS[kind]);
  return factors;
}
