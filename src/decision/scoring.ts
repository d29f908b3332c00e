// src/decision/scoring.ts

/**
 * Lexical and structural dimension scorers.
 *
 * Each scorer returns a raw value in [0, 1]; the engine maps it onto the
 * 1–10 scale.
 */

import type { TaskRequest } from '../types.js';
import type { ClassificationRules } from '../rules/index.js';
import {
  containsKeyword,
  matchedKeywords,
  strongestWeight,
  weightedSum
} from '../rules/index.js';
import type { Dimension, DimensionScorer, ScoreLevel } from './types.js';
import { SCORE_MAX, SCORE_MIN } from './types.js';

const SIGMOID_CENTER = 0.3;
const SIGMOID_SCALE = 0.2;

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function technicalComplexity(request: TaskRequest, rules: ClassificationRules): number {
  const text = request.description;
  const sum = weightedSum(text, rules.complexity.high)
    + weightedSum(text, rules.complexity.medium)
    + weightedSum(text, rules.complexity.low);
  return 1 / (1 + Math.exp(-(sum - SIGMOID_CENTER) / SIGMOID_SCALE));
}

export function scopeImpact(request: TaskRequest, rules: ClassificationRules): number {
  const text = request.description;
  let score = 0;

  score += Math.min(0.4, matchedKeywords(text, rules.scope.global).length * 0.15);
  score += Math.min(0.3, matchedKeywords(text, rules.scope.multiComponent).length * 0.1);

  const files = Math.max(request.session.loadedFiles, request.fileHints.length);
  if (files > 10) score += 0.2;
  else if (files > 5) score += 0.1;

  const words = wordCount(text);
  if (words > 100) score += 0.2;
  else if (words > 50) score += 0.1;

  return clamp01(score);
}

export function riskFactor(request: TaskRequest, rules: ClassificationRules): number {
  const text = request.description;
  return clamp01(
    weightedSum(text, rules.risk.critical)
    + weightedSum(text, rules.risk.high)
    + weightedSum(text, rules.risk.medium)
  );
}

export function contextLoad(request: TaskRequest, rules: ClassificationRules): number {
  const { currentTokens, loadedFiles } = request.session;
  const base = Math.min(0.5, currentTokens / 25000);
  const files = Math.min(0.3, loadedFiles / 20);
  const growth = Math.min(0.4, matchedKeywords(request.description, rules.growth).length * 0.08);
  return clamp01(base + files + growth);
}

export function timePressure(request: TaskRequest, rules: ClassificationRules): number {
  const text = request.description;
  const { indicators, phrases } = rules.timePressure;

  let score = strongestWeight(text, indicators);
  if (phrases.some(phrase => containsKeyword(text, phrase))) {
    score = Math.max(score, 0.4);
  }
  if (matchedKeywords(text, Object.keys(indicators)).length > 2) {
    score += 0.1;
  }
  return clamp01(score);
}

export function minimalismPressure(request: TaskRequest, rules: ClassificationRules): number {
  return clamp01(weightedSum(request.description, rules.minimalism));
}

export function securitySensitivity(request: TaskRequest, rules: ClassificationRules): number {
  const hinted = request.fileHints.some(hint => /(auth|secret|credential|security|crypto)/i.test(hint));
  return clamp01(weightedSum(request.description, rules.security) + (hinted ? 0.2 : 0));
}

export function patternReusability(request: TaskRequest, rules: ClassificationRules): number {
  const prior = Math.min(0.3, request.session.priorPatterns.length * 0.1);
  return clamp01(weightedSum(request.description, rules.reusability) + prior);
}

export const DEFAULT_SCORERS: Readonly<Record<Dimension, DimensionScorer>> = {
  technicalComplexity,
  scope: scopeImpact,
  risk: riskFactor,
  contextLoad,
  timePressure,
  minimalism: minimalismPressure,
  security: securitySensitivity,
  reusability: patternReusability
};

/**
 * Maps a raw [0, 1] value onto the 1–10 scale.
 */
export function toScale(raw: number): number {
  return SCORE_MIN + Math.round(clamp01(raw) * (SCORE_MAX - SCORE_MIN));
}

/**
 * Inverse of `toScale`, used for level labels and suitability.
 */
export function fromScale(score: number): number {
  return clamp01((score - SCORE_MIN) / (SCORE_MAX - SCORE_MIN));
}

export function scoreLevel(raw: number): ScoreLevel {
  if (raw >= 0.8) return 'Very High';
  if (raw >= 0.6) return 'High';
  if (raw >= 0.4) return 'Medium';
  if (raw >= 0.2) return 'Low';
  return 'Very Low';
}
