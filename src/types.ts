// src/types.ts

/**
 * Shared domain types used across classifier, hooks, swarm and workflow.
 */

/**
 * Ordinal risk classification. Higher tiers require stronger controls.
 */
export type RiskTier = 'T0' | 'T1' | 'T2' | 'T3';

export const RISK_TIERS: readonly RiskTier[] = ['T0', 'T1', 'T2', 'T3'];

export function tierRank(tier: RiskTier): number {
  return RISK_TIERS.indexOf(tier);
}

export function maxTier(a: RiskTier, b: RiskTier): RiskTier {
  return tierRank(a) >= tierRank(b) ? a : b;
}

/**
 * Verification depth a phase must satisfy before it may complete.
 */
export type VerificationLevel = 'none' | 'basic' | 'full' | 'full_security_rollback';

export const VERIFICATION_LEVELS: readonly VerificationLevel[] = [
  'none',
  'basic',
  'full',
  'full_security_rollback'
];

export function verificationRank(level: VerificationLevel): number {
  return VERIFICATION_LEVELS.indexOf(level);
}

export function maxVerification(a: VerificationLevel, b: VerificationLevel): VerificationLevel {
  return verificationRank(a) >= verificationRank(b) ? a : b;
}

/**
 * Answers required before a T1+ task is ready for execution.
 */
export interface RiskAssessmentAnswers {
  failureScenario?: string;
  detectionSignal?: string;
  fastestRollback?: string;
  weakestAssumption?: string;
}

/**
 * Explicit task semantics supplied by the caller. Keyword signals from the
 * classification rules are used when a flag is absent.
 */
export interface RiskFlags {
  irreversible?: boolean;
  regulatedData?: boolean;
  securityOrPrivacy?: boolean;
  dataIntegrity?: boolean;
  userVisible?: boolean;
}

export interface SessionContext {
  /** Patterns that worked earlier in the session */
  priorPatterns: readonly string[];
  recentFiles: readonly string[];
  /** Tokens already loaded into the working context */
  currentTokens: number;
  loadedFiles: number;
}

/**
 * Immutable task request. Created at submission, read-only thereafter.
 */
export interface TaskRequest {
  readonly id: string;
  readonly description: string;
  readonly fileHints: readonly string[];
  readonly session: Readonly<SessionContext>;
  readonly riskFlags?: Readonly<RiskFlags>;
  readonly riskAssessment?: Readonly<RiskAssessmentAnswers>;
  readonly submittedAt: number;
}

export interface ErrorLogEntry {
  code: string;
  message: string;
  at: number;
  phase?: string;
  taskId?: string;
}
