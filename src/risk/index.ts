// src/risk/index.ts

export { RiskClassifier, missingAssessmentFields, moduleOf } from './classifier.js';
export { RiskLedger } from './ledger.js';
export { TIER_CONTROLS } from './types.js';
export type {
  TaskDescriptor,
  TierControls,
  TierDecision,
  TierRule,
  RiskClassification,
  RiskLedgerEntry,
  ReviewType,
  ApprovalMode
} from './types.js';
