// src/rules/index.ts

export { classificationRulesSchema } from './schema.js';
export type { ClassificationRules, WeightTable } from './schema.js';
export {
  loadClassificationRules,
  parseClassificationRules,
  BUNDLED_RULES_FILE
} from './loader.js';
export {
  containsKeyword,
  keywordName,
  matchedKeywords,
  weightedSum,
  strongestWeight
} from './matcher.js';
