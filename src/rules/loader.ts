// src/rules/loader.ts

/**
 * Classification Rule Loader
 *
 * Keyword tables are injected configuration: either the bundled YAML file,
 * a caller-supplied file, or an object passed straight to the engine.
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { classificationRulesSchema, ClassificationRules } from './schema.js';
import { InvalidRequestError } from '../errors.js';
import { createComponentLogger } from '../utils/logger.js';

const log = createComponentLogger('rules');

export const BUNDLED_RULES_FILE = fileURLToPath(
  new URL('../../rules/classification-rules.yaml', import.meta.url)
);

let bundledRules: ClassificationRules | null = null;

/**
 * Validates an already-parsed rules object.
 */
export function parseClassificationRules(raw: unknown): ClassificationRules {
  const parsed = classificationRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidRequestError(
      `Invalid classification rules at ${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
  }
  return parsed.data;
}

export function loadClassificationRules(filePath: string = BUNDLED_RULES_FILE): ClassificationRules {
  if (filePath === BUNDLED_RULES_FILE && bundledRules) {
    return bundledRules;
  }

  if (!existsSync(filePath)) {
    throw new InvalidRequestError(`Classification rules file not found: ${filePath}`);
  }

  const content = readFileSync(filePath, 'utf-8');
  const rules = parseClassificationRules(yaml.load(content));

  log.debug({
    filePath,
    complexityKeywords: Object.keys(rules.complexity.high).length
      + Object.keys(rules.complexity.medium).length
      + Object.keys(rules.complexity.low).length
  }, 'Classification rules loaded');

  if (filePath === BUNDLED_RULES_FILE) {
    bundledRules = rules;
  }
  return rules;
}
