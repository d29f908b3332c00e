import { describe, expect, it } from 'vitest';
import { IncompleteRiskAssessmentError } from '../../errors.js';
import { loadClassificationRules } from '../../rules/index.js';
import { RiskClassifier, missingAssessmentFields, moduleOf } from '../classifier.js';

const classifier = new RiskClassifier(loadClassificationRules());

const fullAssessment = {
  failureScenario: 'old key keeps signing',
  detectionSignal: 'signature verification errors',
  fastestRollback: 'restore previous key version',
  weakestAssumption: 'all verifiers reload keys'
};

describe('RiskClassifier.determine', () => {
  it('assigns T0 to a plain local change', () => {
    const decision = classifier.determine({ description: 'fix typo in login page' });
    expect(decision.tier).toBe('T0');
    expect(decision.rule).toBe('default');
    expect(decision.signals).toEqual([]);
    expect(decision.controls).toEqual({ verification: 'none', review: 'self', approval: 'automatic' });
  });

  it('assigns T3 to irreversible work', () => {
    const decision = classifier.determine({ description: 'rotate production signing credentials' });
    expect(decision.tier).toBe('T3');
    expect(decision.rule).toBe('irreversible-or-regulated');
    expect(decision.signals).toEqual(['irreversible:credential']);
    expect(decision.controls.approval).toBe('human');
  });

  it('does not read irreversible work into look-alike words', () => {
    const decision = classifier.determine({ description: 'rotate image in the dropdown preview' });
    expect(decision.tier).toBe('T0');
    expect(decision.signals).toEqual([]);
    expect(classifier.determine({ description: 'rotate keys for the billing service' }).signals).toEqual([
      'irreversible:billing',
      'irreversible:rotate key'
    ]);
  });

  it('assigns T3 from an explicit flag without keywords', () => {
    const decision = classifier.determine({ description: 'tidy things', flags: { regulatedData: true } });
    expect(decision.tier).toBe('T3');
    expect(decision.signals).toEqual(['flag:regulatedData']);
  });

  it('assigns T2 to security and data integrity work', () => {
    expect(classifier.determine({ description: 'harden password checks' }).tier).toBe('T2');
    expect(classifier.determine({ description: 'adjust database indexes' }).tier).toBe('T2');
  });

  it('assigns T1 to work spanning several modules', () => {
    const decision = classifier.determine({
      description: 'rename helper',
      resources: ['src/a/x.ts', 'src/b/y.ts']
    });
    expect(decision.tier).toBe('T1');
    expect(decision.signals).toEqual(['modules:2']);
  });

  it('keeps single-module work at T0', () => {
    const decision = classifier.determine({
      description: 'rename helper',
      resources: ['src/a/x.ts', 'src/a/y.ts']
    });
    expect(decision.tier).toBe('T0');
  });

  it('assigns T1 to user-visible work', () => {
    expect(classifier.determine({ description: 'add export feature' }).tier).toBe('T1');
  });
});

describe('RiskClassifier.classify', () => {
  it('refuses T1+ work without all four answers', () => {
    expect.assertions(4);
    expect(() => classifier.classify({ description: 'add export feature' }))
      .toThrow(IncompleteRiskAssessmentError);

    try {
      classifier.classify({
        description: 'add export feature',
        assessment: { ...fullAssessment, weakestAssumption: '   ' }
      });
    } catch (error) {
      expect(error).toBeInstanceOf(IncompleteRiskAssessmentError);
      if (error instanceof IncompleteRiskAssessmentError) {
        expect(error.missingFields).toEqual(['weakestAssumption']);
        expect(error.tier).toBe('T1');
      }
    }
  });

  it('marks fully assessed work ready', () => {
    const result = classifier.classify({
      description: 'rotate production signing credentials',
      assessment: fullAssessment
    });
    expect(result.ready).toBe(true);
    expect(result.tier).toBe('T3');
  });

  it('needs no answers for T0', () => {
    expect(classifier.classify({ description: 'fix typo in login page' }).ready).toBe(true);
  });
});

describe('helpers', () => {
  it('derives modules from resource paths', () => {
    expect(moduleOf('src/auth/login.ts')).toBe('src/auth');
    expect(moduleOf('README.md')).toBe('README.md');
    expect(moduleOf('src\\ui\\button.tsx')).toBe('src/ui');
  });

  it('lists missing fields in a fixed order', () => {
    expect(missingAssessmentFields('T2', { detectionSignal: 'alerts' })).toEqual([
      'failureScenario',
      'fastestRollback',
      'weakestAssumption'
    ]);
    expect(missingAssessmentFields('T0', undefined)).toEqual([]);
  });
});
