import { describe, expect, it } from 'vitest';
import { ConfirmationRequiredError, InvalidTransitionError, WorkerStallError } from '../../errors.js';
import { buildPlan } from '../../decision/index.js';
import type { PhaseResult, TaskOutcome, Verdict } from '../../swarm/index.js';
import { WorkflowStateMachine, collectEvidence, satisfiesVerification } from '../state-machine.js';

function machine(kind: 'direct' | 'standard' = 'standard', tier: 'T0' | 'T2' | 'T3' = 'T0') {
  return new WorkflowStateMachine({
    instanceId: 'instance-1',
    requestId: 'request-1',
    plan: buildPlan(kind, tier),
    maxRecoveryAttempts: 2
  });
}

const passed = { level: 'full_security_rollback' as const, passed: true, securityReviewed: true, rollbackPlan: 'revert' };

describe('WorkflowStateMachine', () => {
  it('walks every phase in order to AllPhasesCompleted', () => {
    const sm = machine();
    expect(sm.getStatus()).toBe('NotStarted');
    expect(sm.checkInvariant()).toBe(true);

    sm.start();
    const visited: string[] = [];
    while (sm.getStatus() === 'Running') {
      expect(sm.checkInvariant()).toBe(true);
      visited.push(sm.currentPhase()?.definition.name ?? '?');
      sm.completePhase(passed);
    }

    expect(visited).toEqual(['plan', 'implement', 'verify']);
    expect(sm.getStatus()).toBe('AllPhasesCompleted');
    expect(sm.checkInvariant()).toBe(true);
    expect(sm.snapshot().phases.map(phase => phase.status)).toEqual(['completed', 'completed', 'completed']);
  });

  it('refuses to start twice', () => {
    const sm = machine();
    sm.start();
    expect(() => sm.start()).toThrow(InvalidTransitionError);
  });

  it('refuses completion without the required verification evidence', () => {
    const sm = machine('direct', 'T2');
    sm.start();
    expect(() => sm.completePhase({ level: 'basic', passed: true })).toThrow(InvalidTransitionError);
    expect(() => sm.completePhase({ level: 'full', passed: false })).toThrow(InvalidTransitionError);
    sm.completePhase({ level: 'full', passed: true });
    expect(sm.getStatus()).toBe('AllPhasesCompleted');
  });

  it('needs a recorded human confirmation for T3 work', () => {
    const sm = machine('direct', 'T3');
    sm.start();
    sm.requireConfirmation();

    expect(() => sm.completePhase(passed)).toThrow(ConfirmationRequiredError);
    expect(() => sm.recordConfirmation('  ')).toThrow(InvalidTransitionError);

    sm.recordConfirmation('operator', 'checked rollback');
    sm.completePhase(passed);

    expect(sm.getStatus()).toBe('AllPhasesCompleted');
    expect(sm.snapshot().phases[0].confirmedBy).toBe('operator');
    expect(sm.getHistory().some(record => record.event === 'confirm')).toBe(true);
  });

  it('records recovery as failed then in_progress again, within the limit', () => {
    const sm = machine('direct');
    sm.start();

    expect(sm.recover('targeted-fix', 'lint failed')).toBe(1);
    expect(sm.checkInvariant()).toBe(true);
    expect(sm.currentPhase()?.status).toBe('in_progress');

    const transitions = sm.getHistory().slice(-2).map(record => [record.from, record.to, record.event]);
    expect(transitions).toEqual([
      ['in_progress', 'failed', 'fail'],
      ['failed', 'in_progress', 'targeted-fix']
    ]);

    expect(sm.recover('reduced-scope', 'dropping t3')).toBe(2);
    expect(sm.canRecover()).toBe(false);
    expect(() => sm.recover('targeted-fix', 'again')).toThrow(InvalidTransitionError);
  });

  it('aborts keeping completed phases and partial results', () => {
    const sm = machine();
    sm.start();
    sm.completePhase(passed);
    sm.logError(new WorkerStallError('implement:t1', 130000));
    sm.abort('implement failed', {
      phase: 'implement',
      outcomes: [],
      completed: ['t1'],
      failed: ['t2'],
      deferred: [],
      skipped: [],
      modifiedResources: ['src/a.ts'],
      waves: 1,
      workersSpawned: 2,
      replacements: 0,
      fixWorkers: 0,
      conservation: false,
      errors: []
    });

    const snapshot = sm.snapshot();
    expect(snapshot.status).toBe('AbortedFailed');
    expect(snapshot.phases.map(phase => phase.status)).toEqual(['completed', 'failed', 'pending']);
    expect(snapshot.phases[1]).toMatchObject({ completed: ['t1'], failed: ['t2'] });
    expect(snapshot.modifiedResources).toEqual(['src/a.ts']);
    expect(snapshot.errorLog.map(entry => [entry.code, entry.phase])).toEqual([['WORKER_STALL', 'implement']]);
    expect(sm.getAbortReason()).toBe('implement failed');
    expect(sm.checkInvariant()).toBe(true);
    expect(() => sm.abort('again')).toThrow(InvalidTransitionError);
  });

  it('notifies transition listeners until unsubscribed', () => {
    const sm = machine('direct');
    const seen: string[] = [];
    const unsubscribe = sm.onTransition(record => seen.push(`${record.from}->${record.to}`));

    sm.start();
    unsubscribe();
    sm.completePhase(passed);

    expect(seen).toEqual(['NotStarted->Running', 'pending->in_progress']);
  });
});

describe('satisfiesVerification', () => {
  it('needs a security review and rollback plan at the top level', () => {
    expect(satisfiesVerification('full_security_rollback', { level: 'full_security_rollback', passed: true })).toBe(false);
    expect(satisfiesVerification('full_security_rollback', {
      level: 'full_security_rollback',
      passed: true,
      securityReviewed: true,
      rollbackPlan: ' '
    })).toBe(false);
    expect(satisfiesVerification('full_security_rollback', passed)).toBe(true);
  });

  it('accepts anything when nothing is required', () => {
    expect(satisfiesVerification('none', { level: 'none', passed: false })).toBe(true);
  });
});

describe('collectEvidence', () => {
  function result(outcomes: Array<[TaskOutcome['status'], Verdict | undefined]>): PhaseResult {
    return {
      phase: 'implement',
      outcomes: outcomes.map(([status, verification], i): TaskOutcome => ({
        taskId: `t${i + 1}`,
        status,
        critical: false,
        tier: 'T3',
        resources: [],
        verification,
        modifiedResources: [],
        workers: [],
        replaced: false,
        fixAttempts: 0
      })),
      completed: [],
      failed: [],
      deferred: [],
      skipped: [],
      modifiedResources: [],
      waves: 1,
      workersSpawned: 0,
      replacements: 0,
      fixWorkers: 0,
      conservation: false,
      errors: []
    };
  }

  it('reports the weakest level any completed task reached', () => {
    const evidence = collectEvidence('full', result([
      ['completed', { passed: true, level: 'full_security_rollback', securityReviewed: true }],
      ['completed', { passed: true, level: 'basic', securityReviewed: true }],
      ['skipped', undefined]
    ]));
    expect(evidence).toEqual({ level: 'basic', passed: true, securityReviewed: true, rollbackPlan: undefined });
    expect(satisfiesVerification('full', evidence)).toBe(false);
  });

  it('treats a verdict without a level as unverified', () => {
    const evidence = collectEvidence('basic', result([['completed', { passed: true }]]));
    expect(evidence.level).toBe('none');
    expect(satisfiesVerification('basic', evidence)).toBe(false);
  });

  it('needs every verdict to report a security review', () => {
    const evidence = collectEvidence('full_security_rollback', result([
      ['completed', { passed: true, level: 'full_security_rollback', securityReviewed: true }],
      ['completed', { passed: true, level: 'full_security_rollback' }]
    ]), 'revert the release');
    expect(evidence.securityReviewed).toBe(false);
    expect(satisfiesVerification('full_security_rollback', evidence)).toBe(false);
  });

  it('has nothing to verify when no task completed', () => {
    expect(collectEvidence('full', result([['skipped', undefined]]), 'revert')).toEqual({
      level: 'full',
      passed: true,
      securityReviewed: true,
      rollbackPlan: 'revert'
    });
  });
});
