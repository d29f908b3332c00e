// src/workflow/state-machine.ts

/**
 * Workflow State Machine
 *
 * Owns the phase sequence of one workflow instance.
 *
 *   NotStarted → Running ─┬→ AllPhasesCompleted
 *                         └→ AbortedFailed
 *
 * Within Running, phases go pending → in_progress → completed, strictly in
 * order. A failed phase re-enters in_progress only through `recover`, at
 * most `maxRecoveryAttempts` times; otherwise the caller aborts. Aborting
 * keeps every result recorded so far.
 *
 * At every observable point exactly one phase is in_progress while
 * Running, and none once the instance is terminal.
 */

import { config as defaultConfig } from '../config.js';
import {
  ConfirmationRequiredError,
  InvalidTransitionError,
  SwarmflowError
} from '../errors.js';
import type { ErrorLogEntry, VerificationLevel } from '../types.js';
import { verificationRank } from '../types.js';
import type { WorkflowPlan } from '../decision/index.js';
import type { PhaseResult } from '../swarm/index.js';
import { createComponentLogger } from '../utils/logger.js';
import type {
  ConfirmationRecord,
  InstanceSnapshot,
  PhaseState,
  RecoveryMode,
  TransitionRecord,
  VerificationEvidence,
  WorkflowStatus
} from './types.js';

const log = createComponentLogger('workflow:state');

export interface StateMachineOptions {
  instanceId: string;
  requestId: string;
  plan: WorkflowPlan;
  maxRecoveryAttempts?: number;
}

export type TransitionHandler = (transition: TransitionRecord) => void;

/**
 * Whether evidence meets a required verification level.
 */
export function satisfiesVerification(required: VerificationLevel, evidence: VerificationEvidence): boolean {
  if (required === 'none') return true;
  if (!evidence.passed) return false;
  if (verificationRank(evidence.level) < verificationRank(required)) return false;
  if (required === 'full_security_rollback') {
    return evidence.securityReviewed === true
      && typeof evidence.rollbackPlan === 'string'
      && evidence.rollbackPlan.trim().length > 0;
  }
  return true;
}

/**
 * Evidence for a phase from its verdicts: the weakest level any completed
 * task reached, and a security review only when every verdict reports one.
 * A phase that completed no task has nothing to verify.
 */
export function collectEvidence(
  required: VerificationLevel,
  result: PhaseResult,
  rollbackPlan?: string
): VerificationEvidence {
  const verdicts = result.outcomes
    .filter(outcome => outcome.status === 'completed')
    .map(outcome => outcome.verification);

  if (verdicts.length === 0) {
    return { level: required, passed: true, securityReviewed: true, rollbackPlan };
  }

  const levels = verdicts.map(verdict => verdict?.level ?? 'none');
  return {
    level: levels.reduce((weakest, level) => verificationRank(level) < verificationRank(weakest) ? level : weakest),
    passed: verdicts.every(verdict => verdict?.passed === true),
    securityReviewed: verdicts.every(verdict => verdict?.securityReviewed === true),
    rollbackPlan
  };
}

export class WorkflowStateMachine {
  readonly instanceId: string;
  readonly requestId: string;
  readonly plan: WorkflowPlan;

  private status: WorkflowStatus = 'NotStarted';
  private readonly phases: PhaseState[];
  private currentIndex = 0;
  private readonly maxRecoveryAttempts: number;
  private readonly transitions: TransitionRecord[] = [];
  private readonly errorLog: ErrorLogEntry[] = [];
  private readonly modified = new Set<string>();
  private readonly handlers = new Set<TransitionHandler>();
  private startedAt?: number;
  private endedAt?: number;
  private abortReason?: string;

  constructor(options: StateMachineOptions) {
    this.instanceId = options.instanceId;
    this.requestId = options.requestId;
    this.plan = options.plan;
    this.maxRecoveryAttempts = options.maxRecoveryAttempts ?? defaultConfig.workflow.maxRecoveryAttempts;
    this.phases = options.plan.phases.map(definition => ({
      definition,
      status: 'pending',
      requiresConfirmation: false,
      recoveryAttempts: 0
    }));
  }

  getStatus(): WorkflowStatus {
    return this.status;
  }

  isTerminal(): boolean {
    return this.status === 'AllPhasesCompleted' || this.status === 'AbortedFailed';
  }

  currentPhase(): PhaseState | undefined {
    return this.status === 'Running' ? this.phases[this.currentIndex] : undefined;
  }

  getPhases(): readonly PhaseState[] {
    return this.phases;
  }

  getHistory(): readonly TransitionRecord[] {
    return this.transitions;
  }

  getErrorLog(): readonly ErrorLogEntry[] {
    return this.errorLog;
  }

  getAbortReason(): string | undefined {
    return this.abortReason;
  }

  onTransition(handler: TransitionHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  start(): void {
    if (this.status !== 'NotStarted') {
      throw new InvalidTransitionError(`Cannot start from ${this.status}`);
    }
    if (this.phases.length === 0) {
      throw new InvalidTransitionError('Plan has no phases');
    }
    this.startedAt = Date.now();
    this.setStatus('Running', 'start');
    this.enterPhase(0, 'start');
  }

  /**
   * Marks the current phase as containing T3 work.
   */
  requireConfirmation(): void {
    this.requireRunning('requireConfirmation').requiresConfirmation = true;
  }

  recordConfirmation(approvedBy: string, note?: string): ConfirmationRecord {
    const phase = this.requireRunning('recordConfirmation');
    if (approvedBy.trim().length === 0) {
      throw new InvalidTransitionError('Confirmation needs an approver');
    }
    phase.confirmation = { approvedBy, note, at: Date.now() };
    this.record(phase.status, phase.status, 'confirm', phase.definition.name, `approved by ${approvedBy}`);
    return phase.confirmation;
  }

  /**
   * Completes the current phase and advances.
   *
   * @throws ConfirmationRequiredError for T3 work without a confirmation
   * @throws InvalidTransitionError when the evidence does not meet the
   * phase's verification requirement
   */
  completePhase(evidence: VerificationEvidence, result?: PhaseResult): void {
    const phase = this.requireRunning('completePhase');
    const name = phase.definition.name;

    if (!satisfiesVerification(phase.definition.verification, evidence)) {
      throw new InvalidTransitionError(
        `Phase ${name} requires ${phase.definition.verification} verification`
      );
    }
    if (phase.requiresConfirmation && !phase.confirmation) {
      throw new ConfirmationRequiredError(name);
    }

    if (result) this.attachResult(result);
    phase.status = 'completed';
    phase.endedAt = Date.now();
    this.record('in_progress', 'completed', 'complete', name);

    if (this.currentIndex + 1 < this.phases.length) {
      this.enterPhase(this.currentIndex + 1, 'advance');
    } else {
      this.endedAt = Date.now();
      this.setStatus('AllPhasesCompleted', 'complete');
    }
  }

  canRecover(): boolean {
    const phase = this.currentPhase();
    return phase !== undefined && phase.recoveryAttempts < this.maxRecoveryAttempts;
  }

  /**
   * Fails the current phase and re-enters it for recovery. Sibling phases
   * that already completed are untouched.
   *
   * @returns the recovery attempt number
   */
  recover(mode: RecoveryMode, reason: string): number {
    const phase = this.requireRunning('recover');
    const name = phase.definition.name;

    if (phase.recoveryAttempts >= this.maxRecoveryAttempts) {
      throw new InvalidTransitionError(
        `Phase ${name} exhausted ${this.maxRecoveryAttempts} recovery attempts`
      );
    }

    phase.recoveryAttempts++;
    this.record('in_progress', 'failed', 'fail', name, reason);
    this.record('failed', 'in_progress', mode, name, `attempt ${phase.recoveryAttempts}`);
    log.info({ instanceId: this.instanceId, phase: name, mode, attempt: phase.recoveryAttempts }, 'Phase recovering');
    return phase.recoveryAttempts;
  }

  /**
   * Ends the instance as AbortedFailed, keeping partial results.
   */
  abort(reason: string, result?: PhaseResult): void {
    if (this.isTerminal()) {
      throw new InvalidTransitionError(`Cannot abort from ${this.status}`);
    }
    const phase = this.currentPhase();
    if (phase) {
      if (result) this.attachResult(result);
      phase.status = 'failed';
      phase.endedAt = Date.now();
      this.record('in_progress', 'failed', 'abort', phase.definition.name, reason);
    }
    this.abortReason = reason;
    this.endedAt = Date.now();
    this.setStatus('AbortedFailed', 'abort');
    log.error({ instanceId: this.instanceId, reason }, 'Workflow aborted');
  }

  logError(error: SwarmflowError | ErrorLogEntry): void {
    if (error instanceof SwarmflowError) {
      this.errorLog.push({
        code: error.code,
        message: error.message,
        at: Date.now(),
        phase: this.currentPhase()?.definition.name
      });
    } else {
      this.errorLog.push(error);
    }
  }

  recordModified(resources: Iterable<string>): void {
    for (const resource of resources) this.modified.add(resource);
  }

  /**
   * True when the phase invariant holds.
   */
  checkInvariant(): boolean {
    const inProgress = this.phases.filter(phase => phase.status === 'in_progress').length;
    if (this.status === 'Running') return inProgress === 1;
    return inProgress === 0;
  }

  snapshot(): InstanceSnapshot {
    const end = this.endedAt ?? Date.now();
    return {
      instanceId: this.instanceId,
      requestId: this.requestId,
      plan: this.plan.kind,
      tier: this.plan.tier,
      status: this.status,
      currentPhaseIndex: this.currentIndex,
      phases: this.phases.map(phase => ({
        name: phase.definition.name,
        status: phase.status,
        requiresConfirmation: phase.requiresConfirmation,
        confirmedBy: phase.confirmation?.approvedBy,
        recoveryAttempts: phase.recoveryAttempts,
        completed: phase.result?.completed ?? [],
        failed: phase.result?.failed ?? []
      })),
      elapsedMs: this.startedAt === undefined ? 0 : end - this.startedAt,
      modifiedResources: [...this.modified],
      errorLog: [...this.errorLog],
      transitions: [...this.transitions]
    };
  }

  private attachResult(result: PhaseResult): void {
    const phase = this.phases[this.currentIndex];
    phase.result = result;
    this.recordModified(result.modifiedResources);
    for (const entry of result.errors) this.errorLog.push(entry);
  }

  private requireRunning(operation: string): PhaseState {
    const phase = this.currentPhase();
    if (!phase || phase.status !== 'in_progress') {
      throw new InvalidTransitionError(`${operation} needs a phase in progress (status ${this.status})`);
    }
    return phase;
  }

  private enterPhase(index: number, event: string): void {
    this.currentIndex = index;
    const phase = this.phases[index];
    phase.status = 'in_progress';
    phase.startedAt = Date.now();
    this.record('pending', 'in_progress', event, phase.definition.name);
  }

  private setStatus(status: WorkflowStatus, event: string): void {
    const from = this.status;
    this.status = status;
    this.record(from, status, event);
  }

  private record(from: string, to: string, event: string, phase?: string, detail?: string): void {
    const transition: TransitionRecord = { from, to, event, phase, detail, at: Date.now() };
    this.transitions.push(transition);
    for (const handler of this.handlers) {
      handler(transition);
    }
  }
}
