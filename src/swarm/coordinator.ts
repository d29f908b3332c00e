// src/swarm/coordinator.ts

/**
 * Agent Swarm Coordinator
 *
 * Runs the tasks of one phase on concurrent workers:
 *
 *   plan waves (budget) → run waves → split merged units → verify → fix failing tasks → re-verify
 *
 * - A worker idle past the stall grace period is replaced once; a second
 *   stall fails the task.
 * - Sibling results are combined only after the whole wave is terminal.
 * - Tasks that pass verification are never re-run; each failing task gets
 *   a fix worker bound to its own resources, then escalates.
 */

import { config as defaultConfig } from '../config.js';
import {
  BudgetExceededError,
  ContextPressureError,
  SwarmflowError,
  VerificationFailureError,
  WorkerStallError,
  errorMessage
} from '../errors.js';
import type { ErrorLogEntry } from '../types.js';
import type { PhaseDefinition } from '../decision/index.js';
import { createComponentLogger } from '../utils/logger.js';
import { planWaves } from './budget.js';
import { ConservationTracker } from './conservation.js';
import { assertDisjoint, ownsResource } from './partition.js';
import { AttemptResult, WorkerCallbacks, WorkerRun } from './worker.js';
import type {
  AgentTask,
  ResourceMutation,
  PhaseResult,
  SwarmConfig,
  SwarmEvent,
  SwarmEventHandler,
  SwarmStats,
  TaskOutcome,
  Verdict,
  VerdictMap,
  Verifier,
  WorkerAssignment,
  WorkerExecutor,
  WorkerReport
} from './types.js';

const log = createComponentLogger('swarm');

export interface CoordinatorOptions {
  executor: WorkerExecutor;
  /** Defaults to passing every task whose worker completed */
  verifier?: Verifier;
  config?: SwarmConfig;
  /** Called once per recorded mutation, one call at a time */
  onMutation?: (mutation: ResourceMutation) => Promise<void>;
}

export interface RunPhaseOptions {
  /** A later phase can take tasks deferred by budget control */
  allowDefer?: boolean;
}

interface UnitRecord {
  unit: AgentTask;
  status: 'pending' | 'completed' | 'failed' | 'skipped';
  primaryId: string;
  workers: string[];
  workerId?: string;
  report?: WorkerReport;
  summary?: string;
  error?: string;
  verdict?: Verdict;
  replaced: boolean;
  fixAttempts: number;
  modified: Set<string>;
  /** Id of the merged unit whose worker did this task's work */
  mergedInto?: string;
}

interface PhaseRun {
  phase: PhaseDefinition;
  records: Map<string, UnitRecord>;
  errors: ErrorLogEntry[];
}

/**
 * Accepts every completed task at the level the phase asks for. Callers
 * that run real checks supply their own verifier.
 */
export const defaultVerifier: Verifier = request => Object.fromEntries(
  request.outcomes.map(outcome => [outcome.taskId, outcome.status === 'completed'
    ? { passed: true, level: request.verification, securityReviewed: true }
    : { passed: false }])
);

export class AgentSwarmCoordinator {
  private readonly config: SwarmConfig;
  private readonly executor: WorkerExecutor;
  private readonly verifier: Verifier;
  private readonly conservation: ConservationTracker;
  private readonly handlers = new Set<SwarmEventHandler>();
  private readonly active = new Map<string, WorkerRun>();
  private mutationQueue: Promise<void> = Promise.resolve();
  private readonly counters = { spawned: 0, completed: 0, failed: 0, stalled: 0 };

  constructor(private readonly options: CoordinatorOptions) {
    this.config = options.config ?? defaultConfig.swarm;
    this.executor = options.executor;
    this.verifier = options.verifier ?? defaultVerifier;
    this.conservation = new ConservationTracker(this.config.conservation);
  }

  onEvent(handler: SwarmEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  get conserving(): boolean {
    return this.conservation.active;
  }

  /**
   * Concurrency ceiling for the next wave.
   */
  get ceiling(): number {
    return this.conservation.active
      ? Math.min(this.config.maxConcurrentWorkers, this.conservation.ceiling)
      : this.config.maxConcurrentWorkers;
  }

  /**
   * @throws ResourceOverlapError when sibling tasks share a resource
   */
  async runPhase(
    phase: PhaseDefinition,
    tasks: readonly AgentTask[],
    options: RunPhaseOptions = {}
  ): Promise<PhaseResult> {
    assertDisjoint(tasks);

    const run: PhaseRun = { phase, records: new Map(), errors: [] };
    const watchdog = setInterval(() => this.checkStalls(), this.config.stallCheckIntervalMs);

    log.info({ phase: phase.name, tasks: tasks.length, ceiling: this.ceiling }, 'Phase started');

    try {
      const plan = planWaves(tasks, {
        ceiling: this.ceiling,
        allowDefer: options.allowDefer === true,
        alwaysMerge: this.conservation.active
      });

      if (plan.strategies.length > 0) {
        const budget = new BudgetExceededError(plan.requested, this.ceiling);
        log.warn({ phase: phase.name, strategies: plan.strategies }, budget.message);
        this.logError(run, budget);
        this.emit({
          type: 'budget:exceeded',
          phase: phase.name,
          requested: plan.requested,
          ceiling: this.ceiling,
          strategies: plan.strategies
        });
      }

      let pending = plan.waves;
      for (const unit of pending.flat()) {
        run.records.set(unit.id, this.createRecord(phase, unit));
      }

      let wave = 0;
      while (pending.length > 0) {
        if (wave > 0 && this.conservation.active) {
          if (this.criticalWorkDone(run, pending)) {
            this.skipRemaining(run, pending);
            break;
          }
          pending = this.replan(run, pending);
        }

        const [current, ...rest] = pending;
        pending = rest;
        wave++;
        await this.runWave(run, wave, current);
      }

      this.splitMerged(run, tasks);
      await this.verify(run);
      return this.buildResult(run, plan.deferred, wave);
    } finally {
      clearInterval(watchdog);
    }
  }

  /**
   * Cancels every running worker without waiting for them.
   */
  shutdown(): void {
    for (const worker of this.active.values()) {
      worker.cancel();
    }
  }

  getStats(): SwarmStats {
    const pressure = this.conservation.getStats();
    return {
      totalSpawned: this.counters.spawned,
      activeCount: this.active.size,
      completedCount: this.counters.completed,
      failedCount: this.counters.failed,
      stalledCount: this.counters.stalled,
      iterations: pressure.iterations,
      logBytes: pressure.logBytes,
      conservation: pressure.conservation
    };
  }

  // ============ Waves ============

  private async runWave(run: PhaseRun, wave: number, units: readonly AgentTask[]): Promise<void> {
    this.emit({
      type: 'wave:started',
      phase: run.phase.name,
      wave,
      taskIds: units.map(unit => unit.id),
      ceiling: this.ceiling
    });
    this.notePressure(run, this.conservation.recordIteration());

    await Promise.all(units.map(unit => this.runUnit(run, unit)));

    this.emit({ type: 'wave:completed', phase: run.phase.name, wave });
  }

  private async runUnit(run: PhaseRun, unit: AgentTask): Promise<void> {
    const record = this.recordFor(run, unit);

    let result = await this.attempt(run, record, {
      workerId: record.primaryId,
      kind: 'primary',
      task: unit,
      conserve: this.conservation.active
    });

    if (result.kind === 'stalled') {
      const replacementId = `${record.primaryId}~r1`;
      this.noteStall(run, record, result.idleMs, replacementId);
      record.replaced = true;

      result = await this.attempt(run, record, {
        workerId: replacementId,
        kind: 'replacement',
        task: unit,
        replacing: record.primaryId,
        note: `Replacing stalled worker ${record.primaryId}; its partial writes are superseded`,
        conserve: this.conservation.active
      });

      if (result.kind === 'stalled') {
        this.noteStall(run, record, result.idleMs);
        result = { kind: 'failed', error: new WorkerStallError(replacementId, result.idleMs).message };
      }
    }

    this.applyResult(record, result);
  }

  private async attempt(run: PhaseRun, record: UnitRecord, assignment: WorkerAssignment): Promise<AttemptResult> {
    const worker = new WorkerRun(assignment, this.callbacks(run));
    this.active.set(worker.workerId, worker);
    record.workers.push(worker.workerId);

    this.counters.spawned++;
    this.notePressure(run, this.conservation.recordSpawn());
    this.emit({
      type: 'worker:spawned',
      phase: run.phase.name,
      workerId: worker.workerId,
      taskId: record.unit.id,
      kind: assignment.kind
    });
    log.debug({ workerId: worker.workerId, taskId: record.unit.id, kind: assignment.kind }, 'Worker spawned');

    const result = await worker.start(this.executor);
    this.active.delete(worker.workerId);

    if (result.kind === 'completed') {
      this.counters.completed++;
      record.workerId = worker.workerId;
      record.modified = assignment.kind === 'fix'
        ? new Set([...record.modified, ...worker.modified])
        : new Set(worker.modified);
      this.emit({ type: 'worker:completed', phase: run.phase.name, workerId: worker.workerId, taskId: record.unit.id });
    } else if (result.kind === 'failed') {
      this.counters.failed++;
      this.emit({
        type: 'worker:failed',
        phase: run.phase.name,
        workerId: worker.workerId,
        taskId: record.unit.id,
        error: result.error
      });
    }
    return result;
  }

  private applyResult(record: UnitRecord, result: AttemptResult): void {
    if (result.kind === 'completed') {
      record.status = 'completed';
      record.report = result.report;
      record.summary = this.conservation.compress(result.report.summary);
      record.error = undefined;
      return;
    }
    record.status = 'failed';
    record.error = result.kind === 'failed' ? result.error : `Stalled after ${result.idleMs}ms`;
  }

  private callbacks(run: PhaseRun): WorkerCallbacks {
    return {
      onProgress: (worker, message) => {
        this.emit({
          type: 'worker:progress',
          phase: run.phase.name,
          workerId: worker.workerId,
          taskId: worker.taskId,
          message
        });
      },
      onMutation: async (worker, resource) => {
        const mutation: ResourceMutation = {
          phase: run.phase.name,
          taskId: worker.taskId,
          workerId: worker.workerId,
          resource
        };
        const notify = this.options.onMutation;
        if (!notify) return;
        this.mutationQueue = this.mutationQueue
          .then(() => notify(mutation))
          .catch(error => {
            log.warn({ ...mutation, error: errorMessage(error) }, 'Mutation listener failed');
          });
        await this.mutationQueue;
      },
      onLog: (worker, message) => {
        log.debug({ workerId: worker.workerId }, message);
        this.notePressure(run, this.conservation.recordLog(message));
      }
    };
  }

  // ============ Stalls ============

  private checkStalls(): void {
    const now = Date.now();
    for (const worker of this.active.values()) {
      if (worker.idleMs(now) > this.config.stallGraceMs) {
        worker.markStalled(now);
      }
    }
  }

  private noteStall(run: PhaseRun, record: UnitRecord, idleMs: number, replacementId?: string): void {
    const workerId = record.workers[record.workers.length - 1];
    const stall = new WorkerStallError(workerId, idleMs);
    this.counters.stalled++;
    log.warn({ phase: run.phase.name, taskId: record.unit.id, replacementId }, stall.message);
    this.logError(run, stall, record.unit.id);
    this.emit({
      type: 'worker:stalled',
      phase: run.phase.name,
      workerId,
      taskId: record.unit.id,
      idleMs,
      replacementId
    });
  }

  // ============ Verification ============

  private async verify(run: PhaseRun): Promise<void> {
    const phase = run.phase.name;
    let round = 1;
    let failing = await this.collectFailures(run, [...run.records.values()], round);

    for (let attempt = 1; failing.length > 0 && attempt <= this.config.maxFixAttempts; attempt++) {
      const taskIds = failing.map(record => record.unit.id);
      this.emit({ type: 'recovery:targeted-fix', phase, taskIds });
      log.info({ phase, taskIds, attempt }, 'Spawning fix workers');

      for (let i = 0; i < failing.length; i += this.ceiling) {
        const batch = failing.slice(i, i + this.ceiling);
        this.notePressure(run, this.conservation.recordIteration());
        await Promise.all(batch.map(record => this.runFix(run, record, attempt)));
      }

      round++;
      failing = await this.collectFailures(run, failing, round);
    }

    for (const record of failing) {
      const detail = record.verdict?.detail ?? record.error ?? 'Verification failed';
      record.status = 'failed';
      log.warn({ phase, taskId: record.unit.id, detail }, 'Task escalated after repeated failure');
      this.emit({ type: 'task:escalated', phase, taskId: record.unit.id, detail });
    }
  }

  private async runFix(run: PhaseRun, record: UnitRecord, attempt: number): Promise<void> {
    record.fixAttempts++;
    const result = await this.attempt(run, record, {
      workerId: `${record.primaryId}~fix${attempt}`,
      kind: 'fix',
      task: record.unit,
      failure: {
        detail: record.verdict?.detail ?? record.error ?? 'Verification failed',
        failingChecks: record.verdict?.failingChecks ?? []
      },
      conserve: this.conservation.active
    });
    if (result.kind === 'stalled') {
      this.noteStall(run, record, result.idleMs);
    }
    this.applyResult(record, result);
  }

  /**
   * Verifies the given records and returns those that failed. Records
   * whose worker failed never reach the verifier.
   */
  private async collectFailures(run: PhaseRun, records: UnitRecord[], round: number): Promise<UnitRecord[]> {
    const candidates = records.filter(record => record.status === 'completed' || record.status === 'failed');
    const executed = candidates.filter(record => record.status === 'completed');

    const verdicts = executed.length > 0
      ? await this.requestVerdicts(run, executed, round)
      : {};

    const failing: UnitRecord[] = [];
    for (const record of candidates) {
      if (record.status === 'failed') {
        record.verdict = { passed: false, detail: record.error ?? 'Worker failed' };
      } else {
        record.verdict = verdicts[record.unit.id] ?? { passed: false, detail: 'No verdict returned' };
      }
      if (!record.verdict.passed) failing.push(record);
    }

    if (failing.length > 0) {
      for (const record of failing) {
        this.logError(
          run,
          new VerificationFailureError(record.unit.id, record.verdict?.detail ?? 'failed'),
          record.unit.id
        );
      }
      this.emit({
        type: 'verification:failed',
        phase: run.phase.name,
        round,
        taskIds: failing.map(record => record.unit.id)
      });
    }
    return failing;
  }

  private async requestVerdicts(run: PhaseRun, records: UnitRecord[], round: number): Promise<VerdictMap> {
    try {
      return await this.verifier({
        phase: run.phase.name,
        round,
        verification: run.phase.verification,
        outcomes: records.map(record => this.unitOutcome(record))
      });
    } catch (error) {
      const detail = `Verifier failed: ${errorMessage(error)}`;
      log.warn({ phase: run.phase.name, round }, detail);
      return Object.fromEntries(records.map(record => [record.unit.id, { passed: false, detail }]));
    }
  }

  // ============ Conservation ============

  private notePressure(run: PhaseRun, trigger: string | null): void {
    if (trigger === null) return;
    this.logError(run, new ContextPressureError(trigger));
    this.emit({ type: 'conservation:entered', trigger });
  }

  private criticalWorkDone(run: PhaseRun, pending: readonly AgentTask[][]): boolean {
    const remaining = pending.flat();
    if (remaining.some(unit => unit.critical)) return false;
    return [...run.records.values()]
      .filter(record => record.unit.critical && record.status !== 'skipped')
      .every(record => record.status === 'completed');
  }

  private skipRemaining(run: PhaseRun, pending: readonly AgentTask[][]): void {
    const skipped = pending.flat();
    for (const unit of skipped) {
      this.recordFor(run, unit).status = 'skipped';
    }
    log.info({ phase: run.phase.name, skipped: skipped.length }, 'Critical work complete; remaining waves skipped');
    this.emit({
      type: 'phase:early-completion',
      phase: run.phase.name,
      skippedTaskIds: skipped.map(unit => unit.id)
    });
  }

  /**
   * Regroups pending units for the conservation ceiling: fewer, larger workers.
   */
  private replan(run: PhaseRun, pending: AgentTask[][]): AgentTask[][] {
    const units = pending.flat();
    const plan = planWaves(units, { ceiling: this.ceiling, allowDefer: false, alwaysMerge: true });
    const regrouped = plan.waves.flat();

    if (regrouped.length !== units.length) {
      for (const unit of units) run.records.delete(unit.id);
      for (const unit of regrouped) run.records.set(unit.id, this.createRecord(run.phase, unit));
    }
    return plan.waves;
  }

  /**
   * Replaces each merged record with one record per original task, so
   * verdicts and fix workers address tasks rather than worker units.
   */
  private splitMerged(run: PhaseRun, tasks: readonly AgentTask[]): void {
    const records = [...run.records.values()];
    if (!records.some(record => record.unit.mergedFrom)) return;

    const byId = new Map(tasks.map(task => [task.id, task]));
    run.records.clear();
    for (const record of records) {
      const ids = record.unit.mergedFrom;
      if (!ids) {
        run.records.set(record.unit.id, record);
        continue;
      }
      for (const id of ids) {
        const original = byId.get(id);
        if (!original) continue;
        run.records.set(id, {
          ...record,
          unit: original,
          primaryId: `${run.phase.name}:${id}`,
          workers: [...record.workers],
          modified: new Set([...record.modified].filter(resource => ownsResource(original, resource))),
          mergedInto: record.unit.id
        });
      }
    }
  }

  // ============ Results ============

  private createRecord(phase: PhaseDefinition, unit: AgentTask): UnitRecord {
    return {
      unit,
      status: 'pending',
      primaryId: `${phase.name}:${unit.id}`,
      workers: [],
      replaced: false,
      fixAttempts: 0,
      modified: new Set()
    };
  }

  private recordFor(run: PhaseRun, unit: AgentTask): UnitRecord {
    let record = run.records.get(unit.id);
    if (!record) {
      record = this.createRecord(run.phase, unit);
      run.records.set(unit.id, record);
    }
    return record;
  }

  private unitOutcome(record: UnitRecord): TaskOutcome {
    return {
      taskId: record.unit.id,
      status: record.status === 'pending' ? 'failed' : record.status,
      critical: record.unit.critical,
      tier: record.unit.tier,
      resources: record.unit.resources,
      workerId: record.workerId,
      summary: record.summary,
      output: record.report?.output,
      error: record.status === 'failed' ? record.error : undefined,
      verification: record.verdict,
      modifiedResources: [...record.modified],
      workers: [...record.workers],
      replaced: record.replaced,
      fixAttempts: record.fixAttempts,
      mergedInto: record.mergedInto
    };
  }

  private buildResult(run: PhaseRun, deferred: AgentTask[], waves: number): PhaseResult {
    const records = [...run.records.values()];
    const outcomes = records.map(record => this.unitOutcome(record));

    for (const task of deferred) {
      outcomes.push({
        taskId: task.id,
        status: 'deferred',
        critical: task.critical,
        tier: task.tier,
        resources: task.resources,
        modifiedResources: [],
        workers: [],
        replaced: false,
        fixAttempts: 0
      });
    }

    const result: PhaseResult = {
      phase: run.phase.name,
      outcomes,
      completed: outcomes.filter(outcome => outcome.status === 'completed').map(outcome => outcome.taskId),
      failed: outcomes.filter(outcome => outcome.status === 'failed').map(outcome => outcome.taskId),
      deferred,
      skipped: outcomes.filter(outcome => outcome.status === 'skipped').map(outcome => outcome.taskId),
      modifiedResources: [...new Set(records.flatMap(record => [...record.modified]))],
      waves,
      workersSpawned: new Set(records.flatMap(record => record.workers)).size,
      replacements: new Set(
        records.filter(record => record.replaced).map(record => record.mergedInto ?? record.unit.id)
      ).size,
      fixWorkers: records.reduce((sum, record) => sum + record.fixAttempts, 0),
      conservation: this.conservation.active,
      errors: run.errors
    };

    log.info({
      phase: result.phase,
      completed: result.completed.length,
      failed: result.failed.length,
      deferred: deferred.length,
      waves
    }, 'Phase finished');

    return result;
  }

  private logError(run: PhaseRun, error: SwarmflowError, taskId?: string): void {
    run.errors.push({
      code: error.code,
      message: error.message,
      at: Date.now(),
      phase: run.phase.name,
      taskId
    });
  }

  private emit(event: SwarmEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        log.warn({ event: event.type, error: errorMessage(error) }, 'Swarm event handler failed');
      }
    }
  }
}
