// src/workflow/orchestrator.ts

/**
 * Workflow Orchestrator
 *
 * Composition root. For each submitted request:
 *
 *   validate → onRequestSubmit hooks → classify → risk gate
 *     → for each phase: plan tasks → swarm → verify → confirm (T3) → advance
 *     → onWorkflowStop hooks
 *
 * Only invalid requests and incomplete risk assessments are thrown to the
 * submitter. Everything else, including a planner that hands out
 * overlapping resources, ends up in the outcome and the instance error log.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator({ executor: runAgent });
 * const { events, outcome } = await orchestrator.submit({ description: 'fix typo in login page' });
 * for await (const event of events) console.log(event.type);
 * console.log((await outcome).status);
 * ```
 */

import crypto from 'crypto';
import { LRUCache } from 'lru-cache';
import { config as defaultConfig, EngineConfig } from '../config.js';
import {
  ConfirmationUnresolvedError,
  IncompleteRiskAssessmentError,
  SwarmflowError,
  errorMessage
} from '../errors.js';
import type { RiskTier, TaskRequest } from '../types.js';
import { maxTier } from '../types.js';
import {
  Classification,
  Dimension,
  DimensionScorer,
  RequestClassifier,
  WorkflowPlan,
  buildPlan,
  conservativePlan
} from '../decision/index.js';
import { HookManager, registerBuiltinHooks, DispatchReport, OnWorkflowStopContext } from '../hooks/index.js';
import { RiskClassifier, missingAssessmentFields } from '../risk/index.js';
import { ClassificationRules, loadClassificationRules } from '../rules/index.js';
import { SessionStore } from '../session/index.js';
import {
  AgentSwarmCoordinator,
  AgentTask,
  PhaseResult,
  Verifier,
  WorkerExecutor
} from '../swarm/index.js';
import { EventChannel } from '../utils/event-channel.js';
import { createComponentLogger } from '../utils/logger.js';
import { defaultPlanner } from './planner.js';
import { createRequest } from './request.js';
import { WorkflowStateMachine, collectEvidence } from './state-machine.js';
import type {
  CheckpointSink,
  ConfirmationDecision,
  ConfirmationProvider,
  InstanceSnapshot,
  Submission,
  TaskPlanner,
  WorkflowEvent,
  WorkflowEventHandler,
  WorkflowOutcome
} from './types.js';

const log = createComponentLogger('workflow');

export interface OrchestratorOptions {
  executor: WorkerExecutor;
  verifier?: Verifier;
  planner?: TaskPlanner;
  /** Keyword tables; loaded from `config.rulesFile` or the bundled file when absent */
  rules?: ClassificationRules;
  config?: EngineConfig;
  /** Hook manager to use; a fresh one with built-in hooks otherwise */
  hooks?: HookManager;
  scorers?: Partial<Record<Dimension, DimensionScorer>>;
  store?: SessionStore;
  confirmationProvider?: ConfirmationProvider;
  /** Receives session state at each phase boundary of checkpointed plans */
  checkpointSink?: CheckpointSink;
}

export interface ConfirmationInput {
  approvedBy: string;
  note?: string;
}

interface PendingDecision<T> {
  phase: string;
  settle: (value: T) => void;
}

interface Instance {
  id: string;
  request: TaskRequest;
  classification: Classification;
  tier: RiskTier;
  machine: WorkflowStateMachine;
  coordinator: AgentSwarmCoordinator;
  channel: EventChannel<WorkflowEvent>;
  results: PhaseResult[];
  dropped: string[];
  deferred: AgentTask[];
  stopWarnings: string[];
  acknowledgedBy?: string;
  acknowledgedTasks: string[];
  confirmation?: PendingDecision<ConfirmationDecision>;
  stop?: PendingDecision<string | null>;
}

const FALLBACK_RULE = 'Unscorable Dimension Fallback';

export class Orchestrator {
  readonly config: EngineConfig;
  readonly hooks: HookManager;
  readonly store: SessionStore;
  readonly classifier: RequestClassifier;
  readonly riskClassifier: RiskClassifier;

  private readonly options: OrchestratorOptions;
  private readonly planner: TaskPlanner;
  private readonly instances = new Map<string, Instance>();
  private readonly archive: LRUCache<string, InstanceSnapshot>;
  private readonly handlers = new Set<WorkflowEventHandler>();

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.config = options.config ?? defaultConfig;
    const rules = options.rules ?? loadClassificationRules(this.config.rulesFile);

    this.classifier = new RequestClassifier({
      rules,
      config: this.config.decision,
      scorers: options.scorers
    });
    this.riskClassifier = new RiskClassifier(rules);
    this.store = options.store ?? new SessionStore();
    this.planner = options.planner ?? defaultPlanner;
    this.archive = new LRUCache<string, InstanceSnapshot>({ max: this.config.workflow.archivedInstances });

    if (options.hooks) {
      this.hooks = options.hooks;
    } else {
      this.hooks = new HookManager(this.config.hooks);
      registerBuiltinHooks(this.hooks);
    }
  }

  onEvent(handler: WorkflowEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Accepts a request and starts its workflow.
   *
   * @throws InvalidRequestError for an empty or malformed request
   * @throws IncompleteRiskAssessmentError when a T1+ request lacks answers
   */
  async submit(input: unknown): Promise<Submission> {
    const request = createRequest(input, this.config.workflow.maxDescriptionLength);

    const submitted = await this.hooks.dispatch('onRequestSubmit', {
      request,
      state: this.store.getState()
    });
    this.store.applyPatch(submitted.statePatch);
    this.broadcast({ type: 'hooks:dispatched', point: 'onRequestSubmit', results: submitted.results });

    const classification = this.classifier.classify(request);
    const requestedTier = suggestedTiers(submitted).reduce(maxTier, classification.risk.tier);

    const missing = missingAssessmentFields(requestedTier, request.riskAssessment);
    if (missing.length > 0) {
      log.warn({ requestId: request.id, tier: requestedTier, missing }, 'Submission blocked by risk gate');
      throw new IncompleteRiskAssessmentError(requestedTier, missing);
    }

    const tier = this.store.ledger.assign(request.id, requestedTier);
    const plan = this.planFor(classification, tier);
    const instance = this.createInstance(request, classification, plan, tier);

    const outcome = this.execute(instance).catch(error => this.failUnexpectedly(instance, error));
    return {
      instanceId: instance.id,
      classification,
      events: instance.channel,
      outcome
    };
  }

  /**
   * Records a human confirmation for the pending T3 gate.
   */
  confirmPhase(instanceId: string, confirmation: ConfirmationInput): boolean {
    const pending = this.instances.get(instanceId)?.confirmation;
    if (!pending || confirmation.approvedBy.trim().length === 0) return false;
    pending.settle({ approved: true, approvedBy: confirmation.approvedBy, note: confirmation.note });
    return true;
  }

  rejectPhase(instanceId: string, reason: string): boolean {
    const pending = this.instances.get(instanceId)?.confirmation;
    if (!pending) return false;
    pending.settle({ approved: false, reason });
    return true;
  }

  /**
   * Releases completion held by a blocking Stop hook.
   */
  acknowledgeStop(instanceId: string, operator: string): boolean {
    const pending = this.instances.get(instanceId)?.stop;
    if (!pending) return false;
    pending.settle(operator);
    return true;
  }

  /**
   * Live instance, or the final snapshot of a recently finished one.
   */
  getInstance(instanceId: string): InstanceSnapshot | undefined {
    return this.instances.get(instanceId)?.machine.snapshot() ?? this.archive.get(instanceId);
  }

  /** Instances still running */
  listInstances(): InstanceSnapshot[] {
    return [...this.instances.values()].map(instance => instance.machine.snapshot());
  }

  // ============ Setup ============

  private planFor(classification: Classification, tier: RiskTier): WorkflowPlan {
    if (tier === classification.plan.tier) return classification.plan;
    if (classification.rule === FALLBACK_RULE) return conservativePlan(tier);
    // direct execution is reserved for T0
    const kind = classification.plan.kind === 'direct' && tier !== 'T0' ? 'standard' : classification.plan.kind;
    return buildPlan(kind, tier);
  }

  private createInstance(
    request: TaskRequest,
    classification: Classification,
    plan: WorkflowPlan,
    tier: RiskTier
  ): Instance {
    const id = crypto.randomUUID();
    const machine = new WorkflowStateMachine({
      instanceId: id,
      requestId: request.id,
      plan,
      maxRecoveryAttempts: this.config.workflow.maxRecoveryAttempts
    });

    const coordinator = new AgentSwarmCoordinator({
      executor: this.options.executor,
      verifier: this.options.verifier,
      config: this.config.swarm,
      onMutation: async mutation => {
        const report = await this.hooks.dispatch('onResourceMutated', {
          instanceId: id,
          ...mutation,
          state: this.store.getState()
        });
        this.store.applyPatch(report.statePatch);
      }
    });

    const instance: Instance = {
      id,
      request,
      classification,
      tier,
      machine,
      coordinator,
      channel: new EventChannel<WorkflowEvent>(),
      results: [],
      dropped: [],
      deferred: [],
      stopWarnings: [],
      acknowledgedTasks: []
    };
    this.instances.set(id, instance);

    this.store.create({
      requestId: request.id,
      instanceId: id,
      description: request.description,
      plan: plan.kind,
      tier,
      scores: { ...classification.score.dimensions },
      aggregate: classification.score.aggregate,
      status: 'NotStarted'
    });
    machine.onTransition(transition => this.store.append(request.id, transition));

    coordinator.onEvent(event => {
      this.emit(instance, { type: 'swarm', instanceId: id, event });
      if (event.type === 'recovery:targeted-fix') {
        this.recover(instance, 'targeted-fix', `Verification failed for ${event.taskIds.join(', ')}`);
      }
    });

    log.info({ instanceId: id, requestId: request.id, plan: plan.kind, tier }, 'Workflow instance created');
    this.emit(instance, { type: 'instance:created', instanceId: id, plan: plan.kind, tier });
    return instance;
  }

  // ============ Execution ============

  private async execute(instance: Instance): Promise<WorkflowOutcome> {
    const { machine } = instance;
    machine.start();
    this.store.update(instance.request.id, { status: 'Running' });

    const phases = machine.plan.phases;
    let carried: AgentTask[] = [];

    for (let index = 0; index < phases.length && machine.getStatus() === 'Running'; index++) {
      const phase = phases[index];
      this.emit(instance, { type: 'phase:started', instanceId: instance.id, phase: phase.name, index });

      const planned = await this.planner({
        instanceId: instance.id,
        requestId: instance.request.id,
        description: instance.request.description,
        fileHints: instance.request.fileHints,
        phase,
        phaseIndex: index,
        tier: instance.tier,
        carried
      });

      const { runnable, blocked } = this.gateTasks(instance, planned);
      if (runnable.some(task => task.tier === 'T3')) {
        machine.requireConfirmation();
      }

      const laterSwarmPhase = phases.slice(index + 1).some(next => next.ownership === 'swarm');
      let result: PhaseResult;
      try {
        result = await instance.coordinator.runPhase(phase, runnable, { allowDefer: laterSwarmPhase });
      } catch (error) {
        if (!(error instanceof SwarmflowError)) throw error;
        machine.logError(error);
        this.abort(instance, index, error.message);
        break;
      }

      carried = result.deferred;
      const failed = [...result.failed, ...blocked];

      if (failed.length > 0 && !this.escalate(instance, index, result, failed)) {
        break;
      }

      if (machine.currentPhase()?.requiresConfirmation) {
        const approved = await this.confirmationGate(instance, index, runnable.filter(task => task.tier === 'T3'));
        if (!approved) break;
      }

      try {
        machine.completePhase(
          collectEvidence(phase.verification, result, instance.request.riskAssessment?.fastestRollback),
          result
        );
      } catch (error) {
        if (!(error instanceof SwarmflowError)) throw error;
        machine.logError(error);
        this.abort(instance, index, error.message, result);
        break;
      }

      instance.results.push(result);
      this.emit(instance, { type: 'phase:completed', instanceId: instance.id, phase: phase.name, index });
      await this.checkpoint(instance, index, result);
    }

    instance.deferred = carried;
    await this.stop(instance);
    return this.finish(instance);
  }

  /**
   * Drops tasks whose own tier needs assessment answers the request lacks.
   */
  private gateTasks(instance: Instance, planned: AgentTask[]): { runnable: AgentTask[]; blocked: string[] } {
    const runnable: AgentTask[] = [];
    const blocked: string[] = [];

    for (const task of planned) {
      const tier = this.store.ledger.assign(`${instance.request.id}/${task.phase}/${task.id}`, task.tier);
      const missing = missingAssessmentFields(tier, instance.request.riskAssessment);
      if (missing.length > 0) {
        instance.machine.logError(new IncompleteRiskAssessmentError(tier, missing));
        blocked.push(task.id);
        continue;
      }
      runnable.push(tier === task.tier ? task : { ...task, tier });
    }
    return { runnable, blocked };
  }

  /**
   * Handles tasks that failed after targeted fixes. Returns false when the
   * instance was aborted.
   */
  private escalate(instance: Instance, index: number, result: PhaseResult, failed: string[]): boolean {
    const critical = new Set(
      result.outcomes.filter(outcome => outcome.critical).map(outcome => outcome.taskId)
    );
    // tasks blocked before execution have no outcome and count as critical
    const droppable = failed.every(taskId =>
      !critical.has(taskId) && result.outcomes.some(outcome => outcome.taskId === taskId)
    );

    if (droppable && this.recover(instance, 'reduced-scope', `Dropping non-critical tasks ${failed.join(', ')}`)) {
      instance.dropped.push(...failed);
      return true;
    }

    this.abort(instance, index, `Phase ${result.phase} failed: ${failed.join(', ')}`, result);
    return false;
  }

  private recover(instance: Instance, mode: 'targeted-fix' | 'reduced-scope', reason: string): boolean {
    const { machine } = instance;
    const phase = machine.currentPhase();
    if (!phase || !machine.canRecover()) {
      log.warn({ instanceId: instance.id, mode }, 'No recovery attempts left');
      return false;
    }
    const attempt = machine.recover(mode, reason);
    this.emit(instance, {
      type: 'phase:recovering',
      instanceId: instance.id,
      phase: phase.definition.name,
      mode,
      attempt
    });
    return true;
  }

  private abort(instance: Instance, index: number, reason: string, result?: PhaseResult): void {
    const phase = instance.machine.currentPhase()?.definition.name ?? 'unknown';
    if (result) instance.results.push(result);
    instance.machine.abort(reason, result);
    this.emit(instance, { type: 'phase:failed', instanceId: instance.id, phase, index, reason });
  }

  // ============ Gates ============

  private async confirmationGate(instance: Instance, index: number, tasks: AgentTask[]): Promise<boolean> {
    const phase = instance.machine.plan.phases[index].name;
    const taskIds = tasks.map(task => task.id);
    const decision = await this.awaitConfirmation(instance, phase, taskIds);

    if (!decision.approved) {
      const error = new ConfirmationUnresolvedError(phase, decision.reason);
      log.error({ instanceId: instance.id, phase }, error.message);
      instance.machine.logError(error);
      this.abort(instance, index, error.message);
      return false;
    }

    instance.machine.recordConfirmation(decision.approvedBy, decision.note);
    this.emit(instance, {
      type: 'confirmation:recorded',
      instanceId: instance.id,
      phase,
      approvedBy: decision.approvedBy
    });
    return true;
  }

  private awaitConfirmation(instance: Instance, phase: string, taskIds: string[]): Promise<ConfirmationDecision> {
    const timeoutMs = this.config.workflow.confirmationTimeoutMs;

    return new Promise<ConfirmationDecision>(resolve => {
      const timer = setTimeout(() => {
        settle({ approved: false, reason: `No confirmation within ${timeoutMs}ms` });
      }, timeoutMs);

      const settle = (decision: ConfirmationDecision) => {
        if (instance.confirmation?.settle !== settle) return;
        clearTimeout(timer);
        instance.confirmation = undefined;
        resolve(decision);
      };
      instance.confirmation = { phase, settle };

      this.emit(instance, { type: 'confirmation:required', instanceId: instance.id, phase, taskIds });

      const provider = this.options.confirmationProvider;
      if (provider) {
        provider({ instanceId: instance.id, phase, taskIds }).then(
          settle,
          (error: unknown) => settle({ approved: false, reason: errorMessage(error) })
        );
      }
    });
  }

  private async checkpoint(instance: Instance, index: number, result: PhaseResult): Promise<void> {
    const sink = this.options.checkpointSink;
    if (!instance.machine.plan.checkpointing || !sink) return;

    const phase = instance.machine.plan.phases[index].name;
    try {
      await sink({
        instanceId: instance.id,
        phase,
        phaseIndex: index,
        state: this.store.getState(),
        result,
        at: Date.now()
      });
      this.emit(instance, { type: 'checkpoint', instanceId: instance.id, phase });
    } catch (error) {
      log.warn({ instanceId: instance.id, phase, error: errorMessage(error) }, 'Checkpoint sink failed');
    }
  }

  /**
   * Runs the Stop hooks. A blocking refusal waits for an operator; the
   * acknowledgment covers every deferred and dropped task, and the hooks
   * run once more with those tasks marked acknowledged.
   */
  private async stop(instance: Instance): Promise<void> {
    const { machine } = instance;
    const snapshot = machine.snapshot();
    const context: Omit<OnWorkflowStopContext, 'state' | 'acknowledgedTasks'> = {
      instanceId: instance.id,
      status: machine.getStatus() === 'AllPhasesCompleted' ? 'AllPhasesCompleted' : 'AbortedFailed',
      completedPhases: snapshot.phases.filter(phase => phase.status === 'completed').length,
      totalPhases: snapshot.phases.length,
      deferredTasks: instance.deferred.map(task => task.id),
      droppedTasks: [...instance.dropped],
      modifiedResources: snapshot.modifiedResources
    };

    const report = await this.dispatchStop(instance, { ...context, acknowledgedTasks: [] });
    if (report.blocked.length === 0) return;

    instance.stopWarnings = report.warnings;
    this.emit(instance, { type: 'stop:blocked', instanceId: instance.id, warnings: report.warnings });

    const operator = await this.awaitAcknowledgment(instance);
    if (operator === null) {
      log.warn({ instanceId: instance.id, warnings: report.warnings }, 'Stop warnings left unacknowledged');
      return;
    }
    instance.acknowledgedBy = operator;
    instance.acknowledgedTasks = [...context.deferredTasks, ...context.droppedTasks];
    this.emit(instance, { type: 'stop:acknowledged', instanceId: instance.id, operator });

    const recheck = await this.dispatchStop(instance, { ...context, acknowledgedTasks: instance.acknowledgedTasks });
    if (recheck.blocked.length > 0) {
      instance.stopWarnings = recheck.warnings;
      log.warn({ instanceId: instance.id, blocked: recheck.blocked }, 'Stop hooks still refuse after acknowledgment');
    }
  }

  private async dispatchStop(
    instance: Instance,
    context: Omit<OnWorkflowStopContext, 'state'>
  ): Promise<DispatchReport> {
    const report = await this.hooks.dispatch('onWorkflowStop', { ...context, state: this.store.getState() });
    this.store.applyPatch(report.statePatch);
    this.emit(instance, { type: 'hooks:dispatched', instanceId: instance.id, point: 'onWorkflowStop', results: report.results });
    return report;
  }

  private awaitAcknowledgment(instance: Instance): Promise<string | null> {
    const timeoutMs = this.config.workflow.confirmationTimeoutMs;
    return new Promise<string | null>(resolve => {
      const timer = setTimeout(() => settle(null), timeoutMs);
      const settle = (operator: string | null) => {
        if (instance.stop?.settle !== settle) return;
        clearTimeout(timer);
        instance.stop = undefined;
        resolve(operator);
      };
      instance.stop = { phase: 'stop', settle };
    });
  }

  // ============ Outcome ============

  private finish(instance: Instance): WorkflowOutcome {
    const { machine } = instance;
    const snapshot = machine.snapshot();
    const status = machine.getStatus() === 'AllPhasesCompleted' ? 'AllPhasesCompleted' : 'AbortedFailed';

    this.store.update(instance.request.id, { status, tier: instance.tier });
    this.emit(instance, { type: 'instance:terminal', instanceId: instance.id, status });
    instance.channel.close();
    this.instances.delete(instance.id);
    this.archive.set(instance.id, snapshot);

    if (status === 'AbortedFailed') {
      log.error({ instanceId: instance.id, reason: machine.getAbortReason() }, 'Workflow ended in AbortedFailed');
    } else {
      log.info({ instanceId: instance.id, elapsedMs: snapshot.elapsedMs }, 'Workflow completed');
    }

    return {
      instanceId: instance.id,
      requestId: instance.request.id,
      status,
      classification: instance.classification,
      tier: instance.tier,
      phases: instance.results,
      droppedTasks: [...instance.dropped],
      deferredTasks: instance.deferred.map(task => task.id),
      modifiedResources: snapshot.modifiedResources,
      errorLog: snapshot.errorLog,
      stopWarnings: instance.stopWarnings,
      acknowledgedBy: instance.acknowledgedBy,
      acknowledgedTasks: instance.acknowledgedTasks,
      abortReason: machine.getAbortReason(),
      elapsedMs: snapshot.elapsedMs,
      snapshot
    };
  }

  private failUnexpectedly(instance: Instance, error: unknown): WorkflowOutcome {
    log.error({ instanceId: instance.id, error: errorMessage(error) }, 'Workflow crashed');
    instance.coordinator.shutdown();
    if (!instance.machine.isTerminal()) {
      instance.machine.abort(errorMessage(error));
    }
    return this.finish(instance);
  }

  // ============ Events ============

  private emit(instance: Instance, event: WorkflowEvent): void {
    instance.channel.push(event);
    this.broadcast(event);
  }

  private broadcast(event: WorkflowEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        log.warn({ event: event.type, error: errorMessage(error) }, 'Workflow event handler failed');
      }
    }
  }
}

function suggestedTiers(report: DispatchReport): RiskTier[] {
  return report.results.flatMap(result =>
    result.payload?.kind === 'request-annotation' && result.payload.suggestedTier
      ? [result.payload.suggestedTier]
      : []
  );
}

