// src/workflow/types.ts

import type { ErrorLogEntry, RiskTier, VerificationLevel } from '../types.js';
import type { Classification, PhaseDefinition, PlanKind } from '../decision/index.js';
import type { HookResult, LifecyclePoint } from '../hooks/index.js';
import type { AgentTask, PhaseResult, SwarmEvent } from '../swarm/index.js';
import type { SessionState } from '../session/state.js';

export type WorkflowStatus = 'NotStarted' | 'Running' | 'AllPhasesCompleted' | 'AbortedFailed';

export type PhaseStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

/**
 * Ways a failed phase may re-enter in_progress.
 */
export type RecoveryMode = 'targeted-fix' | 'reduced-scope';

/**
 * Evidence handed to the state machine when a phase asks to complete.
 */
export interface VerificationEvidence {
  level: VerificationLevel;
  passed: boolean;
  securityReviewed?: boolean;
  rollbackPlan?: string;
}

export interface ConfirmationRecord {
  approvedBy: string;
  note?: string;
  at: number;
}

export interface PhaseState {
  readonly definition: PhaseDefinition;
  status: PhaseStatus;
  /** Phase contains T3 work and needs a recorded human confirmation */
  requiresConfirmation: boolean;
  confirmation?: ConfirmationRecord;
  recoveryAttempts: number;
  startedAt?: number;
  endedAt?: number;
  result?: PhaseResult;
}

export interface TransitionRecord {
  from: string;
  to: string;
  event: string;
  phase?: string;
  detail?: string;
  at: number;
}

export interface PhaseSnapshot {
  name: string;
  status: PhaseStatus;
  requiresConfirmation: boolean;
  confirmedBy?: string;
  recoveryAttempts: number;
  completed: string[];
  failed: string[];
}

/**
 * Plain-data view of a workflow instance.
 */
export interface InstanceSnapshot {
  instanceId: string;
  requestId: string;
  plan: PlanKind;
  tier: RiskTier;
  status: WorkflowStatus;
  currentPhaseIndex: number;
  phases: PhaseSnapshot[];
  elapsedMs: number;
  modifiedResources: string[];
  errorLog: ErrorLogEntry[];
  transitions: TransitionRecord[];
}

// ============ Collaborators ============

/**
 * Splits a phase into AgentTasks with disjoint resource sets.
 */
export interface PlanningContext {
  instanceId: string;
  requestId: string;
  description: string;
  fileHints: readonly string[];
  phase: PhaseDefinition;
  phaseIndex: number;
  tier: RiskTier;
  /** Tasks deferred by an earlier phase */
  carried: readonly AgentTask[];
}

export type TaskPlanner = (context: PlanningContext) => AgentTask[] | Promise<AgentTask[]>;

export interface ConfirmationGate {
  instanceId: string;
  phase: string;
  taskIds: string[];
}

export type ConfirmationDecision =
  | { approved: true; approvedBy: string; note?: string }
  | { approved: false; reason: string };

/**
 * Resolves a T3 gate without an operator call, such as an approval queue.
 */
export type ConfirmationProvider = (gate: ConfirmationGate) => Promise<ConfirmationDecision>;

export interface PhaseCheckpoint {
  instanceId: string;
  phase: string;
  phaseIndex: number;
  state: SessionState;
  result: PhaseResult;
  at: number;
}

export type CheckpointSink = (checkpoint: PhaseCheckpoint) => void | Promise<void>;

// ============ Events and outcome ============

export type WorkflowEvent =
  | { type: 'instance:created'; instanceId: string; plan: PlanKind; tier: RiskTier }
  | { type: 'hooks:dispatched'; instanceId?: string; point: LifecyclePoint; results: HookResult[] }
  | { type: 'phase:started'; instanceId: string; phase: string; index: number }
  | { type: 'phase:completed'; instanceId: string; phase: string; index: number }
  | { type: 'phase:failed'; instanceId: string; phase: string; index: number; reason: string }
  | { type: 'phase:recovering'; instanceId: string; phase: string; mode: RecoveryMode; attempt: number }
  | { type: 'swarm'; instanceId: string; event: SwarmEvent }
  | { type: 'confirmation:required'; instanceId: string; phase: string; taskIds: string[] }
  | { type: 'confirmation:recorded'; instanceId: string; phase: string; approvedBy: string }
  | { type: 'checkpoint'; instanceId: string; phase: string }
  | { type: 'stop:blocked'; instanceId: string; warnings: string[] }
  | { type: 'stop:acknowledged'; instanceId: string; operator: string }
  | { type: 'instance:terminal'; instanceId: string; status: WorkflowStatus };

export type WorkflowEventHandler = (event: WorkflowEvent) => void;

export interface WorkflowOutcome {
  instanceId: string;
  requestId: string;
  status: 'AllPhasesCompleted' | 'AbortedFailed';
  classification: Classification;
  tier: RiskTier;
  phases: PhaseResult[];
  /** Tasks dropped by a reduced-scope re-plan */
  droppedTasks: string[];
  deferredTasks: string[];
  modifiedResources: string[];
  errorLog: ErrorLogEntry[];
  /** Warnings from blocking Stop hooks that needed acknowledgment */
  stopWarnings: string[];
  acknowledgedBy?: string;
  /** Deferred and dropped tasks the operator accepted at stop */
  acknowledgedTasks: string[];
  abortReason?: string;
  elapsedMs: number;
  snapshot: InstanceSnapshot;
}

export interface Submission {
  instanceId: string;
  classification: Classification;
  events: AsyncIterable<WorkflowEvent>;
  outcome: Promise<WorkflowOutcome>;
}
