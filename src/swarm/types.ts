// src/swarm/types.ts

/**
 * Swarm Types
 *
 * Workers execute AgentTasks within one phase. Siblings own disjoint
 * resource sets; the coordinator is the only writer of task status.
 */

import type { EngineConfig } from '../config.js';
import type { ErrorLogEntry, RiskTier, VerificationLevel } from '../types.js';

export type SwarmConfig = EngineConfig['swarm'];

/**
 * Unit of work for one worker.
 */
export interface AgentTask {
  readonly id: string;
  readonly phase: string;
  readonly description: string;
  /** Target resources; disjoint from every sibling's set */
  readonly resources: readonly string[];
  readonly tier: RiskTier;
  /** Needed for the phase to count as done */
  readonly critical: boolean;
  /** Original task ids when the budget merged several tasks */
  readonly mergedFrom?: readonly string[];
}

export type WorkerKind = 'primary' | 'replacement' | 'fix';

export type WorkerState = 'running' | 'completed' | 'failed' | 'stalled' | 'cancelled';

export interface FailureContext {
  detail: string;
  failingChecks: string[];
}

export interface WorkerAssignment {
  workerId: string;
  kind: WorkerKind;
  task: AgentTask;
  /** Stalled worker this one replaces */
  replacing?: string;
  /** Set for fix workers */
  failure?: FailureContext;
  note?: string;
  /** Coordinator is conserving context; keep reports short */
  conserve: boolean;
}

/**
 * Capabilities handed to a running worker.
 */
export interface WorkerHandle {
  readonly workerId: string;
  readonly signal: AbortSignal;
  reportProgress(message?: string): void;
  /**
   * Records a write to an owned resource.
   * @throws ResourceOwnershipError outside the task's resource set
   */
  recordMutation(resource: string): Promise<void>;
  log(message: string): void;
}

export interface WorkerReport {
  summary: string;
  /** Defaults to true */
  success?: boolean;
  error?: string;
  output?: Record<string, unknown>;
}

export type WorkerExecutor = (assignment: WorkerAssignment, handle: WorkerHandle) => Promise<WorkerReport>;

export interface Verdict {
  passed: boolean;
  detail?: string;
  failingChecks?: string[];
  /** Level the check actually reached; missing counts as none */
  level?: VerificationLevel;
  securityReviewed?: boolean;
}

export type VerdictMap = Record<string, Verdict | undefined>;

/**
 * Phase result handed to the verifier: only the tasks under review.
 */
export interface VerificationRequest {
  phase: string;
  round: number;
  /** Level the phase must reach to complete */
  verification: VerificationLevel;
  outcomes: readonly TaskOutcome[];
}

export type Verifier = (request: VerificationRequest) => VerdictMap | Promise<VerdictMap>;

export type TaskOutcomeStatus = 'completed' | 'failed' | 'deferred' | 'skipped';

export interface TaskOutcome {
  taskId: string;
  status: TaskOutcomeStatus;
  critical: boolean;
  tier: RiskTier;
  resources: readonly string[];
  /** Worker whose result stands */
  workerId?: string;
  summary?: string;
  output?: Record<string, unknown>;
  error?: string;
  verification?: Verdict;
  modifiedResources: string[];
  /** Workers that ran this task, replacements and fixes included */
  workers: string[];
  replaced: boolean;
  fixAttempts: number;
  /** Budget merge this task ran under */
  mergedInto?: string;
}

export interface PhaseResult {
  phase: string;
  outcomes: TaskOutcome[];
  completed: string[];
  failed: string[];
  /** Tasks pushed to a later phase by budget control */
  deferred: AgentTask[];
  skipped: string[];
  modifiedResources: string[];
  waves: number;
  workersSpawned: number;
  replacements: number;
  fixWorkers: number;
  conservation: boolean;
  errors: ErrorLogEntry[];
}

export interface ResourceMutation {
  phase: string;
  taskId: string;
  workerId: string;
  resource: string;
}

export type BudgetStrategy = 'merge' | 'defer' | 'batch';

export type SwarmEvent =
  | { type: 'wave:started'; phase: string; wave: number; taskIds: string[]; ceiling: number }
  | { type: 'wave:completed'; phase: string; wave: number }
  | { type: 'worker:spawned'; phase: string; workerId: string; taskId: string; kind: WorkerKind }
  | { type: 'worker:progress'; phase: string; workerId: string; taskId: string; message?: string }
  | { type: 'worker:completed'; phase: string; workerId: string; taskId: string }
  | { type: 'worker:failed'; phase: string; workerId: string; taskId: string; error: string }
  | { type: 'worker:stalled'; phase: string; workerId: string; taskId: string; idleMs: number; replacementId?: string }
  | { type: 'verification:failed'; phase: string; round: number; taskIds: string[] }
  | { type: 'recovery:targeted-fix'; phase: string; taskIds: string[] }
  | { type: 'task:escalated'; phase: string; taskId: string; detail: string }
  | { type: 'budget:exceeded'; phase: string; requested: number; ceiling: number; strategies: BudgetStrategy[] }
  | { type: 'conservation:entered'; trigger: string }
  | { type: 'phase:early-completion'; phase: string; skippedTaskIds: string[] };

export type SwarmEventHandler = (event: SwarmEvent) => void;

export interface SwarmStats {
  totalSpawned: number;
  activeCount: number;
  completedCount: number;
  failedCount: number;
  stalledCount: number;
  iterations: number;
  logBytes: number;
  conservation: boolean;
}
