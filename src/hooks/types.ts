// src/hooks/types.ts

/**
 * Hook System Types
 *
 * Hooks are bound to one lifecycle point each. Their outputs are a tagged
 * union of known payload shapes, with an opaque variant for
 * provider-specific data.
 */

import type { RiskTier, TaskRequest } from '../types.js';
import type { SessionState, StatePatch } from '../session/state.js';

export type LifecyclePoint = 'onRequestSubmit' | 'onResourceMutated' | 'onWorkflowStop';

export const LIFECYCLE_POINTS: readonly LifecyclePoint[] = [
  'onRequestSubmit',
  'onResourceMutated',
  'onWorkflowStop'
];

// ============ Contexts ============

interface BaseHookContext {
  /** Session state as of dispatch */
  state: SessionState;
}

export interface OnRequestSubmitContext extends BaseHookContext {
  request: TaskRequest;
}

export interface OnResourceMutatedContext extends BaseHookContext {
  instanceId: string;
  phase: string;
  taskId: string;
  workerId: string;
  resource: string;
}

export interface OnWorkflowStopContext extends BaseHookContext {
  instanceId: string;
  status: 'AllPhasesCompleted' | 'AbortedFailed';
  completedPhases: number;
  totalPhases: number;
  /** Tasks moved to a later phase and never run */
  deferredTasks: readonly string[];
  /** Tasks dropped by a reduced-scope re-plan */
  droppedTasks: readonly string[];
  acknowledgedTasks: readonly string[];
  modifiedResources: readonly string[];
}

export interface HookContextMap {
  onRequestSubmit: OnRequestSubmitContext;
  onResourceMutated: OnResourceMutatedContext;
  onWorkflowStop: OnWorkflowStopContext;
}

// ============ Results ============

export type HookPayload =
  | { kind: 'request-annotation'; tags: string[]; suggestedTier?: RiskTier }
  | { kind: 'mutation-check'; resource: string; findings: string[] }
  | { kind: 'stop-gate'; allowStop: boolean; warnings: string[] }
  | { kind: 'opaque'; data: Record<string, unknown> };

/**
 * What a hook's run function returns.
 */
export interface HookOutput {
  payload?: HookPayload;
  /** Text shown to the operator */
  display?: string;
  statePatch?: StatePatch;
}

export type HookStatus = 'success' | 'failed' | 'skipped' | 'timeout';

export interface HookResult {
  hookId: string;
  point: LifecyclePoint;
  priority: number;
  status: HookStatus;
  payload?: HookPayload;
  display?: string;
  statePatch?: StatePatch;
  durationMs: number;
  error?: string;
  /** Blocking Stop hook; only honoured at onWorkflowStop */
  blocking: boolean;
}

// ============ Definitions ============

export interface HookDefinition<P extends LifecyclePoint = LifecyclePoint> {
  id: string;
  name: string;
  description?: string;
  /** Lower runs first */
  priority: number;
  /** Declared timeout; capped by the lifecycle point's budget */
  timeoutMs?: number;
  /** At onWorkflowStop, a failure or a refused stop halts completion */
  blocking?: boolean;
  enabled?: boolean;
  shouldRun?: (context: HookContextMap[P]) => boolean;
  run: (context: HookContextMap[P], signal: AbortSignal) => HookOutput | Promise<HookOutput>;
}

export interface DispatchReport {
  point: LifecyclePoint;
  /** One result per enabled hook, in execution order */
  results: HookResult[];
  /** Patches merged in dispatch order, last write wins */
  statePatch: StatePatch;
  /** Session state after applying the merged patch */
  state: SessionState;
  /** Blocking Stop hooks that halted completion */
  blocked: HookResult[];
  warnings: string[];
}

export interface HookStats {
  hookId: string;
  name: string;
  point: LifecyclePoint;
  priority: number;
  enabled: boolean;
  blocking: boolean;
  calls: number;
  failures: number;
  timeouts: number;
  skipped: number;
  totalDurationMs: number;
  lastStatus?: HookStatus;
}
