// src/swarm/index.ts

export { AgentSwarmCoordinator, defaultVerifier } from './coordinator.js';
export type { CoordinatorOptions, RunPhaseOptions } from './coordinator.js';
export { packUnits, planWaves, mergeRelated, mergeTasks } from './budget.js';
export type { WavePlan, WavePlanOptions } from './budget.js';
export { ConservationTracker } from './conservation.js';
export { assertDisjoint, isDisjoint, normalizeResource, ownsResource, relatedGroup } from './partition.js';
export { WorkerRun } from './worker.js';
export type { AttemptResult } from './worker.js';
export type {
  AgentTask,
  BudgetStrategy,
  FailureContext,
  PhaseResult,
  ResourceMutation,
  SwarmConfig,
  SwarmEvent,
  SwarmEventHandler,
  SwarmStats,
  TaskOutcome,
  TaskOutcomeStatus,
  Verdict,
  VerdictMap,
  VerificationRequest,
  Verifier,
  WorkerAssignment,
  WorkerExecutor,
  WorkerHandle,
  WorkerKind,
  WorkerReport,
  WorkerState
} from './types.js';
