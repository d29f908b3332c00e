// src/workflow/index.ts

/**
 * Workflow System
 *
 * Drives a classified request through its plan's phases:
 *
 * - Intake: validate and freeze the request
 * - Planning: split each phase into resource-disjoint agent tasks
 * - Execution: swarm waves, verification and targeted fixes
 * - Gates: T3 human confirmation, blocking Stop hooks
 */

export * from './types.js';

export { Orchestrator } from './orchestrator.js';
export type { OrchestratorOptions, ConfirmationInput } from './orchestrator.js';
export { WorkflowStateMachine, collectEvidence, satisfiesVerification } from './state-machine.js';
export type { StateMachineOptions, TransitionHandler } from './state-machine.js';
export { defaultPlanner, groupByDirectory } from './planner.js';
export { createRequest, submissionSchema } from './request.js';
export type { SubmissionInput } from './request.js';
