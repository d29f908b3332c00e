// src/errors.ts

/**
 * Error taxonomy for the orchestration engine.
 *
 * Only invalid requests and incomplete risk assessments reach the
 * submitter; the rest are recovered internally and recorded in the instance
 * error log.
 */

export type ErrorCode =
  | 'INCOMPLETE_RISK_ASSESSMENT'
  | 'HOOK_FAULT'
  | 'WORKER_STALL'
  | 'VERIFICATION_FAILURE'
  | 'BUDGET_EXCEEDED'
  | 'CONTEXT_PRESSURE'
  | 'INVALID_TRANSITION'
  | 'CONFIRMATION_REQUIRED'
  | 'CONFIRMATION_UNRESOLVED'
  | 'RESOURCE_OVERLAP'
  | 'RESOURCE_OWNERSHIP'
  | 'INVALID_REQUEST';

export class SwarmflowError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export const ASSESSMENT_FIELDS = [
  'failureScenario',
  'detectionSignal',
  'fastestRollback',
  'weakestAssumption'
] as const;

export type AssessmentField = typeof ASSESSMENT_FIELDS[number];

export class IncompleteRiskAssessmentError extends SwarmflowError {
  constructor(
    readonly tier: string,
    readonly missingFields: AssessmentField[]
  ) {
    super(
      'INCOMPLETE_RISK_ASSESSMENT',
      `Risk tier ${tier} requires answers for: ${missingFields.join(', ')}`
    );
  }
}

export class HookFaultError extends SwarmflowError {
  constructor(readonly hookId: string, message: string) {
    super('HOOK_FAULT', `Hook ${hookId} failed: ${message}`);
  }
}

export class WorkerStallError extends SwarmflowError {
  constructor(readonly workerId: string, readonly idleMs: number) {
    super('WORKER_STALL', `Worker ${workerId} made no progress for ${idleMs}ms`);
  }
}

export class VerificationFailureError extends SwarmflowError {
  constructor(readonly taskId: string, readonly detail: string) {
    super('VERIFICATION_FAILURE', `Task ${taskId} failed verification: ${detail}`);
  }
}

export class BudgetExceededError extends SwarmflowError {
  constructor(readonly requested: number, readonly ceiling: number) {
    super('BUDGET_EXCEEDED', `Wave of ${requested} workers exceeds ceiling ${ceiling}`);
  }
}

export class ContextPressureError extends SwarmflowError {
  constructor(readonly trigger: string) {
    super('CONTEXT_PRESSURE', `Context pressure threshold crossed: ${trigger}`);
  }
}

export class InvalidTransitionError extends SwarmflowError {
  constructor(message: string) {
    super('INVALID_TRANSITION', message);
  }
}

export class ConfirmationRequiredError extends SwarmflowError {
  constructor(readonly phase: string) {
    super('CONFIRMATION_REQUIRED', `Phase ${phase} contains T3 work and needs a recorded human confirmation`);
  }
}

export class ConfirmationUnresolvedError extends SwarmflowError {
  constructor(readonly phase: string, reason: string) {
    super('CONFIRMATION_UNRESOLVED', `Confirmation gate for phase ${phase} unresolved: ${reason}`);
  }
}

export class ResourceOverlapError extends SwarmflowError {
  constructor(readonly resource: string, readonly taskIds: [string, string]) {
    super(
      'RESOURCE_OVERLAP',
      `Resource ${resource} is claimed by both ${taskIds[0]} and ${taskIds[1]}`
    );
  }
}

export class ResourceOwnershipError extends SwarmflowError {
  constructor(readonly workerId: string, readonly resource: string) {
    super('RESOURCE_OWNERSHIP', `Worker ${workerId} does not own ${resource}`);
  }
}

export class InvalidRequestError extends SwarmflowError {
  constructor(message: string) {
    super('INVALID_REQUEST', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
