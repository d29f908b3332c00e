// src/swarm/worker.ts

/**
 * One worker attempt at one AgentTask.
 *
 * The attempt settles on the first of: the executor returning, the
 * executor failing, or the coordinator declaring a stall. A stalled
 * attempt is aborted best-effort and its later writes are rejected.
 */

import { ResourceOwnershipError, errorMessage } from '../errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { normalizeResource, ownsResource } from './partition.js';
import type {
  WorkerAssignment,
  WorkerExecutor,
  WorkerHandle,
  WorkerReport,
  WorkerState
} from './types.js';

const log = createComponentLogger('swarm:worker');

export type AttemptResult =
  | { kind: 'completed'; report: WorkerReport }
  | { kind: 'failed'; error: string }
  | { kind: 'stalled'; idleMs: number };

export interface WorkerCallbacks {
  onProgress(run: WorkerRun, message?: string): void;
  onMutation(run: WorkerRun, resource: string): Promise<void>;
  onLog(run: WorkerRun, message: string): void;
}

export class WorkerRun {
  readonly modified = new Set<string>();
  private readonly controller = new AbortController();
  private lastProgressAt: number;
  private resolveStall: ((result: AttemptResult) => void) | null = null;
  private _state: WorkerState = 'running';
  private _superseded = false;

  constructor(
    readonly assignment: WorkerAssignment,
    private readonly callbacks: WorkerCallbacks
  ) {
    this.lastProgressAt = Date.now();
  }

  get workerId(): string {
    return this.assignment.workerId;
  }

  get taskId(): string {
    return this.assignment.task.id;
  }

  get state(): WorkerState {
    return this._state;
  }

  get superseded(): boolean {
    return this._superseded;
  }

  idleMs(now: number = Date.now()): number {
    return now - this.lastProgressAt;
  }

  start(executor: WorkerExecutor): Promise<AttemptResult> {
    const stalled = new Promise<AttemptResult>(resolve => {
      this.resolveStall = resolve;
    });

    const running = Promise.resolve()
      .then(() => executor(this.assignment, this.handle()))
      .then(
        (report): AttemptResult => report.success === false
          ? { kind: 'failed', error: report.error ?? report.summary }
          : { kind: 'completed', report },
        (error: unknown): AttemptResult => ({ kind: 'failed', error: errorMessage(error) })
      );

    return Promise.race([running, stalled]).then(result => {
      if (this._state === 'running') {
        this._state = result.kind;
      }
      this.resolveStall = null;
      return result;
    });
  }

  /**
   * Declares the attempt stalled. No-op once it has settled.
   */
  markStalled(now: number = Date.now()): boolean {
    if (this._state !== 'running' || !this.resolveStall) return false;
    const idleMs = this.idleMs(now);
    this._superseded = true;
    this._state = 'stalled';
    this.controller.abort();
    this.resolveStall({ kind: 'stalled', idleMs });
    return true;
  }

  /**
   * Best-effort shutdown; does not wait for the executor.
   */
  cancel(): void {
    if (this._state !== 'running') return;
    this._superseded = true;
    this._state = 'cancelled';
    this.controller.abort();
    this.resolveStall?.({ kind: 'failed', error: 'Cancelled' });
  }

  private handle(): WorkerHandle {
    return {
      workerId: this.workerId,
      signal: this.controller.signal,
      reportProgress: (message?: string) => {
        if (this._superseded) return;
        this.lastProgressAt = Date.now();
        this.callbacks.onProgress(this, message);
      },
      recordMutation: async (resource: string) => {
        if (this._superseded || !ownsResource(this.assignment.task, resource)) {
          log.warn({ workerId: this.workerId, resource }, 'Mutation outside owned resources rejected');
          throw new ResourceOwnershipError(this.workerId, resource);
        }
        this.lastProgressAt = Date.now();
        this.modified.add(normalizeResource(resource));
        await this.callbacks.onMutation(this, resource);
      },
      log: (message: string) => {
        if (this._superseded) return;
        this.callbacks.onLog(this, message);
      }
    };
  }
}
