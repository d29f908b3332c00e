// src/hooks/manager.ts

/**
 * Hook Manager
 *
 * Per-point registry and dispatcher. Hooks run one after another in
 * priority order; every run is wrapped in a timeout and isolated, so a
 * failing hook never stops its siblings.
 *
 * Budgets:
 * - onRequestSubmit and onWorkflowStop share an aggregate budget per
 *   dispatch; once spent, remaining hooks report `skipped`. Blocking Stop
 *   hooks still run.
 * - onResourceMutated caps every single hook call.
 */

import { config as defaultConfig, EngineConfig } from '../config.js';
import { HookFaultError, InvalidRequestError, errorMessage } from '../errors.js';
import { applyStatePatch, mergePatches, StatePatch } from '../session/state.js';
import { createComponentLogger } from '../utils/logger.js';
import {
  DispatchReport,
  HookContextMap,
  HookDefinition,
  HookOutput,
  HookResult,
  HookStats,
  LifecyclePoint,
  LIFECYCLE_POINTS
} from './types.js';

const log = createComponentLogger('hooks');

type HookConfig = EngineConfig['hooks'];

interface RegisteredHook<P extends LifecyclePoint> {
  definition: HookDefinition<P>;
  sequence: number;
}

type HookTable = { [K in LifecyclePoint]: RegisteredHook<K>[] };

const BUDGET_MODE: Record<LifecyclePoint, 'aggregate' | 'per-call'> = {
  onRequestSubmit: 'aggregate',
  onResourceMutated: 'per-call',
  onWorkflowStop: 'aggregate'
};

class HookTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
  }
}

async function runWithTimeout(
  run: (signal: AbortSignal) => HookOutput | Promise<HookOutput>,
  timeoutMs: number
): Promise<HookOutput> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new HookTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      Promise.resolve().then(() => run(controller.signal)),
      timeout
    ]);
  } finally {
    clearTimeout(timer);
  }
}

function isStopRefusal(result: HookResult): boolean {
  return result.payload?.kind === 'stop-gate' && !result.payload.allowStop;
}

export class HookManager {
  private hooks: HookTable = {
    onRequestSubmit: [],
    onResourceMutated: [],
    onWorkflowStop: []
  };
  private stats = new Map<string, HookStats>();
  private sequence = 0;

  constructor(private readonly config: HookConfig = defaultConfig.hooks) {}

  register<P extends LifecyclePoint>(point: P, hook: HookDefinition<P>): void {
    if (this.stats.has(hook.id)) {
      throw new InvalidRequestError(`Hook already registered: ${hook.id}`);
    }
    if (hook.blocking && point !== 'onWorkflowStop') {
      log.warn({ hookId: hook.id, point }, 'Blocking flag only applies at onWorkflowStop');
    }

    this.hooks[point].push({ definition: hook, sequence: this.sequence++ });
    this.stats.set(hook.id, {
      hookId: hook.id,
      name: hook.name,
      point,
      priority: hook.priority,
      enabled: hook.enabled !== false,
      blocking: point === 'onWorkflowStop' && hook.blocking === true,
      calls: 0,
      failures: 0,
      timeouts: 0,
      skipped: 0,
      totalDurationMs: 0
    });

    log.debug({ hookId: hook.id, point, priority: hook.priority }, 'Hook registered');
  }

  unregister(hookId: string): boolean {
    const stats = this.stats.get(hookId);
    if (!stats) return false;
    this.remove(stats.point, hookId);
    this.stats.delete(hookId);
    return true;
  }

  setEnabled(hookId: string, enabled: boolean): boolean {
    const stats = this.stats.get(hookId);
    if (!stats) return false;
    stats.enabled = enabled;
    return true;
  }

  /**
   * Enabled hooks at a point, in execution order.
   */
  list<P extends LifecyclePoint>(point: P): HookDefinition<P>[] {
    return this.ordered(point).map(entry => entry.definition);
  }

  getStats(): HookStats[] {
    return LIFECYCLE_POINTS.flatMap(point =>
      this.hooks[point]
        .map(entry => this.stats.get(entry.definition.id))
        .filter((stats): stats is HookStats => stats !== undefined)
    );
  }

  async dispatch<P extends LifecyclePoint>(point: P, context: HookContextMap[P]): Promise<DispatchReport> {
    const budgetMs = this.config.budgets[point];
    const mode = BUDGET_MODE[point];
    const startedAt = Date.now();
    const results: HookResult[] = [];

    for (const entry of this.ordered(point)) {
      const hook = entry.definition;
      const blocking = point === 'onWorkflowStop' && hook.blocking === true;
      const declared = hook.timeoutMs ?? this.config.defaultTimeoutMs;

      let timeoutMs = Math.min(declared, budgetMs);
      if (mode === 'aggregate') {
        const remaining = budgetMs - (Date.now() - startedAt);
        if (remaining <= 0 && !blocking) {
          results.push(this.record(this.skipped(point, hook, 'Lifecycle budget exhausted')));
          continue;
        }
        timeoutMs = blocking ? declared : Math.min(declared, remaining);
      }

      results.push(this.record(await this.execute(point, hook, context, timeoutMs, blocking)));
    }

    const statePatch = mergePatches(
      results
        .map(result => result.statePatch)
        .filter((patch): patch is StatePatch => patch !== undefined)
    );

    const blocked = results.filter(result =>
      result.blocking && (result.status === 'failed' || result.status === 'timeout' || isStopRefusal(result))
    );
    const warnings = blocked.flatMap(result => {
      if (result.payload?.kind === 'stop-gate' && result.payload.warnings.length > 0) {
        return result.payload.warnings;
      }
      return [result.display ?? result.error ?? `Hook ${result.hookId} refused to stop`];
    });

    if (blocked.length > 0) {
      log.warn({ point, blocked: blocked.map(result => result.hookId) }, 'Blocking hook halted completion');
    }

    return {
      point,
      results,
      statePatch,
      state: applyStatePatch(context.state, statePatch),
      blocked,
      warnings
    };
  }

  private ordered<P extends LifecyclePoint>(point: P): RegisteredHook<P>[] {
    const table: RegisteredHook<P>[] = this.hooks[point];
    return table
      .filter(entry => this.stats.get(entry.definition.id)?.enabled !== false)
      .sort((a, b) => a.definition.priority - b.definition.priority || a.sequence - b.sequence);
  }

  private remove<P extends LifecyclePoint>(point: P, hookId: string): void {
    const table: RegisteredHook<P>[] = this.hooks[point];
    const index = table.findIndex(entry => entry.definition.id === hookId);
    if (index >= 0) table.splice(index, 1);
  }

  private async execute<P extends LifecyclePoint>(
    point: P,
    hook: HookDefinition<P>,
    context: HookContextMap[P],
    timeoutMs: number,
    blocking: boolean
  ): Promise<HookResult> {
    const startedAt = Date.now();
    const base = { hookId: hook.id, point, priority: hook.priority, blocking };

    try {
      if (hook.shouldRun && !hook.shouldRun(context)) {
        return { ...base, status: 'skipped', durationMs: Date.now() - startedAt };
      }

      const output = await runWithTimeout(signal => hook.run(context, signal), timeoutMs);
      log.debug({ hookId: hook.id, point }, 'Hook completed');
      return {
        ...base,
        status: 'success',
        payload: output.payload,
        display: output.display,
        statePatch: output.statePatch,
        durationMs: Date.now() - startedAt
      };
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      if (error instanceof HookTimeoutError) {
        log.warn({ hookId: hook.id, point, timeoutMs }, 'Hook timed out');
        return { ...base, status: 'timeout', durationMs, error: error.message };
      }
      const fault = new HookFaultError(hook.id, errorMessage(error));
      log.warn({ hookId: hook.id, point, error: fault.message }, 'Hook failed');
      return { ...base, status: 'failed', durationMs, error: fault.message };
    }
  }

  private skipped<P extends LifecyclePoint>(point: P, hook: HookDefinition<P>, reason: string): HookResult {
    return {
      hookId: hook.id,
      point,
      priority: hook.priority,
      status: 'skipped',
      durationMs: 0,
      error: reason,
      blocking: false
    };
  }

  private record(result: HookResult): HookResult {
    const stats = this.stats.get(result.hookId);
    if (stats) {
      stats.calls++;
      stats.totalDurationMs += result.durationMs;
      stats.lastStatus = result.status;
      if (result.status === 'failed') stats.failures++;
      if (result.status === 'timeout') stats.timeouts++;
      if (result.status === 'skipped') stats.skipped++;
    }
    return result;
  }
}
