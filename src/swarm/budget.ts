// src/swarm/budget.ts

/**
 * Wave planning under a concurrency ceiling.
 *
 * When a phase asks for more workers than the ceiling allows, reductions
 * apply in order until the plan fits:
 *   1. merge tasks whose resources share a top-level directory
 *   2. defer non-critical tasks to a later phase
 *   3. split the rest into sequential waves
 *
 * While conserving, related tasks merge even under the ceiling and what
 * remains is packed into at most one wave of larger workers.
 */

import { maxTier } from '../types.js';
import { relatedGroup } from './partition.js';
import type { AgentTask, BudgetStrategy } from './types.js';

export interface WavePlanOptions {
  ceiling: number;
  /** A later phase exists that can take deferred tasks */
  allowDefer: boolean;
  /** Merge related tasks even when under the ceiling, then pack into one wave */
  alwaysMerge: boolean;
}

export interface WavePlan {
  waves: AgentTask[][];
  /** Original tasks moved out of this phase */
  deferred: AgentTask[];
  strategies: BudgetStrategy[];
  requested: number;
}

export function mergeTasks(tasks: readonly AgentTask[]): AgentTask {
  const ids = tasks.flatMap(task => task.mergedFrom ?? [task.id]);
  return {
    id: `merged:${ids.join('+')}`,
    phase: tasks[0].phase,
    description: tasks.map(task => task.description).join('; '),
    resources: tasks.flatMap(task => task.resources),
    tier: tasks.map(task => task.tier).reduce(maxTier),
    critical: tasks.some(task => task.critical),
    mergedFrom: ids
  };
}

/**
 * Merges tasks in the same related group, keeping first-seen order.
 */
export function mergeRelated(tasks: readonly AgentTask[]): AgentTask[] {
  const groups = new Map<string, AgentTask[]>();
  const order: Array<string | AgentTask> = [];

  for (const task of tasks) {
    if (task.resources.length === 0) {
      order.push(task);
      continue;
    }
    const key = relatedGroup(task.resources[0]);
    const group = groups.get(key);
    if (group) {
      group.push(task);
    } else {
      groups.set(key, [task]);
      order.push(key);
    }
  }

  return order.map(entry => {
    if (typeof entry !== 'string') return entry;
    const group = groups.get(entry) ?? [];
    return group.length === 1 ? group[0] : mergeTasks(group);
  });
}

/**
 * Packs units into at most `ceiling` workers, keeping their order.
 */
export function packUnits(units: readonly AgentTask[], ceiling: number): AgentTask[] {
  if (units.length <= ceiling) return [...units];
  const size = Math.ceil(units.length / ceiling);
  const packed: AgentTask[] = [];
  for (let i = 0; i < units.length; i += size) {
    const chunk = units.slice(i, i + size);
    packed.push(chunk.length === 1 ? chunk[0] : mergeTasks(chunk));
  }
  return packed;
}

function expand(unit: AgentTask, originals: ReadonlyMap<string, AgentTask>): AgentTask[] {
  if (!unit.mergedFrom) return [unit];
  return unit.mergedFrom
    .map(id => originals.get(id))
    .filter((task): task is AgentTask => task !== undefined);
}

export function planWaves(tasks: readonly AgentTask[], options: WavePlanOptions): WavePlan {
  const ceiling = Math.max(1, options.ceiling);
  const strategies: BudgetStrategy[] = [];
  const originals = new Map(tasks.map(task => [task.id, task]));

  // critical work first so early completion can cut the tail
  let units = [...tasks].sort((a, b) => Number(b.critical) - Number(a.critical));

  if (units.length > ceiling || options.alwaysMerge) {
    let merged = mergeRelated(units);
    if (options.alwaysMerge) merged = packUnits(merged, ceiling);
    if (merged.length < units.length) strategies.push('merge');
    units = merged;
  }

  const deferred: AgentTask[] = [];
  if (units.length > ceiling && options.allowDefer) {
    const kept: AgentTask[] = [];
    let excess = units.length - ceiling;
    for (let i = units.length - 1; i >= 0; i--) {
      if (excess > 0 && !units[i].critical) {
        deferred.unshift(...expand(units[i], originals));
        excess--;
      } else {
        kept.unshift(units[i]);
      }
    }
    if (deferred.length > 0) strategies.push('defer');
    units = kept;
  }

  const waves: AgentTask[][] = [];
  for (let i = 0; i < units.length; i += ceiling) {
    waves.push(units.slice(i, i + ceiling));
  }
  if (waves.length > 1) strategies.push('batch');

  return { waves, deferred, strategies, requested: tasks.length };
}
