// src/workflow/planner.ts

/**
 * Default task planner.
 *
 * - single-owner phases get one task; read-only ones claim no resources
 *   and run at T0
 * - swarm phases get one task per directory of the file hints, or a single
 *   resource-less task without hints
 * - tasks deferred by the previous phase are carried over first and keep
 *   their resources
 */

import { moduleOf } from '../risk/index.js';
import { normalizeResource } from '../swarm/index.js';
import type { AgentTask } from '../swarm/index.js';
import type { PlanningContext, TaskPlanner } from './types.js';

export function groupByDirectory(fileHints: readonly string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const hint of fileHints) {
    const resource = normalizeResource(hint);
    const dir = moduleOf(resource);
    const group = groups.get(dir);
    if (group) {
      if (!group.includes(resource)) group.push(resource);
    } else {
      groups.set(dir, [resource]);
    }
  }
  return groups;
}

export const defaultPlanner: TaskPlanner = (context: PlanningContext): AgentTask[] => {
  const { phase, tier, description } = context;

  if (phase.ownership === 'single') {
    return [{
      id: `${phase.name}-1`,
      phase: phase.name,
      description,
      resources: phase.readOnly ? [] : [...new Set(context.fileHints.map(normalizeResource))],
      tier: phase.readOnly ? 'T0' : tier,
      critical: true
    }];
  }

  const carried: AgentTask[] = context.carried.map(task => ({ ...task, phase: phase.name }));
  const claimed = new Set(carried.flatMap(task => task.resources.map(normalizeResource)));

  const groups = groupByDirectory(context.fileHints);
  if (groups.size === 0) {
    return carried.length > 0 ? carried : [{
      id: `${phase.name}-1`,
      phase: phase.name,
      description,
      resources: [],
      tier,
      critical: true
    }];
  }

  const tasks: AgentTask[] = [...carried];
  let index = 0;
  for (const [dir, resources] of groups) {
    const free = resources.filter(resource => !claimed.has(resource));
    if (free.length === 0) continue;
    index++;
    tasks.push({
      id: `${phase.name}-${index}`,
      phase: phase.name,
      description: `${description} [${dir}]`,
      resources: free,
      tier,
      critical: true
    });
  }
  return tasks;
};
