// src/swarm/partition.ts

/**
 * Resource partitioning helpers. Sibling tasks must own disjoint resource
 * sets; an overlap is a planning bug and is rejected before any worker
 * starts.
 */

import { posix } from 'node:path';
import { ResourceOverlapError } from '../errors.js';
import type { AgentTask } from './types.js';

export function normalizeResource(resource: string): string {
  const normalized = posix.normalize(resource.trim().replace(/\\/g, '/'));
  return normalized.startsWith('./') ? normalized.slice(2) : normalized;
}

/**
 * Top-level directory of a resource; related resources share it.
 */
export function relatedGroup(resource: string): string {
  const normalized = normalizeResource(resource);
  const slash = normalized.indexOf('/');
  return slash > 0 ? normalized.slice(0, slash) : '.';
}

/**
 * @throws ResourceOverlapError on the first resource claimed twice
 */
export function assertDisjoint(tasks: readonly AgentTask[]): void {
  const owners = new Map<string, string>();
  for (const task of tasks) {
    for (const resource of new Set(task.resources.map(normalizeResource))) {
      const owner = owners.get(resource);
      if (owner !== undefined && owner !== task.id) {
        throw new ResourceOverlapError(resource, [owner, task.id]);
      }
      owners.set(resource, task.id);
    }
  }
}

export function isDisjoint(tasks: readonly AgentTask[]): boolean {
  try {
    assertDisjoint(tasks);
    return true;
  } catch (error) {
    if (error instanceof ResourceOverlapError) return false;
    throw error;
  }
}

export function ownsResource(task: AgentTask, resource: string): boolean {
  const target = normalizeResource(resource);
  return task.resources.some(owned => normalizeResource(owned) === target);
}
