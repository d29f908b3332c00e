import { resolveConfig } from '../../config.js';
import type { ConfigOverrides } from '../../config.js';
import type { PhaseDefinition } from '../../decision/index.js';
import type { AgentTask, SwarmConfig } from '../types.js';

export const executePhase: PhaseDefinition = {
  name: 'execute',
  ownership: 'swarm',
  verification: 'basic',
  readOnly: false
};

export function task(id: string, resources: string[], overrides: Partial<AgentTask> = {}): AgentTask {
  return {
    id,
    phase: 'execute',
    description: `work on ${id}`,
    resources,
    tier: 'T0',
    critical: false,
    ...overrides
  };
}

export function swarmConfig(overrides: NonNullable<ConfigOverrides['swarm']> = {}): SwarmConfig {
  return resolveConfig({ swarm: overrides }).swarm;
}

/**
 * Small deterministic PRNG for generated task sets.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
