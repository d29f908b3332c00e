// src/config.ts

import { z } from 'zod';

const conservationSchema = z.object({
  /** Waves run by one coordinator before conservation mode kicks in */
  maxIterations: z.number().int().positive().default(12),
  /** Total workers spawned (primary, replacement and fix) */
  maxSpawnedWorkers: z.number().int().positive().default(60),
  /** Accumulated worker log volume in bytes */
  maxLogBytes: z.number().int().positive().default(262144),
  /** Concurrency ceiling while conserving */
  ceiling: z.number().int().positive().default(5),
  /** Max characters kept per worker summary while conserving */
  summaryLimit: z.number().int().positive().default(240)
});

const swarmSchema = z.object({
  maxConcurrentWorkers: z.number().int().positive().default(20),
  stallGraceMs: z.number().int().positive().default(120000),
  stallCheckIntervalMs: z.number().int().positive().default(1000),
  /** Fix workers per task before escalation */
  maxFixAttempts: z.number().int().min(0).default(1),
  conservation: conservationSchema.default({})
});

const hookSchema = z.object({
  budgets: z.object({
    onRequestSubmit: z.number().int().positive().default(500),
    onResourceMutated: z.number().int().positive().default(100),
    onWorkflowStop: z.number().int().positive().default(5000)
  }).default({}),
  defaultTimeoutMs: z.number().int().positive().default(1000)
});

const weightsSchema = z.object({
  technicalComplexity: z.number().min(0).default(0.25),
  scope: z.number().min(0).default(0.15),
  risk: z.number().min(0).default(0.2),
  contextLoad: z.number().min(0).default(0.1),
  timePressure: z.number().min(0).default(0.05),
  minimalism: z.number().min(0).default(0.05),
  security: z.number().min(0).default(0.15),
  reusability: z.number().min(0).default(0.05)
});

const decisionSchema = z.object({
  /** Context-load score at which phase-based execution is forced */
  contextCeiling: z.number().min(1).max(10).default(8),
  directMaxAggregate: z.number().min(1).max(10).default(3.5),
  directMaxContext: z.number().min(1).max(10).default(4),
  phasedMinAggregate: z.number().min(1).max(10).default(6.5),
  phasedMinComplexity: z.number().min(1).max(10).default(7),
  weights: weightsSchema.default({}),
  memoSize: z.number().int().positive().default(256)
});

const workflowSchema = z.object({
  maxRecoveryAttempts: z.number().int().min(0).default(2),
  confirmationTimeoutMs: z.number().int().positive().default(900000),
  maxDescriptionLength: z.number().int().positive().default(10000),
  /** Terminal instance snapshots kept for lookup after the instance is released */
  archivedInstances: z.number().int().positive().default(100)
});

export const configSchema = z.object({
  swarm: swarmSchema.default({}),
  hooks: hookSchema.default({}),
  decision: decisionSchema.default({}),
  workflow: workflowSchema.default({}),
  /** YAML file with keyword tables; the bundled rules are used when unset */
  rulesFile: z.string().optional()
});

export type EngineConfig = z.output<typeof configSchema>;
export type ConfigOverrides = z.input<typeof configSchema>;
export type DimensionWeights = EngineConfig['decision']['weights'];

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseInt(raw, 10);
  return isNaN(value) ? undefined : value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value)
      ? deepMerge(current, value)
      : value;
  }
  return merged;
}

function environmentOverrides(): ConfigOverrides {
  return {
    swarm: {
      stallGraceMs: envInt('SWARMFLOW_STALL_GRACE_MS'),
      maxConcurrentWorkers: envInt('SWARMFLOW_MAX_CONCURRENT_WORKERS')
    },
    decision: {
      contextCeiling: envInt('SWARMFLOW_CONTEXT_CEILING')
    },
    rulesFile: process.env.SWARMFLOW_RULES_FILE || undefined
  };
}

/**
 * Builds a validated configuration: schema defaults, then environment,
 * then explicit overrides.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): EngineConfig {
  const merged = deepMerge(
    deepMerge({}, { ...environmentOverrides() }),
    { ...overrides }
  );
  return configSchema.parse(merged);
}

export const config: EngineConfig = resolveConfig();
