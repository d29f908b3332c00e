// src/swarm/conservation.ts

/**
 * Tracks context pressure for one coordinator. Crossing any threshold
 * switches conservation mode on for the rest of the run.
 */

import { ContextPressureError } from '../errors.js';
import { createComponentLogger } from '../utils/logger.js';
import type { SwarmConfig } from './types.js';

const log = createComponentLogger('swarm:conservation');

type ConservationConfig = SwarmConfig['conservation'];

export class ConservationTracker {
  private iterations = 0;
  private spawned = 0;
  private logBytes = 0;
  private trigger: string | null = null;

  constructor(private readonly config: ConservationConfig) {}

  get active(): boolean {
    return this.trigger !== null;
  }

  get ceiling(): number {
    return this.config.ceiling;
  }

  /**
   * Counts a wave. Returns the trigger when this call entered conservation.
   */
  recordIteration(): string | null {
    this.iterations++;
    return this.check();
  }

  recordSpawn(): string | null {
    this.spawned++;
    return this.check();
  }

  recordLog(text: string): string | null {
    this.logBytes += Buffer.byteLength(text, 'utf-8');
    return this.check();
  }

  /**
   * Summary as kept by the coordinator: truncated while conserving.
   */
  compress(summary: string): string {
    if (!this.active || summary.length <= this.config.summaryLimit) return summary;
    return `${summary.slice(0, this.config.summaryLimit - 3)}...`;
  }

  getStats() {
    return {
      iterations: this.iterations,
      spawned: this.spawned,
      logBytes: this.logBytes,
      conservation: this.active,
      trigger: this.trigger
    };
  }

  private check(): string | null {
    if (this.trigger !== null) return null;

    let trigger: string | null = null;
    if (this.iterations >= this.config.maxIterations) {
      trigger = `iterations=${this.iterations}`;
    } else if (this.spawned >= this.config.maxSpawnedWorkers) {
      trigger = `spawnedWorkers=${this.spawned}`;
    } else if (this.logBytes >= this.config.maxLogBytes) {
      trigger = `logBytes=${this.logBytes}`;
    }

    if (trigger !== null) {
      this.trigger = trigger;
      log.warn({ error: new ContextPressureError(trigger).message }, 'Entering conservation mode');
    }
    return trigger;
  }
}
