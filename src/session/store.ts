// src/session/store.ts

/**
 * Session Store
 *
 * In-memory record of workflow instances, scores and risk tiers keyed by
 * request id. Lives for the session; `checkpoint` / `restore` persist it
 * to a JSON file only when the caller asks.
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { RiskTier } from '../types.js';
import { RiskLedger } from '../risk/index.js';
import { createComponentLogger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import { createSessionState, SessionState, applyStatePatch, StatePatch } from './state.js';

const log = createComponentLogger('session');

const CHECKPOINT_VERSION = 1;

const tierSchema = z.enum(['T0', 'T1', 'T2', 'T3']);

const transitionSchema = z.object({
  from: z.string(),
  to: z.string(),
  event: z.string(),
  phase: z.string().optional(),
  detail: z.string().optional(),
  at: z.number()
});

const recordSchema = z.object({
  requestId: z.string(),
  instanceId: z.string(),
  description: z.string(),
  plan: z.enum(['direct', 'standard', 'phased']),
  tier: tierSchema,
  scores: z.record(z.number()),
  aggregate: z.number(),
  status: z.enum(['NotStarted', 'Running', 'AllPhasesCompleted', 'AbortedFailed']),
  history: z.array(transitionSchema),
  createdAt: z.number(),
  updatedAt: z.number()
});

const checkpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  savedAt: z.number(),
  state: z.object({
    version: z.number().int().min(0),
    values: z.record(z.unknown())
  }),
  tiers: z.record(tierSchema),
  records: z.array(recordSchema)
});

export type SessionRecord = z.infer<typeof recordSchema>;
export type SessionCheckpoint = z.infer<typeof checkpointSchema>;

export class SessionStore {
  readonly ledger: RiskLedger;
  private records = new Map<string, SessionRecord>();
  private state: SessionState;

  constructor(initialState: SessionState = createSessionState(), ledger: RiskLedger = new RiskLedger()) {
    this.state = initialState;
    this.ledger = ledger;
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Applies a patch and returns the new state.
   */
  applyPatch(patch: StatePatch): SessionState {
    this.state = applyStatePatch(this.state, patch);
    return this.state;
  }

  create(record: Omit<SessionRecord, 'history' | 'createdAt' | 'updatedAt'>): SessionRecord {
    const now = Date.now();
    const created: SessionRecord = { ...record, history: [], createdAt: now, updatedAt: now };
    this.records.set(record.requestId, created);
    return created;
  }

  append(requestId: string, transition: SessionRecord['history'][number]): void {
    const record = this.records.get(requestId);
    if (!record) return;
    record.history.push(transition);
    record.updatedAt = Date.now();
  }

  update(requestId: string, changes: Partial<Pick<SessionRecord, 'status' | 'tier'>>): void {
    const record = this.records.get(requestId);
    if (!record) return;
    Object.assign(record, changes);
    record.updatedAt = Date.now();
  }

  get(requestId: string): SessionRecord | undefined {
    return this.records.get(requestId);
  }

  list(): SessionRecord[] {
    return [...this.records.values()].sort((a, b) => a.createdAt - b.createdAt);
  }

  clear(): void {
    this.records.clear();
    this.state = createSessionState();
  }

  /**
   * Writes the session to a JSON file. Creates the directory if needed.
   */
  checkpoint(filePath: string): boolean {
    const checkpoint: SessionCheckpoint = {
      version: CHECKPOINT_VERSION,
      savedAt: Date.now(),
      state: { version: this.state.version, values: { ...this.state.values } },
      tiers: this.ledger.snapshot(),
      records: this.list()
    };

    try {
      const dir = dirname(filePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      writeFileSync(filePath, JSON.stringify(checkpoint, null, 2), 'utf-8');
      log.debug({ filePath, records: checkpoint.records.length }, 'Session checkpoint written');
      return true;
    } catch (error) {
      log.error({ error: errorMessage(error), filePath }, 'Failed to write session checkpoint');
      return false;
    }
  }

  /**
   * Loads a checkpoint written by `checkpoint`. Tiers already in the ledger
   * never move down. Returns false when the file is missing or invalid.
   */
  restore(filePath: string): boolean {
    if (!existsSync(filePath)) {
      return false;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (error) {
      log.error({ error: errorMessage(error), filePath }, 'Failed to read session checkpoint');
      return false;
    }

    const parsed = checkpointSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ filePath, issue: parsed.error.issues[0]?.message }, 'Invalid session checkpoint');
      return false;
    }

    const checkpoint = parsed.data;
    this.state = { version: checkpoint.state.version, values: checkpoint.state.values };
    this.ledger.restore(checkpoint.tiers);
    for (const record of checkpoint.records) {
      this.records.set(record.requestId, record);
    }

    log.info({ filePath, records: checkpoint.records.length }, 'Session checkpoint restored');
    return true;
  }

  /**
   * Highest tier recorded for any key of a request.
   */
  tierFor(requestId: string): RiskTier | undefined {
    return this.ledger.get(requestId) ?? this.records.get(requestId)?.tier;
  }
}
