// src/risk/ledger.ts

/**
 * Session-scoped record of RiskTier decisions per task key.
 * Tiers only move up.
 */

import type { RiskTier } from '../types.js';
import { maxTier, tierRank } from '../types.js';
import { createComponentLogger } from '../utils/logger.js';
import type { RiskLedgerEntry } from './types.js';

const log = createComponentLogger('risk-ledger');

export class RiskLedger {
  private tiers = new Map<string, RiskTier>();
  private history: RiskLedgerEntry[] = [];

  /**
   * Records a classification result; the stored tier becomes the maximum
   * of the previous and the requested tier.
   */
  assign(key: string, tier: RiskTier): RiskTier {
    return this.record(key, tier, 'classification');
  }

  /**
   * Explicit re-classification to a higher tier.
   */
  escalate(key: string, tier: RiskTier, reason: string): RiskTier {
    return this.record(key, tier, 'escalation', reason);
  }

  get(key: string): RiskTier | undefined {
    return this.tiers.get(key);
  }

  entries(): readonly RiskLedgerEntry[] {
    return this.history;
  }

  snapshot(): Record<string, RiskTier> {
    return Object.fromEntries(this.tiers);
  }

  restore(tiers: Readonly<Record<string, RiskTier>>): void {
    for (const [key, tier] of Object.entries(tiers)) {
      this.record(key, tier, 'classification');
    }
  }

  private record(
    key: string,
    requested: RiskTier,
    source: RiskLedgerEntry['source'],
    reason?: string
  ): RiskTier {
    const previous = this.tiers.get(key);
    const effective = previous ? maxTier(previous, requested) : requested;

    if (previous && tierRank(requested) < tierRank(previous)) {
      log.info({ key, previous, requested }, 'Tier downgrade ignored');
    }

    this.tiers.set(key, effective);
    this.history.push({ key, requested, effective, source, reason, at: Date.now() });
    return effective;
  }
}
