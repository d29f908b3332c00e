// src/utils/cache.ts

import { LRUCache } from 'lru-cache';
import crypto from 'crypto';
import { logger } from './logger.js';

/**
 * JSON with object keys sorted, so equal values give equal strings.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function generateCacheKey(content: unknown): string {
  return crypto.createHash('sha256').update(canonicalJson(content)).digest('hex').substring(0, 16);
}

/**
 * Bounded memo keyed by the canonical form of its input.
 */
export class Memo<V extends {}> {
  private cache: LRUCache<string, V>;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly name: string,
    private readonly maxSize: number
  ) {
    this.cache = new LRUCache<string, V>({ max: maxSize });
  }

  get(input: unknown): V | undefined {
    const key = generateCacheKey(input);
    const entry = this.cache.get(key);
    if (entry !== undefined) {
      this.hits++;
      logger.debug({ memo: this.name, cacheKey: key }, 'Cache hit');
    } else {
      this.misses++;
    }
    return entry;
  }

  set(input: unknown, value: V): void {
    this.cache.set(generateCacheKey(input), value);
  }

  clear(): void {
    this.cache.clear();
    logger.debug({ memo: this.name }, 'Cache cleared');
  }

  getStats() {
    return {
      size: this.cache.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses
    };
  }
}
