import { fingerprint } from '../../shared/crypto';
import { ResearchResultSchema, type ResearchResult } from '../../shared/types';
import type { Logger } from '../obs/logger';

interface CacheEntry {
  /** The exact key material, checked on read so a hash collision reads as a miss. */
  material: string;
  result: ResearchResult;
  expiresAt: number;
}

export interface ResultCacheOptions {
  ttlMs: number;
  maxEntries?: number;
  logger?: Logger;
}

const SWEEP_EVERY = 50;

export const cacheKeyMaterial = (topic: string, sources: readonly string[]): string =>
  JSON.stringify([topic, [...sources].sort()]);

export const cacheKey = (topic: string, sources: readonly string[]): string =>
  fingerprint(cacheKeyMaterial(topic, sources));

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly logger?: Logger;
  private sweepCounter = 0;

  constructor(options: ResultCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries ?? 500;
    this.logger = options.logger;
  }

  get size(): number {
    return this.entries.size;
  }

  get(topic: string, sources: readonly string[]): ResearchResult | null {
    const now = Date.now();
    this.sweep(now);
    const material = cacheKeyMaterial(topic, sources);
    const key = fingerprint(material);
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= now) {
      this.entries.delete(key);
      return null;
    }
    if (entry.material !== material) {
      this.evictCorrupt(key, 'key material mismatch');
      return null;
    }
    const parsed = ResearchResultSchema.safeParse(entry.result);
    if (!parsed.success) {
      this.evictCorrupt(key, parsed.error.message);
      return null;
    }
    return structuredClone(parsed.data);
  }

  set(topic: string, sources: readonly string[], result: ResearchResult, ttlMs: number = this.ttlMs): void {
    if (ttlMs <= 0) {
      return;
    }
    const material = cacheKeyMaterial(topic, sources);
    const key = fingerprint(material);
    // Re-inserting moves the key to the back of the eviction order.
    this.entries.delete(key);
    this.entries.set(key, { material, result: structuredClone(result), expiresAt: Date.now() + ttlMs });
    while (this.entries.size > this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey === undefined) break;
      this.entries.delete(oldestKey);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  private evictCorrupt(key: string, reason: string) {
    this.entries.delete(key);
    this.logger?.warn('Discarding corrupt cache entry', { key, reason });
  }

  private sweep(now: number) {
    this.sweepCounter += 1;
    if (this.sweepCounter % SWEEP_EVERY !== 0) {
      return;
    }
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}
