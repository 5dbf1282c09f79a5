/**
 * services/cache-service.ts — Single-entry TTL cache
 *
 * Holds one { value, timestamp } entry. A read inside the TTL window returns
 * the entry; a read after expiry runs the loader and swaps the entry in only
 * once the loader resolves, so readers never see a half-built value.
 * Concurrent misses share the in-flight load.
 */
import { cacheOperations } from '../shared/metrics.ts';

export interface CacheEntry<T> {
  value: T;
  timestamp: number;
}

export interface CacheRead<T> {
  value: T;
  hit: boolean;
}

export type Clock = () => number;

export class TtlCache<T> {
  private entry: CacheEntry<T> | null = null;
  private inflight: Promise<T> | null = null;
  private generation = 0;
  readonly ttlMs: number;
  readonly now: Clock;

  constructor(ttlMs: number, now: Clock = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  /** Fresh entry, or null when empty or expired. */
  peek(): CacheEntry<T> | null {
    if (!this.entry) return null;
    if (this.now() - this.entry.timestamp >= this.ttlMs) return null;
    return this.entry;
  }

  async getOrLoad(loader: () => Promise<T>): Promise<CacheRead<T>> {
    const fresh = this.peek();
    if (fresh) {
      cacheOperations.inc({ operation: 'hit' });
      return { value: fresh.value, hit: true };
    }

    if (this.inflight) {
      cacheOperations.inc({ operation: 'coalesced' });
      return { value: await this.inflight, hit: false };
    }

    cacheOperations.inc({ operation: 'miss' });
    // Expired values are not served while (or after) a refresh fails.
    this.entry = null;
    const generation = this.generation;
    const pending = loader();
    this.inflight = pending;
    try {
      const value = await pending;
      if (generation === this.generation) this.entry = { value, timestamp: this.now() };
      return { value, hit: false };
    } finally {
      if (this.inflight === pending) this.inflight = null;
    }
  }

  invalidate(): void {
    cacheOperations.inc({ operation: 'invalidate' });
    // A load already running finishes for its callers but is not stored.
    this.generation += 1;
    this.entry = null;
    this.inflight = null;
  }

  get refreshing(): boolean {
    return this.inflight !== null;
  }
}
