/**
 * LRU query cache with per-entry TTL.
 *
 * Reads move an entry to the most recently used end; a write at capacity
 * evicts the least recently used entry. An entry is live up to and
 * including its `expiresAt` instant.
 */

import type { DispatchResult } from '../../application/cqrs/IDispatchMiddleware';
import { systemClock, type IClock } from '../time';
import type { IQueryCache } from './IQueryCache';

interface CacheEntry {
  result: DispatchResult;
  expiresAt: number;
}

export interface QueryCacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
  hitRate: number;
}

export class InMemoryQueryCache implements IQueryCache {
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly clock: IClock = systemClock,
    private readonly capacity = 1000,
  ) {}

  async get(key: string): Promise<DispatchResult | undefined> {
    const entry = this.entries.get(key);

    if (!entry || this.isExpired(entry)) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);

    this.hits++;
    return entry.result;
  }

  async set(key: string, result: DispatchResult, ttlMs: number): Promise<void> {
    this.entries.delete(key);

    if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(key, { result, expiresAt: this.clock.now() + ttlMs });
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  async clearPattern(pattern: string): Promise<number> {
    const matcher = wildcardToRegExp(pattern);
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (matcher.test(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Drop expired entries.
   *
   * @returns number of entries removed
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  stats(): QueryCacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      capacity: this.capacity,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.clock.now() > entry.expiresAt;
  }
}

/**
 * `*` matches any run of characters; everything else is literal.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}$`);
}
