/**
 * In-memory idempotency store with clock-driven expiry.
 */

import { systemClock, type IClock } from '../time';
import type { IIdempotencyStore, IdempotencyRecord } from './IIdempotencyStore';

export class InMemoryIdempotencyStore implements IIdempotencyStore {
  private readonly records = new Map<string, IdempotencyRecord>();

  constructor(private readonly clock: IClock = systemClock) {}

  async get(key: string): Promise<IdempotencyRecord | undefined> {
    const record = this.records.get(key);
    if (!record) {
      return undefined;
    }
    if (record.status === 'completed' && this.isExpired(record)) {
      this.records.delete(key);
      return undefined;
    }
    return record;
  }

  async set(record: IdempotencyRecord): Promise<void> {
    this.records.set(record.key, record);
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key);
  }

  async clear(): Promise<void> {
    this.records.clear();
  }

  /**
   * Drop expired completed records.
   *
   * @returns Number of records removed
   */
  prune(): number {
    let removed = 0;
    for (const [key, record] of this.records) {
      if (record.status === 'completed' && this.isExpired(record)) {
        this.records.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.records.size;
  }

  private isExpired(record: IdempotencyRecord): boolean {
    return this.clock.now() > record.expiresAt;
  }
}
