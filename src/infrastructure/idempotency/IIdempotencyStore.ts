/**
 * Idempotency Store Port
 *
 * Storage contract of the idempotency guard. The guard serializes access
 * per key itself, so a store only needs plain get/set/delete semantics.
 * Implementations may live in memory, Redis, a SQL table, etc.
 *
 * @module infrastructure/idempotency/IIdempotencyStore
 */

import type { Result } from '../../domain/result';

/**
 * Marker written when an execution is admitted.
 */
export interface InFlightRecord {
  readonly status: 'in-flight';
  readonly key: string;
  readonly fingerprint?: string;
  readonly startedAt: number;

  /**
   * After this instant a marker with no live owner in this process is
   * considered abandoned.
   */
  readonly expiresAt: number;
}

/**
 * Stored outcome of a finished execution.
 */
export interface CompletedRecord {
  readonly status: 'completed';
  readonly key: string;
  readonly fingerprint?: string;
  readonly result: Result<unknown, Error>;
  readonly completedAt: number;
  readonly expiresAt: number;
}

export type IdempotencyRecord = InFlightRecord | CompletedRecord;

/**
 * IIdempotencyStore - keyed record storage.
 *
 * @example
 * ```typescript
 * class RedisIdempotencyStore implements IIdempotencyStore {
 *   async get(key: string) {
 *     const raw = await this.redis.get(key);
 *     return raw ? deserialize(raw) : undefined;
 *   }
 *   // ...
 * }
 * ```
 */
export interface IIdempotencyStore {
  /**
   * Read a record. Expired completed records are reported as absent.
   */
  get(key: string): Promise<IdempotencyRecord | undefined>;

  set(record: IdempotencyRecord): Promise<void>;

  delete(key: string): Promise<void>;

  clear(): Promise<void>;
}
