/**
 * Idempotency Guard
 *
 * Guarantees at most one effective execution per idempotency key while
 * the key's record is alive.
 *
 * ```
 *   begin(key) ──► absent / expired ──► write InFlight ──► Admitted
 *              ├─► Completed        ──────────────────────► Duplicate(result)
 *              ├─► InFlight         ──────────────────────► InFlight(completion)
 *              └─► fingerprint differs ───────────────────► Conflict
 *
 *   complete(key, result, ttl) ──► Completed, waiters get `result`
 *   release(key)               ──► marker dropped, waiters retry `begin`
 * ```
 *
 * Each of `begin`, `complete` and `release` runs under a per-key mutex, so
 * the check-and-mark in `begin` is one critical section and two callers can
 * never both be admitted for the same key.
 *
 * @module infrastructure/idempotency/IdempotencyGuard
 */

import { ConflictError } from '../../domain/errors';
import type { Result } from '../../domain/result';
import { noopLogger, type ILogger } from '../../application/logging';
import { KeyedMutex } from '../concurrency';
import { systemClock, type IClock } from '../time';
import type { IIdempotencyStore, IdempotencyRecord } from './IIdempotencyStore';

/**
 * How an in-flight execution ended, as seen by a waiter.
 */
export type Completion =
  | { readonly kind: 'completed'; readonly result: Result<unknown, Error> }
  | { readonly kind: 'released' };

export type BeginOutcome =
  | { readonly kind: 'admitted' }
  | { readonly kind: 'duplicate'; readonly result: Result<unknown, Error> }
  | { readonly kind: 'in-flight'; readonly completion: Promise<Completion> }
  | { readonly kind: 'conflict'; readonly error: ConflictError };

export interface IdempotencyGuardDependencies {
  clock?: IClock;
  logger?: ILogger;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export class IdempotencyGuard {
  private readonly mutex = new KeyedMutex();
  private readonly owners = new Map<string, Deferred<Completion>>();
  private readonly clock: IClock;
  private readonly logger: ILogger;

  /**
   * @param inFlightTtl - How long a marker without a live owner in this
   *   process is honoured before it is treated as abandoned
   */
  constructor(
    private readonly store: IIdempotencyStore,
    private readonly inFlightTtl: number,
    dependencies: IdempotencyGuardDependencies = {},
  ) {
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? noopLogger;
  }

  begin(key: string, fingerprint?: string): Promise<BeginOutcome> {
    return this.mutex.runExclusive(key, async (): Promise<BeginOutcome> => {
      const record = await this.store.get(key);

      if (record && this.isLive(record)) {
        if (this.fingerprintDiffers(record, fingerprint)) {
          return { kind: 'conflict', error: new ConflictError(key, 'payload-mismatch') };
        }
        if (record.status === 'completed') {
          return { kind: 'duplicate', result: record.result };
        }

        const owner = this.owners.get(key);
        if (owner) {
          return { kind: 'in-flight', completion: owner.promise };
        }
        // Marker written by another guard instance sharing the store.
        return { kind: 'conflict', error: new ConflictError(key, 'in-flight') };
      }

      if (this.owners.has(key)) {
        // The store lost a marker we still own; let its waiters start over.
        this.settle(key, { kind: 'released' });
      }

      const now = this.clock.now();
      await this.store.set({
        status: 'in-flight',
        key,
        fingerprint,
        startedAt: now,
        expiresAt: now + this.inFlightTtl,
      });
      this.owners.set(key, createDeferred<Completion>());
      return { kind: 'admitted' };
    });
  }

  /**
   * Store the outcome of an admitted execution for `ttl` milliseconds and
   * hand the same Result object to every waiter.
   */
  complete(key: string, result: Result<unknown, Error>, ttl: number, fingerprint?: string): Promise<void> {
    return this.mutex.runExclusive(key, async () => {
      const now = this.clock.now();
      try {
        await this.store.set({
          status: 'completed',
          key,
          fingerprint,
          result,
          completedAt: now,
          expiresAt: now + ttl,
        });
      } finally {
        this.settle(key, { kind: 'completed', result });
      }
    });
  }

  /**
   * Drop the in-flight marker without storing anything. Current waiters
   * race through `begin` again and one of them is admitted.
   */
  release(key: string): Promise<void> {
    return this.mutex.runExclusive(key, async () => {
      try {
        await this.store.delete(key);
      } finally {
        this.settle(key, { kind: 'released' });
      }
    });
  }

  /**
   * Whether this guard owns a running execution for `key`.
   */
  isInFlight(key: string): boolean {
    return this.owners.has(key);
  }

  private settle(key: string, completion: Completion): void {
    const owner = this.owners.get(key);
    if (!owner) {
      this.logger.warn('Idempotency key settled without a running execution', { key });
      return;
    }
    this.owners.delete(key);
    owner.resolve(completion);
  }

  /**
   * An in-flight marker owned by a running execution here never expires.
   */
  private isLive(record: IdempotencyRecord): boolean {
    if (record.status === 'in-flight' && this.owners.has(record.key)) {
      return true;
    }
    return this.clock.now() <= record.expiresAt;
  }

  private fingerprintDiffers(record: IdempotencyRecord, fingerprint: string | undefined): boolean {
    return (
      record.fingerprint !== undefined &&
      fingerprint !== undefined &&
      record.fingerprint !== fingerprint
    );
  }
}
