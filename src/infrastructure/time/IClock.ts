/**
 * Clock abstraction.
 *
 * Everything in the dispatch core that reads time or waits goes through an
 * `IClock`, so breaker recovery, retry backoff and idempotency expiry can
 * be driven deterministically in tests.
 *
 * @module infrastructure/time/IClock
 */

import { CancelledError } from '../../domain/errors';

/**
 * Monotonic time source with cancellable sleep.
 */
export interface IClock {
  /**
   * Current time in milliseconds. Only differences are meaningful.
   */
  now(): number;

  /**
   * Resolve after `ms` milliseconds. Rejects with `CancelledError` when
   * `signal` aborts first.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Real clock backed by `performance.now()` and `setTimeout`.
 */
export const systemClock: IClock = {
  now: () => performance.now(),

  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError(signal.reason));
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new CancelledError(signal?.reason));
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, ms));

      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

interface PendingSleep {
  wakeAt: number;
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export interface ManualClockOptions {
  /** Initial reading of `now()`. @defaultValue 0 */
  start?: number;

  /**
   * Resolve every sleep immediately, advancing `now()` by the requested
   * duration. @defaultValue false
   */
  autoAdvance?: boolean;
}

/**
 * Clock whose time only moves when told to.
 *
 * @example
 * ```typescript
 * const clock = new ManualClock();
 * const breaker = new CircuitBreaker('payments', { recoveryTimeout: 30_000 }, { clock });
 *
 * clock.advance(30_000);
 * ```
 */
export class ManualClock implements IClock {
  /** Every duration passed to `sleep()`, in call order */
  readonly sleeps: number[] = [];

  private current: number;
  private autoAdvance: boolean;
  private pending: PendingSleep[] = [];

  constructor(options: ManualClockOptions = {}) {
    this.current = options.start ?? 0;
    this.autoAdvance = options.autoAdvance ?? false;
  }

  now(): number {
    return this.current;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);

    if (signal?.aborted) {
      return Promise.reject(new CancelledError(signal.reason));
    }

    if (this.autoAdvance) {
      this.current += Math.max(0, ms);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const entry: PendingSleep = {
        wakeAt: this.current + Math.max(0, ms),
        resolve,
        reject,
        signal,
      };

      if (signal) {
        entry.onAbort = () => {
          this.pending = this.pending.filter((p) => p !== entry);
          reject(new CancelledError(signal.reason));
        };
        signal.addEventListener('abort', entry.onAbort, { once: true });
      }

      this.pending.push(entry);
    });
  }

  /**
   * Move time forward and wake every sleep that is now due.
   */
  advance(ms: number): void {
    this.current += ms;

    const due = this.pending
      .filter((p) => p.wakeAt <= this.current)
      .sort((a, b) => a.wakeAt - b.wakeAt);
    this.pending = this.pending.filter((p) => p.wakeAt > this.current);

    for (const entry of due) {
      if (entry.signal && entry.onAbort) {
        entry.signal.removeEventListener('abort', entry.onAbort);
      }
      entry.resolve();
    }
  }

  setAutoAdvance(enabled: boolean): void {
    this.autoAdvance = enabled;
  }

  /** Number of sleeps waiting for `advance()` */
  get pendingSleeps(): number {
    return this.pending.length;
  }
}
