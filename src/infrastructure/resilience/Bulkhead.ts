/**
 * Bulkhead: caps the number of calls running at once.
 *
 * A call beyond `maxConcurrent` queues (FIFO) for up to `maxWaitMs`; a
 * finishing call hands its slot straight to the oldest waiter. A waiter
 * that runs out of time gets `BulkheadFullError`, one whose caller aborts
 * gets `CancelledError`.
 *
 * @module infrastructure/resilience/Bulkhead
 */

import { BulkheadFullError, CancelledError } from '../../domain/errors';
import { err, ok, type Result } from '../../domain/result';
import { noopLogger, type ILogger } from '../../application/logging';
import { systemClock, type IClock } from '../time';

export interface BulkheadSettings {
  /** @defaultValue 10 */
  maxConcurrent: number;

  /**
   * How long a call may queue for a slot; 0 rejects at once.
   * @defaultValue 5000
   */
  maxWaitMs: number;
}

export const DEFAULT_BULKHEAD_SETTINGS: Readonly<BulkheadSettings> = Object.freeze({
  maxConcurrent: 10,
  maxWaitMs: 5_000,
});

export interface BulkheadDependencies {
  clock?: IClock;
  logger?: ILogger;
}

export interface BulkheadSnapshot {
  name: string;
  active: number;
  queued: number;
  rejected: number;
}

interface Waiter {
  granted: boolean;
  wake: () => void;
}

type WaitOutcome = 'granted' | 'expired' | 'aborted';

export class Bulkhead {
  readonly settings: Readonly<BulkheadSettings>;

  private readonly clock: IClock;
  private readonly logger: ILogger;
  private readonly queue: Waiter[] = [];
  private active = 0;
  private rejected = 0;

  constructor(
    readonly name: string,
    options: Partial<BulkheadSettings> = {},
    dependencies: BulkheadDependencies = {},
  ) {
    this.settings = Object.freeze({
      maxConcurrent: options.maxConcurrent ?? DEFAULT_BULKHEAD_SETTINGS.maxConcurrent,
      maxWaitMs: options.maxWaitMs ?? DEFAULT_BULKHEAD_SETTINGS.maxWaitMs,
    });
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? noopLogger;
  }

  async execute<T>(
    task: () => Promise<Result<T, Error>>,
    signal?: AbortSignal,
  ): Promise<Result<T, Error>> {
    const admission = await this.acquire(signal);
    if (admission.kind === 'err') {
      return err<T, Error>(admission.error);
    }

    try {
      return await task();
    } finally {
      this.release();
    }
  }

  snapshot(): BulkheadSnapshot {
    return {
      name: this.name,
      active: this.active,
      queued: this.queue.length,
      rejected: this.rejected,
    };
  }

  private async acquire(signal?: AbortSignal): Promise<Result<void, BulkheadFullError | CancelledError>> {
    if (signal?.aborted) {
      return err(new CancelledError(signal.reason));
    }
    if (this.active < this.settings.maxConcurrent) {
      this.active++;
      return ok(undefined);
    }
    if (this.settings.maxWaitMs <= 0) {
      return this.reject();
    }

    const waiter: Waiter = { granted: false, wake: () => undefined };
    const granted = new Promise<WaitOutcome>((resolve) => {
      waiter.wake = () => resolve('granted');
    });
    this.queue.push(waiter);

    const timer = new AbortController();
    const onAbort = (): void => timer.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    const expiry = this.clock.sleep(this.settings.maxWaitMs, timer.signal).then(
      (): WaitOutcome => 'expired',
      (): WaitOutcome => 'aborted',
    );

    const outcome = await Promise.race([granted, expiry]);
    signal?.removeEventListener('abort', onAbort);
    if (!timer.signal.aborted) {
      timer.abort();
    }

    // A slot handed over while the timer fired still belongs to this call.
    if (waiter.granted) {
      return ok(undefined);
    }

    const index = this.queue.indexOf(waiter);
    if (index >= 0) {
      this.queue.splice(index, 1);
    }

    if (outcome === 'aborted') {
      return err(new CancelledError(signal?.reason));
    }
    return this.reject();
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next.granted = true;
      next.wake();
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }

  private reject(): Result<void, BulkheadFullError> {
    this.rejected++;
    this.logger.warn('Bulkhead rejected call', {
      bulkhead: this.name,
      maxConcurrent: this.settings.maxConcurrent,
      queued: this.queue.length,
    });
    return err(new BulkheadFullError(this.name, this.settings.maxConcurrent));
  }
}
