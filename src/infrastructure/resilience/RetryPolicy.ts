/**
 * Exponential backoff retry policy.
 *
 * `delayFor(n) = baseDelay * 2^n + U[0, jitterMax]`, where `n` is the retry
 * index (0 for the first retry). The original call is not an attempt:
 * `maxAttempts = 3` means up to four calls in total.
 *
 * @module infrastructure/resilience/RetryPolicy
 */

import { CancelledError, CircuitOpenError, TransientError } from '../../domain/errors';
import { err, type Result } from '../../domain/result';
import { noopLogger, type ILogger } from '../../application/logging';
import { systemClock, type IClock } from '../time';
import type { ErrorClass, RetryContext, RetryPolicyOptions, RetrySettings } from './IResiliencePolicy';

export const DEFAULT_RETRY_SETTINGS: Readonly<RetrySettings> = Object.freeze({
  maxAttempts: 3,
  baseDelay: 100,
  jitterMax: 100,
});

/**
 * Runtime collaborators of {@link RetryPolicy.execute}.
 */
export interface RetryExecution {
  clock?: IClock;
  logger?: ILogger;
  signal?: AbortSignal;
}

export class RetryPolicy {
  readonly settings: Readonly<RetrySettings>;
  readonly retryableErrors: readonly ErrorClass[];

  private readonly retryIf?: (error: Error) => boolean;
  private readonly onRetry?: (error: Error, context: RetryContext) => void;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions = {}) {
    this.settings = Object.freeze({
      maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_SETTINGS.maxAttempts,
      baseDelay: options.baseDelay ?? DEFAULT_RETRY_SETTINGS.baseDelay,
      jitterMax: options.jitterMax ?? DEFAULT_RETRY_SETTINGS.jitterMax,
    });
    this.retryableErrors = Object.freeze([...(options.retryableErrors ?? [TransientError])]);
    this.retryIf = options.retryIf;
    this.onRetry = options.onRetry;
    this.random = options.random ?? Math.random;
  }

  /**
   * Whether retry `attempt` (0-based) should run after `error`.
   *
   * A `CircuitOpenError` is terminal for the attempt and never retried here.
   */
  shouldRetry(error: Error, attempt: number): boolean {
    if (attempt >= this.settings.maxAttempts) {
      return false;
    }
    if (error instanceof CircuitOpenError || error instanceof CancelledError) {
      return false;
    }
    if (this.retryableErrors.some((errorClass) => error instanceof errorClass)) {
      return true;
    }
    return this.retryIf ? this.retryIf(error) : false;
  }

  /**
   * Deterministic part of the delay: `baseDelay * 2^attempt`.
   */
  baseDelayFor(attempt: number): number {
    return this.settings.baseDelay * 2 ** attempt;
  }

  delayFor(attempt: number): number {
    return this.baseDelayFor(attempt) + this.random() * this.settings.jitterMax;
  }

  /**
   * Run `task` until it succeeds, fails with a non-retryable error, or
   * retries run out. The last `Err` is returned unchanged.
   *
   * Sleeping goes through the clock, so only this call is suspended. An
   * abort during the sleep yields `Err(CancelledError)`.
   *
   * @param task - Called with the number of retries so far (0 for the original call)
   */
  async execute<T>(
    task: (attempt: number) => Promise<Result<T, Error>>,
    execution: RetryExecution = {},
  ): Promise<Result<T, Error>> {
    const clock = execution.clock ?? systemClock;
    const logger = execution.logger ?? noopLogger;

    let result = await task(0);

    let attempt = 0;
    while (result.kind === 'err') {
      const error = result.error;
      if (!this.shouldRetry(error, attempt)) {
        return result;
      }

      const delay = this.delayFor(attempt);
      logger.warn('Retrying after failure', {
        attempt,
        delay,
        maxAttempts: this.settings.maxAttempts,
        error: error.message,
      });
      this.onRetry?.(error, { attempt, delay, policy: this.settings });

      try {
        await clock.sleep(delay, execution.signal);
      } catch (sleepError) {
        return err(
          sleepError instanceof CancelledError ? sleepError : new CancelledError(sleepError),
        );
      }

      result = await task(attempt + 1);
      attempt++;
    }

    return result;
  }
}
