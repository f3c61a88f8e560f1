/**
 * Resilience Policy Types
 *
 * Shared vocabulary of the circuit breaker and retry stages. Both are
 * patterned after Polly (.NET) and resilience4j (Java), reduced to the
 * consecutive-count breaker and exponential backoff the dispatch pipeline
 * needs.
 *
 * @module infrastructure/resilience/IResiliencePolicy
 * @see {@link https://martinfowler.com/bliki/CircuitBreaker.html | Circuit Breaker}
 */

import type { Result } from '../../domain/result';
import type { IClock } from '../time';
import type { ILogger } from '../../application/logging';

/**
 * Circuit breaker states.
 *
 * Represents the three states of a circuit breaker.
 */
export enum CircuitState {
  /** Circuit is closed, requests flow normally */
  Closed = 'CLOSED',
  /** Circuit is open, requests are rejected immediately */
  Open = 'OPEN',
  /** Circuit is testing, limited requests allowed */
  HalfOpen = 'HALF_OPEN',
}

/**
 * Circuit breaker thresholds. Plain data, safe to put in configuration.
 *
 * @example
 * ```typescript
 * const settings: CircuitBreakerSettings = {
 *   failureThreshold: 3,
 *   recoveryTimeout: 10_000,
 *   successThreshold: 2,
 * };
 * ```
 */
export interface CircuitBreakerSettings {
  /**
   * Consecutive failures in Closed that open the circuit.
   * @defaultValue 5
   */
  failureThreshold: number;

  /**
   * Milliseconds the circuit stays Open before admitting a trial call.
   * @defaultValue 30000
   */
  recoveryTimeout: number;

  /**
   * Consecutive HalfOpen successes that close the circuit.
   * @defaultValue 2
   */
  successThreshold: number;

  /**
   * Trial calls admitted concurrently while HalfOpen.
   * @defaultValue 1
   */
  halfOpenMaxCalls: number;

  /**
   * Milliseconds a HalfOpen trial holds its slot. A trial that has not
   * settled by then stops counting against `halfOpenMaxCalls`. 0 keeps the
   * slot until the trial settles.
   * @defaultValue 30000
   */
  trialLeaseMs: number;
}

/**
 * Circuit breaker options: settings plus behaviour hooks.
 */
export interface CircuitBreakerOptions extends Partial<CircuitBreakerSettings> {
  /**
   * Decide whether an `Err` counts against the breaker. Defaults to every
   * error except validation, conflict and cancellation.
   */
  isFailure?: (error: Error) => boolean;

  /**
   * Called after every state transition.
   */
  onStateChange?: (from: CircuitState, to: CircuitState, name: string) => void;
}

/**
 * Collaborators a breaker needs at runtime.
 */
export interface CircuitBreakerDependencies {
  clock?: IClock;
  logger?: ILogger;
}

/**
 * Point-in-time view of a breaker.
 */
export interface CircuitBreakerSnapshot {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  openedAt: number | null;
  isolated: boolean;
  activeTrials: number;
}

/**
 * Admission ticket for one call through a breaker.
 *
 * Outcomes are recorded against the generation the call was admitted
 * under; a ticket from an older generation is ignored.
 */
export interface CircuitPermit {
  readonly id: number;
  readonly generation: number;
  readonly trial: boolean;
}

/**
 * How a finished call is counted. `ignored` frees a trial slot without
 * moving any counter.
 */
export type CircuitOutcome = 'success' | 'failure' | 'ignored';

/**
 * ICircuitBreakerPolicy - Contract of a single named breaker.
 */
export interface ICircuitBreakerPolicy {
  readonly name: string;

  /**
   * Current state. Reading it never moves Open to HalfOpen; only an
   * admitted call does.
   */
  readonly state: CircuitState;

  /**
   * Run `task` under the breaker. Returns `Err(CircuitOpenError)` without
   * invoking `task` while the circuit rejects calls.
   */
  execute<T>(task: () => Promise<Result<T, Error>>): Promise<Result<T, Error>>;

  /**
   * Manually open the circuit. It stays Open until {@link reset}.
   */
  isolate(): void;

  /**
   * Return to Closed with zeroed counters.
   */
  reset(): void;

  /**
   * Milliseconds until an Open circuit admits a trial, 0 otherwise.
   */
  timeUntilRecovery(): number;

  snapshot(): CircuitBreakerSnapshot;
}

/**
 * Retry settings. Plain data, safe to put in configuration.
 */
export interface RetrySettings {
  /**
   * Retries after the original call. The original call is not counted.
   * @defaultValue 3
   */
  maxAttempts: number;

  /**
   * Base delay in milliseconds, doubled per attempt.
   * @defaultValue 100
   */
  baseDelay: number;

  /**
   * Upper bound of the uniform random jitter added to every delay.
   * @defaultValue 100
   */
  jitterMax: number;
}

/**
 * Constructor of an error class, used to classify retryable failures.
 */
export type ErrorClass = abstract new (...args: never[]) => Error;

/**
 * Information handed to the retry hook before each sleep.
 */
export interface RetryContext {
  /** Retry index, 0 for the first retry */
  attempt: number;

  /** Delay about to be slept, in milliseconds */
  delay: number;

  policy: RetrySettings;
}

/**
 * Retry policy options: settings plus classification and hooks.
 *
 * @example
 * ```typescript
 * const policy = new RetryPolicy({
 *   maxAttempts: 5,
 *   baseDelay: 200,
 *   jitterMax: 50,
 *   retryableErrors: [TransientError, LockTimeoutError],
 *   onRetry: (error, { attempt, delay }) => {
 *     logger.warn('retrying', { attempt, delay, error: error.message });
 *   },
 * });
 * ```
 */
export interface RetryPolicyOptions extends Partial<RetrySettings> {
  /**
   * Error classes retried by default.
   * @defaultValue [TransientError]
   */
  retryableErrors?: ErrorClass[];

  /**
   * Extra predicate; an error matching it is retried even when its class
   * is not listed.
   */
  retryIf?: (error: Error) => boolean;

  /**
   * Called before each backoff sleep.
   */
  onRetry?: (error: Error, context: RetryContext) => void;

  /**
   * Uniform random source in [0, 1). @defaultValue Math.random
   */
  random?: () => number;
}
