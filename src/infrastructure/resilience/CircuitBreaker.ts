/**
 * Consecutive-count circuit breaker.
 *
 * ```
 *            failures >= failureThreshold
 *   CLOSED ───────────────────────────────► OPEN
 *     ▲                                      │
 *     │ successes >= successThreshold        │ recoveryTimeout elapsed,
 *     │                                      │ next call admitted
 *     └──────────── HALF_OPEN ◄──────────────┘
 *                     │  any failure
 *                     └──────────────────► OPEN
 * ```
 *
 * Admission and outcome recording are synchronous, so no other call can
 * interleave with a transition. Every transition bumps a generation
 * counter; an outcome reported for a permit issued under an older
 * generation is dropped instead of being counted against the new state.
 *
 * A HalfOpen trial holds its slot for at most `trialLeaseMs`, so a trial
 * that never settles cannot keep the circuit rejecting forever.
 *
 * @module infrastructure/resilience/CircuitBreaker
 */

import {
  BulkheadFullError,
  CancelledError,
  CircuitOpenError,
  ConflictError,
  ValidationError,
} from '../../domain/errors';
import { err, ok, type Result } from '../../domain/result';
import { noopLogger, type ILogger } from '../../application/logging';
import { systemClock, type IClock } from '../time';
import {
  CircuitState,
  type CircuitBreakerDependencies,
  type CircuitBreakerOptions,
  type CircuitBreakerSettings,
  type CircuitBreakerSnapshot,
  type CircuitOutcome,
  type CircuitPermit,
  type ICircuitBreakerPolicy,
} from './IResiliencePolicy';

export const DEFAULT_CIRCUIT_BREAKER_SETTINGS: Readonly<CircuitBreakerSettings> = Object.freeze({
  failureThreshold: 5,
  recoveryTimeout: 30_000,
  successThreshold: 2,
  halfOpenMaxCalls: 1,
  trialLeaseMs: 30_000,
});

/**
 * Default failure classification: rejections caused by the caller's input,
 * by idempotency policy or by a full bulkhead say nothing about the health
 * of the handler.
 */
export function defaultIsFailure(error: Error): boolean {
  return !(
    error instanceof ValidationError ||
    error instanceof ConflictError ||
    error instanceof CancelledError ||
    error instanceof BulkheadFullError
  );
}

export class CircuitBreaker implements ICircuitBreakerPolicy {
  readonly settings: Readonly<CircuitBreakerSettings>;

  private readonly clock: IClock;
  private readonly logger: ILogger;
  private readonly isFailure: (error: Error) => boolean;
  private readonly onStateChange?: CircuitBreakerOptions['onStateChange'];

  private currentState: CircuitState = CircuitState.Closed;
  private consecutiveFailures = 0;
  private consecutiveSuccesses = 0;
  private openedAt: number | null = null;
  private isolated = false;
  /** Running trial permit ids and when their slot lapses */
  private readonly trials = new Map<number, number>();
  private nextPermitId = 0;
  private generation = 0;

  constructor(
    readonly name: string,
    options: CircuitBreakerOptions = {},
    dependencies: CircuitBreakerDependencies = {},
  ) {
    this.settings = Object.freeze({
      failureThreshold: options.failureThreshold ?? DEFAULT_CIRCUIT_BREAKER_SETTINGS.failureThreshold,
      recoveryTimeout: options.recoveryTimeout ?? DEFAULT_CIRCUIT_BREAKER_SETTINGS.recoveryTimeout,
      successThreshold: options.successThreshold ?? DEFAULT_CIRCUIT_BREAKER_SETTINGS.successThreshold,
      halfOpenMaxCalls: options.halfOpenMaxCalls ?? DEFAULT_CIRCUIT_BREAKER_SETTINGS.halfOpenMaxCalls,
      trialLeaseMs: options.trialLeaseMs ?? DEFAULT_CIRCUIT_BREAKER_SETTINGS.trialLeaseMs,
    });
    this.isFailure = options.isFailure ?? defaultIsFailure;
    this.onStateChange = options.onStateChange;
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? noopLogger;
  }

  get state(): CircuitState {
    return this.currentState;
  }

  async execute<T>(task: () => Promise<Result<T, Error>>): Promise<Result<T, Error>> {
    const admission = this.acquire();
    if (admission.kind === 'err') {
      return err<T, Error>(admission.error);
    }
    const permit = admission.value;

    let result: Result<T, Error>;
    try {
      result = await task();
    } catch (thrown) {
      this.record(permit, 'failure');
      throw thrown;
    }

    this.record(permit, this.classify(result));
    return result;
  }

  /**
   * Ask for permission to run one call.
   *
   * An Open circuit whose recovery timeout has elapsed moves to HalfOpen
   * here, before the admitted trial runs.
   */
  acquire(): Result<CircuitPermit, CircuitOpenError> {
    if (this.currentState === CircuitState.Open) {
      const remaining = this.timeUntilRecovery();
      if (remaining > 0) {
        return err(new CircuitOpenError(this.name, remaining));
      }
      this.transition(CircuitState.HalfOpen);
    }

    const id = this.nextPermitId++;

    if (this.currentState === CircuitState.HalfOpen) {
      this.expireTrialLeases();
      if (this.trials.size >= this.settings.halfOpenMaxCalls) {
        return err(new CircuitOpenError(this.name, 0));
      }
      const lease = this.settings.trialLeaseMs;
      this.trials.set(id, lease > 0 ? this.clock.now() + lease : Number.POSITIVE_INFINITY);
      return ok({ id, generation: this.generation, trial: true });
    }

    return ok({ id, generation: this.generation, trial: false });
  }

  /**
   * Report the outcome of a call admitted by {@link acquire}.
   */
  record(permit: CircuitPermit, outcome: CircuitOutcome): void {
    if (permit.generation !== this.generation) {
      this.logger.debug('Ignoring outcome from a previous circuit generation', {
        circuit: this.name,
        permitGeneration: permit.generation,
        generation: this.generation,
      });
      return;
    }

    if (permit.trial) {
      this.trials.delete(permit.id);
    }

    if (outcome === 'ignored') {
      return;
    }

    if (this.currentState === CircuitState.HalfOpen) {
      if (outcome === 'failure') {
        this.transition(CircuitState.Open);
        return;
      }
      this.consecutiveSuccesses++;
      if (this.consecutiveSuccesses >= this.settings.successThreshold) {
        this.transition(CircuitState.Closed);
      }
      return;
    }

    if (this.currentState === CircuitState.Closed) {
      if (outcome === 'success') {
        this.consecutiveFailures = 0;
        return;
      }
      this.consecutiveFailures++;
      if (this.consecutiveFailures >= this.settings.failureThreshold) {
        this.transition(CircuitState.Open);
      }
    }
  }

  isolate(): void {
    this.isolated = true;
    this.transition(CircuitState.Open);
  }

  reset(): void {
    this.isolated = false;
    this.transition(CircuitState.Closed);
  }

  timeUntilRecovery(): number {
    if (this.currentState !== CircuitState.Open) {
      return 0;
    }
    if (this.isolated) {
      return Number.POSITIVE_INFINITY;
    }
    const elapsed = this.clock.now() - (this.openedAt ?? this.clock.now());
    return Math.max(0, this.settings.recoveryTimeout - elapsed);
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      name: this.name,
      state: this.currentState,
      consecutiveFailures: this.consecutiveFailures,
      consecutiveSuccesses: this.consecutiveSuccesses,
      openedAt: this.openedAt,
      isolated: this.isolated,
      activeTrials: this.trials.size,
    };
  }

  private expireTrialLeases(): void {
    const now = this.clock.now();
    for (const [id, leaseEnd] of this.trials) {
      if (now >= leaseEnd) {
        this.trials.delete(id);
        this.logger.warn('Half-open trial exceeded its lease', {
          circuit: this.name,
          leaseMs: this.settings.trialLeaseMs,
        });
      }
    }
  }

  private classify<T>(result: Result<T, Error>): CircuitOutcome {
    if (result.kind === 'ok') {
      return 'success';
    }
    return this.isFailure(result.error) ? 'failure' : 'ignored';
  }

  private transition(to: CircuitState): void {
    const from = this.currentState;

    this.generation++;
    this.currentState = to;
    this.consecutiveSuccesses = 0;
    this.trials.clear();

    switch (to) {
      case CircuitState.Open:
        this.openedAt = this.clock.now();
        break;
      case CircuitState.HalfOpen:
        this.consecutiveFailures = 0;
        break;
      case CircuitState.Closed:
        this.consecutiveFailures = 0;
        this.openedAt = null;
        break;
    }

    if (from === to) {
      return;
    }

    const meta = { circuit: this.name, from, to };
    if (to === CircuitState.Open) {
      this.logger.warn('Circuit opened', { ...meta, isolated: this.isolated });
    } else {
      this.logger.info('Circuit state changed', meta);
    }

    if (this.onStateChange) {
      try {
        this.onStateChange(from, to, this.name);
      } catch (error) {
        this.logger.error('Circuit state change listener failed', {
          circuit: this.name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
