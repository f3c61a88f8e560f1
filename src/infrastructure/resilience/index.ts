/**
 * Resilience module: circuit breakers, retry and bulkheads.
 */

export { CircuitState } from './IResiliencePolicy';
export type {
  CircuitBreakerSettings,
  CircuitBreakerOptions,
  CircuitBreakerDependencies,
  CircuitBreakerSnapshot,
  CircuitPermit,
  CircuitOutcome,
  ICircuitBreakerPolicy,
  RetrySettings,
  RetryPolicyOptions,
  RetryContext,
  ErrorClass,
} from './IResiliencePolicy';

export {
  CircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_SETTINGS,
  defaultIsFailure,
} from './CircuitBreaker';

export { CircuitBreakerRegistry } from './CircuitBreakerRegistry';
export type { CircuitBreakerRegistryOptions } from './CircuitBreakerRegistry';

export { RetryPolicy, DEFAULT_RETRY_SETTINGS } from './RetryPolicy';
export type { RetryExecution } from './RetryPolicy';

export { Bulkhead, DEFAULT_BULKHEAD_SETTINGS } from './Bulkhead';
export type { BulkheadSettings, BulkheadDependencies, BulkheadSnapshot } from './Bulkhead';
