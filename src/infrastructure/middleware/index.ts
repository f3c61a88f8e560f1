/**
 * Dispatch middleware stages
 */

export { LoggingMiddleware } from './LoggingMiddleware';
export type { LoggingMiddlewareOptions } from './LoggingMiddleware';

export { IdempotencyMiddleware, isCacheableResult } from './IdempotencyMiddleware';
export type {
  IdempotencyMiddlewareOptions,
  InFlightPolicy,
  CancellationPolicy,
} from './IdempotencyMiddleware';

export { ValidationMiddleware, zodValidator } from './ValidationMiddleware';
export type { Validator, ValidationMiddlewareOptions } from './ValidationMiddleware';

export { RetryMiddleware } from './RetryMiddleware';
export type { RetryMiddlewareOptions } from './RetryMiddleware';

export { CircuitBreakerMiddleware, defaultBreakerName } from './CircuitBreakerMiddleware';
export type { CircuitBreakerMiddlewareOptions } from './CircuitBreakerMiddleware';

export { TimeoutMiddleware } from './TimeoutMiddleware';
export type { TimeoutMiddlewareOptions } from './TimeoutMiddleware';

export { MetricsMiddleware } from './MetricsMiddleware';
export type { MetricsMiddlewareOptions } from './MetricsMiddleware';

export { QueryCacheMiddleware } from './QueryCacheMiddleware';
export type { QueryCacheMiddlewareOptions } from './QueryCacheMiddleware';

export { FallbackMiddleware, FALLBACK_USED, defaultShouldFallback } from './FallbackMiddleware';
export type { FallbackHandler, FallbackMiddlewareOptions } from './FallbackMiddleware';

export { BulkheadMiddleware } from './BulkheadMiddleware';
export type { BulkheadMiddlewareOptions } from './BulkheadMiddleware';
