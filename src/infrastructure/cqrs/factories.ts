/**
 * Bus factories wiring the reference pipelines.
 *
 * ```
 * command: [Logging] → [Metrics] → Idempotency  → Validation → [Fallback] → Retry → CircuitBreaker → [Bulkhead] → [Timeout] → handler
 * query:   [Logging] → [Metrics] → [QueryCache] → Validation → [Fallback] → Retry → CircuitBreaker → [Bulkhead] → [Timeout] → handler
 * ```
 *
 * Retry wraps the breaker: every retry is admitted (or fast-failed) by the
 * breaker again, and each failed attempt counts once toward opening it.
 * Fallback sits outside retry so it only answers once retries are spent;
 * the bulkhead sits inside the breaker, whose default classification
 * ignores a full bulkhead.
 */

import type { IEventPublisher } from '../../domain/events';
import type { IMetricsCollector } from '../../application/metrics';
import type { MessageKind } from '../../domain/messages';
import type { IDispatchMiddleware } from '../../application/cqrs/IDispatchMiddleware';
import {
  parseDispatchConfig,
  type DispatchConfig,
  type DispatchConfigInput,
} from '../../application/config';
import { createConsoleLogger, type ILogger } from '../../application/logging';
import { InMemoryQueryCache, QueryCacheInvalidator, type IQueryCache } from '../cache';
import { IdempotencyGuard, InMemoryIdempotencyStore, type IIdempotencyStore } from '../idempotency';
import {
  BulkheadMiddleware,
  CircuitBreakerMiddleware,
  FallbackMiddleware,
  IdempotencyMiddleware,
  LoggingMiddleware,
  MetricsMiddleware,
  QueryCacheMiddleware,
  RetryMiddleware,
  TimeoutMiddleware,
  ValidationMiddleware,
  type FallbackHandler,
  type Validator,
} from '../middleware';
import { createPipeline } from '../pipeline';
import {
  CircuitBreakerRegistry,
  RetryPolicy,
  type CircuitBreakerOptions,
  type ErrorClass,
  type RetryContext,
} from '../resilience';
import { systemClock, type IClock } from '../time';
import { CommandBus } from './CommandBus';
import { QueryBus } from './QueryBus';

/**
 * Runtime collaborators of a bus. Everything is optional.
 */
export interface DispatchRuntime {
  clock?: IClock;

  /** Defaults to a console logger at the configured level */
  logger?: ILogger;

  /** Defaults to an {@link InMemoryIdempotencyStore} */
  idempotencyStore?: IIdempotencyStore;

  /** Share breakers between buses, or inspect them in tests */
  breakers?: CircuitBreakerRegistry;

  /** Error classes retried by the retry stage */
  retryableErrors?: ErrorClass[];
  retryIf?: (error: Error) => boolean;
  onRetry?: (error: Error, context: RetryContext) => void;

  /** Jitter source in [0, 1) */
  random?: () => number;

  isFailure?: CircuitBreakerOptions['isFailure'];
  onStateChange?: CircuitBreakerOptions['onStateChange'];

  validate?: Validator;
  validators?: Record<string, Validator>;

  /** Command bus only */
  eventPublisher?: IEventPublisher;

  /** The metrics stage runs only when a collector is given */
  metricsCollector?: IMetricsCollector;

  /**
   * Share one cache between the query bus and the command bus's
   * invalidation. Defaults to a private {@link InMemoryQueryCache}.
   */
  queryCache?: IQueryCache;

  /** The fallback stage runs only when at least one fallback is given */
  fallbacks?: Record<string, FallbackHandler>;
  shouldFallback?: (error: Error) => boolean;
}

export function createCommandBus(
  config: DispatchConfigInput = {},
  runtime: DispatchRuntime = {},
): CommandBus {
  const resolved = parseDispatchConfig(config);
  const logger = runtime.logger ?? createConsoleLogger({ level: resolved.logging.level, name: 'command-bus' });

  return new CommandBus({
    middlewares: buildStages('command', resolved, runtime, logger),
    logger,
    clock: runtime.clock,
    eventPublisher: buildEventPublisher(resolved, runtime, logger),
  });
}

export function createQueryBus(
  config: DispatchConfigInput = {},
  runtime: DispatchRuntime = {},
): QueryBus {
  const resolved = parseDispatchConfig(config);
  const logger = runtime.logger ?? createConsoleLogger({ level: resolved.logging.level, name: 'query-bus' });

  return new QueryBus({
    middlewares: buildStages('query', resolved, runtime, logger),
    logger,
    clock: runtime.clock,
  });
}

/**
 * Reference stage list for one bus kind, outermost first.
 */
export function buildStages(
  kind: MessageKind,
  config: DispatchConfig,
  runtime: DispatchRuntime,
  logger: ILogger,
): IDispatchMiddleware[] {
  const clock = runtime.clock ?? systemClock;
  const { overrides, ...breakerSettings } = config.circuitBreaker;
  const pipeline = createPipeline();

  if (config.logging.enabled) {
    pipeline.use(
      new LoggingMiddleware({ logger, clock, slowThresholdMs: config.logging.slowDispatchMs }),
    );
  }

  if (config.metrics.enabled && runtime.metricsCollector) {
    pipeline.use(
      new MetricsMiddleware({
        collector: runtime.metricsCollector,
        clock,
        slowThresholdMs: config.metrics.slowThresholdMs,
      }),
    );
  }

  if (kind === 'query' && config.queryCache.enabled) {
    const { ttl, ttlByType, keyPrefix, cacheAll, capacity } = config.queryCache;
    pipeline.use(
      new QueryCacheMiddleware(runtime.queryCache ?? new InMemoryQueryCache(clock, capacity), {
        ttl,
        ttlByType,
        keyPrefix,
        cacheAll,
        logger,
      }),
    );
  }

  if (kind === 'command' && config.idempotency.enabled) {
    const { ttl, ttlByType, inFlightTtl, keyPrefix, onInFlight, cancellation, checkFingerprint } =
      config.idempotency;
    const store = runtime.idempotencyStore ?? new InMemoryIdempotencyStore(clock);
    const guard = new IdempotencyGuard(store, inFlightTtl, { clock, logger });
    pipeline.use(
      new IdempotencyMiddleware(guard, {
        ttl,
        ttlByType,
        keyPrefix,
        onInFlight,
        cancellation,
        checkFingerprint,
        logger,
      }),
    );
  }

  const breakers =
    runtime.breakers ??
    new CircuitBreakerRegistry(
      {
        defaults: {
          ...breakerSettings,
          isFailure: runtime.isFailure,
          onStateChange: runtime.onStateChange,
        },
        overrides,
      },
      { clock, logger },
    );

  const fallbacks = runtime.fallbacks ?? {};

  pipeline
    .use(new ValidationMiddleware({ validate: runtime.validate, validators: runtime.validators }))
    .useIf(
      Object.keys(fallbacks).length > 0,
      new FallbackMiddleware({ fallbacks, shouldFallback: runtime.shouldFallback, logger }),
    )
    .use(
      new RetryMiddleware(
        new RetryPolicy({
          ...config.retry,
          retryableErrors: runtime.retryableErrors,
          retryIf: runtime.retryIf,
          onRetry: runtime.onRetry,
          random: runtime.random,
        }),
        { clock, logger },
      ),
    )
    .use(new CircuitBreakerMiddleware(breakers))
    .useIf(
      config.bulkhead.enabled,
      new BulkheadMiddleware({
        maxConcurrent: config.bulkhead.maxConcurrent,
        maxWaitMs: config.bulkhead.maxWaitMs,
        limits: config.bulkhead.limits,
        clock,
        logger,
      }),
    )
    .useIf(
      config.timeout.timeoutMs > 0 || Object.keys(config.timeout.timeouts).length > 0,
      new TimeoutMiddleware({ ...config.timeout, clock }),
    );

  return pipeline.build();
}

/**
 * The command bus's event publisher, wrapped in a
 * {@link QueryCacheInvalidator} when a shared query cache and invalidation
 * rules are configured.
 */
function buildEventPublisher(
  config: DispatchConfig,
  runtime: DispatchRuntime,
  logger: ILogger,
): IEventPublisher | undefined {
  const rules = config.queryCache.invalidation;
  if (!runtime.queryCache || Object.keys(rules).length === 0) {
    return runtime.eventPublisher;
  }
  return new QueryCacheInvalidator(runtime.queryCache, {
    rules,
    publisher: runtime.eventPublisher,
    logger,
  });
}
