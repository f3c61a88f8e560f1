/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Implementations behind the application contracts:
 *
 * - **CQRS**: command and query buses, handler registry, bus factories
 * - **Pipeline**: middleware composition
 * - **Middleware**: logging, metrics, idempotency, query cache, validation,
 *   fallback, retry, circuit breaker, bulkhead, timeout
 * - **Resilience**: circuit breakers, retry policies and bulkheads
 * - **Cache / Metrics**: in-memory query cache, invalidation, metrics collector
 * - **Idempotency**: guard, store port and in-memory store
 * - **Time / Concurrency**: clocks, per-key mutex, abort racing
 *
 * @packageDocumentation
 * @module resilient-dispatch/infrastructure
 */

export * from './cqrs';
export * from './pipeline';
export * from './middleware';
export * from './resilience';
export * from './idempotency';
export * from './cache';
export * from './metrics';
export * from './time';
export * from './concurrency';
