/**
 * Dispatch Middleware Contract
 *
 * Every stage of the dispatch pipeline (idempotency, validation, retry,
 * circuit breaker, ...) implements {@link IDispatchMiddleware}. Stages form
 * an onion around the handler:
 *
 * ```
 * Idempotency → Validation → Retry → CircuitBreaker → Handler
 *      ↓             ↓          ↓           ↓            ↓
 * Idempotency ← Validation ← Retry ← CircuitBreaker ← Result
 * ```
 *
 * A stage either short-circuits with its own `Result` or calls `next` and
 * returns what comes back, transformed only when the stage owns the
 * transformation.
 *
 * @module application/cqrs/IDispatchMiddleware
 */

import type { IMessage } from '../../domain/messages';
import type { Result } from '../../domain/result';
import type { DispatchContext } from './IHandler';

/**
 * The Result type flowing through the pipeline. The success type is
 * erased inside the pipeline and restored by the bus.
 */
export type DispatchResult = Result<unknown, Error>;

/**
 * Runs the rest of the pipeline.
 */
export type Next = (message: IMessage, context: DispatchContext) => Promise<DispatchResult>;

/**
 * IDispatchMiddleware - One stage of the dispatch pipeline.
 *
 * @example
 * ```typescript
 * class AuditMiddleware implements IDispatchMiddleware {
 *   readonly name = 'audit';
 *
 *   async invoke(message: IMessage, context: DispatchContext, next: Next) {
 *     const result = await next(message, context);
 *     await audit.record(message.typeId, context.correlationId, result.kind);
 *     return result;
 *   }
 * }
 * ```
 */
export interface IDispatchMiddleware {
  /** Stage name, used in logs */
  readonly name: string;

  invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult>;
}

/**
 * Function form of a middleware.
 */
export type MiddlewareFunction = (
  message: IMessage,
  context: DispatchContext,
  next: Next,
) => Promise<DispatchResult>;

/**
 * Wrap a function as a named middleware.
 */
export function createMiddleware(fn: MiddlewareFunction, name: string = fn.name || 'anonymous'): IDispatchMiddleware {
  return {
    name,
    invoke: fn,
  };
}
