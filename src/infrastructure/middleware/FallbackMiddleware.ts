/**
 * Degraded answers for failed dispatches.
 *
 * When the inner stages end in an `Err` that `shouldFallback` accepts, the
 * fallback registered for the message's `typeId` produces the Result
 * instead. Placed outside retry and the circuit breaker, it only runs once
 * retries are exhausted or the circuit is open.
 */

import type { IMessage } from '../../domain/messages';
import {
  CancelledError,
  ConflictError,
  FatalError,
  UnregisteredHandlerError,
  ValidationError,
} from '../../domain/errors';
import { err, isResult } from '../../domain/result';
import type { DispatchContext, HandlerReturn } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';
import { noopLogger, type ILogger } from '../../application/logging';

/**
 * `context.items` key set when a fallback produced the Result.
 */
export const FALLBACK_USED = 'fallback.used';

export type FallbackHandler = (
  error: Error,
  message: IMessage,
  context: DispatchContext,
) => HandlerReturn<unknown>;

export interface FallbackMiddlewareOptions {
  /** Fallback per `typeId`; other types pass through */
  fallbacks: Record<string, FallbackHandler>;

  /** Defaults to {@link defaultShouldFallback} */
  shouldFallback?: (error: Error) => boolean;

  logger?: ILogger;
}

/**
 * Caller mistakes and policy rejections keep their own error.
 */
export function defaultShouldFallback(error: Error): boolean {
  return !(
    error instanceof ValidationError ||
    error instanceof ConflictError ||
    error instanceof CancelledError ||
    error instanceof UnregisteredHandlerError
  );
}

export class FallbackMiddleware implements IDispatchMiddleware {
  readonly name = 'fallback';

  private readonly fallbacks: Record<string, FallbackHandler>;
  private readonly shouldFallback: (error: Error) => boolean;
  private readonly logger: ILogger;

  constructor(options: FallbackMiddlewareOptions) {
    this.fallbacks = { ...options.fallbacks };
    this.shouldFallback = options.shouldFallback ?? defaultShouldFallback;
    this.logger = options.logger ?? noopLogger;
  }

  async invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult> {
    const result = await next(message, context);
    const fallback = this.fallbacks[message.typeId];
    if (result.kind === 'ok' || !fallback || !this.shouldFallback(result.error)) {
      return result;
    }

    this.logger.warn('Using fallback', {
      typeId: message.typeId,
      dispatchId: context.dispatchId,
      error: result.error.message,
    });
    context.items.set(FALLBACK_USED, true);

    try {
      const degraded = await fallback(result.error, message, context);
      if (!isResult(degraded)) {
        return err(new FatalError(new TypeError('Fallback did not return a Result'), message.typeId));
      }
      return degraded;
    } catch (thrown) {
      this.logger.error('Fallback threw', {
        typeId: message.typeId,
        error: thrown instanceof Error ? thrown.message : String(thrown),
      });
      return err(new FatalError(thrown, message.typeId));
    }
  }
}
