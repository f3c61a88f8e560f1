/**
 * Re-runs the inner stages on retryable failures with exponential backoff.
 * Sits outside the circuit breaker, so every retry passes the breaker
 * again and an open circuit ends the retries.
 */

import type { IMessage } from '../../domain/messages';
import type { DispatchContext } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';
import { childLogger, noopLogger, type ILogger } from '../../application/logging';
import { RetryPolicy } from '../resilience';
import { systemClock, type IClock } from '../time';

export interface RetryMiddlewareOptions {
  clock?: IClock;
  logger?: ILogger;
}

export class RetryMiddleware implements IDispatchMiddleware {
  readonly name = 'retry';

  private readonly clock: IClock;
  private readonly logger: ILogger;

  constructor(
    readonly policy: RetryPolicy = new RetryPolicy(),
    options: RetryMiddlewareOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
  }

  invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult> {
    return this.policy.execute(
      (attempt) => next(message, attempt === 0 ? context : { ...context, attempt }),
      {
        clock: this.clock,
        signal: context.signal,
        logger: childLogger(this.logger, {
          typeId: message.typeId,
          dispatchId: context.dispatchId,
        }),
      },
    );
  }
}
