/**
 * Runs the inner stages through a named circuit breaker. Breakers are
 * looked up per message type (`handler:<typeId>` by default), so one
 * failing handler never trips another's circuit.
 */

import type { IMessage } from '../../domain/messages';
import type { DispatchContext } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';
import type { CircuitBreakerRegistry } from '../resilience';

export interface CircuitBreakerMiddlewareOptions {
  /** Maps a message to a breaker name */
  breakerName?: (message: IMessage) => string;
}

export const defaultBreakerName = (message: IMessage): string => `handler:${message.typeId}`;

export class CircuitBreakerMiddleware implements IDispatchMiddleware {
  readonly name = 'circuit-breaker';

  private readonly breakerName: (message: IMessage) => string;

  constructor(
    private readonly registry: CircuitBreakerRegistry,
    options: CircuitBreakerMiddlewareOptions = {},
  ) {
    this.breakerName = options.breakerName ?? defaultBreakerName;
  }

  invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult> {
    const breaker = this.registry.get(this.breakerName(message));
    return breaker.execute(() => next(message, context));
  }
}
