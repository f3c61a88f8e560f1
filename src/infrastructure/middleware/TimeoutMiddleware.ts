/**
 * Bounds the time spent in the inner stages.
 *
 * On expiry the dispatch gets `Err(TimeoutError)` and the signal handed to
 * the inner stages is aborted; a handler that ignores the signal keeps
 * running but its outcome is discarded. `TimeoutError` is a
 * `TransientError`, so an outer retry stage retries it and an outer
 * breaker counts it.
 */

import type { IMessage } from '../../domain/messages';
import { TimeoutError } from '../../domain/errors';
import { err } from '../../domain/result';
import type { DispatchContext } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';
import { systemClock, type IClock } from '../time';

export interface TimeoutMiddlewareOptions {
  /** Default budget in milliseconds; 0 disables the stage */
  timeoutMs: number;

  /** Per-`typeId` budgets */
  timeouts?: Record<string, number>;

  clock?: IClock;
}

export class TimeoutMiddleware implements IDispatchMiddleware {
  readonly name = 'timeout';

  private readonly timeoutMs: number;
  private readonly timeouts: Record<string, number>;
  private readonly clock: IClock;

  constructor(options: TimeoutMiddlewareOptions) {
    this.timeoutMs = options.timeoutMs;
    this.timeouts = { ...options.timeouts };
    this.clock = options.clock ?? systemClock;
  }

  async invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult> {
    const budget = this.timeouts[message.typeId] ?? this.timeoutMs;
    if (!(budget > 0)) {
      return next(message, context);
    }

    const controller = new AbortController();
    const parent = context.signal;
    const onParentAbort = (): void => controller.abort(parent?.reason);
    if (parent?.aborted) {
      controller.abort(parent.reason);
    } else {
      parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    const expiry = this.clock.sleep(budget, controller.signal).then(
      (): DispatchResult => {
        const timeout = new TimeoutError(budget);
        controller.abort(timeout);
        return err(timeout);
      },
      // Cancelled because the inner stages finished or the caller aborted.
      () => new Promise<DispatchResult>(() => undefined),
    );

    try {
      return await Promise.race([next(message, { ...context, signal: controller.signal }), expiry]);
    } finally {
      parent?.removeEventListener('abort', onParentAbort);
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }
  }
}
