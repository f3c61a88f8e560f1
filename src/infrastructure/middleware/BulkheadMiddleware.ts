/**
 * Caps concurrent executions per message type. Each `typeId` gets its own
 * {@link Bulkhead}, so a flood of one command never starves another.
 */

import type { IMessage } from '../../domain/messages';
import type { DispatchContext } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';
import type { ILogger } from '../../application/logging';
import { Bulkhead, type BulkheadSettings, type BulkheadSnapshot } from '../resilience';
import type { IClock } from '../time';

export interface BulkheadMiddlewareOptions extends Partial<BulkheadSettings> {
  /** Per-`typeId` concurrency limits */
  limits?: Record<string, number>;

  clock?: IClock;
  logger?: ILogger;
}

export class BulkheadMiddleware implements IDispatchMiddleware {
  readonly name = 'bulkhead';

  private readonly bulkheads = new Map<string, Bulkhead>();

  constructor(private readonly options: BulkheadMiddlewareOptions = {}) {}

  invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult> {
    return this.bulkheadFor(message.typeId).execute(() => next(message, context), context.signal);
  }

  snapshot(): BulkheadSnapshot[] {
    return [...this.bulkheads.values()].map((bulkhead) => bulkhead.snapshot());
  }

  private bulkheadFor(typeId: string): Bulkhead {
    const existing = this.bulkheads.get(typeId);
    if (existing) {
      return existing;
    }

    const { limits, clock, logger, ...settings } = this.options;
    const bulkhead = new Bulkhead(
      `handler:${typeId}`,
      { ...settings, maxConcurrent: limits?.[typeId] ?? settings.maxConcurrent },
      { clock, logger },
    );
    this.bulkheads.set(typeId, bulkhead);
    return bulkhead;
  }
}
