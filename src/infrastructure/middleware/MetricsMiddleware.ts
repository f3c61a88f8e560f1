/**
 * Reports count, duration and slow dispatches of every message to an
 * {@link IMetricsCollector}. Sits right inside the logging stage so the
 * measured time covers every other stage.
 */

import type { IMessage } from '../../domain/messages';
import type { DispatchContext } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';
import type { IMetricsCollector } from '../../application/metrics';
import { systemClock, type IClock } from '../time';

export interface MetricsMiddlewareOptions {
  collector: IMetricsCollector;
  clock?: IClock;

  /** @defaultValue 1000 */
  slowThresholdMs?: number;
}

export class MetricsMiddleware implements IDispatchMiddleware {
  readonly name = 'metrics';

  private readonly collector: IMetricsCollector;
  private readonly clock: IClock;
  private readonly slowThresholdMs: number;

  constructor(options: MetricsMiddlewareOptions) {
    this.collector = options.collector;
    this.clock = options.clock ?? systemClock;
    this.slowThresholdMs = options.slowThresholdMs ?? 1000;
  }

  async invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult> {
    const start = this.clock.now();
    let success = false;

    try {
      const result = await next(message, context);
      success = result.kind === 'ok';
      return result;
    } finally {
      this.record(message.typeId, this.clock.now() - start, success);
    }
  }

  private record(typeId: string, durationMs: number, success: boolean): void {
    this.collector.incrementCount(typeId, success);
    this.collector.recordDuration(typeId, durationMs, success);
    if (durationMs > this.slowThresholdMs) {
      this.collector.recordSlowDispatch(typeId, durationMs);
    }
  }
}
