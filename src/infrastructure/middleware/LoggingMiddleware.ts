/**
 * Logs start, finish and duration of every dispatch, and warns about
 * dispatches slower than a threshold. Meant to be the outermost stage.
 */

import type { IMessage } from '../../domain/messages';
import { toErrorPayload } from '../../domain/errors';
import type { DispatchContext } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';
import { consoleLogger, type ILogger } from '../../application/logging';
import { systemClock, type IClock } from '../time';

export interface LoggingMiddlewareOptions {
  logger?: ILogger;
  clock?: IClock;

  /**
   * Dispatches taking longer than this many milliseconds are logged as
   * warnings. @defaultValue 1000
   */
  slowThresholdMs?: number;
}

export class LoggingMiddleware implements IDispatchMiddleware {
  readonly name = 'logging';

  private readonly logger: ILogger;
  private readonly clock: IClock;
  private readonly slowThresholdMs: number;

  constructor(options: LoggingMiddlewareOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? systemClock;
    this.slowThresholdMs = options.slowThresholdMs ?? 1000;
  }

  async invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult> {
    const start = this.clock.now();
    const meta = {
      typeId: message.typeId,
      kind: message.kind,
      dispatchId: context.dispatchId,
      correlationId: context.correlationId,
    };

    this.logger.debug('Dispatch started', meta);

    const result = await next(message, context);
    const duration = this.clock.now() - start;

    if (result.kind === 'ok') {
      this.logger.info('Dispatch succeeded', { ...meta, duration });
    } else {
      const { code, message: reason } = toErrorPayload(result.error);
      this.logger.warn('Dispatch failed', { ...meta, duration, code, error: reason });
    }

    if (duration > this.slowThresholdMs) {
      this.logger.warn('Slow dispatch', { ...meta, duration, thresholdMs: this.slowThresholdMs });
    }

    return result;
  }
}
