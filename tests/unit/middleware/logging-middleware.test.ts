/**
 * @fileoverview Unit tests for LoggingMiddleware
 */

import { ConflictError, LoggingMiddleware, ManualClock, err, ok } from '../../../src';
import { makeContext, messagesAt, mockNext, placeOrder, recordingLogger } from '../../helpers/dispatch';

describe('LoggingMiddleware', () => {
  const meta = {
    typeId: 'orders.place',
    kind: 'command',
    dispatchId: 'dispatch-1',
    correlationId: 'corr-1',
  };

  it('should log start and success with the duration', async () => {
    const clock = new ManualClock();
    const logger = recordingLogger();
    const middleware = new LoggingMiddleware({ logger, clock });
    const next = mockNext(async () => {
      clock.advance(40);
      return ok('order-1');
    });

    const result = await middleware.invoke(placeOrder(), makeContext(), next);

    expect(result).toBeOk('order-1');
    expect(logger.debug).toHaveBeenCalledWith('Dispatch started', meta);
    expect(logger.info).toHaveBeenCalledWith('Dispatch succeeded', { ...meta, duration: 40 });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should log failures with their error code', async () => {
    const logger = recordingLogger();
    const middleware = new LoggingMiddleware({ logger, clock: new ManualClock() });
    const next = mockNext(async () => err(new ConflictError('k', 'in-flight')));

    await middleware.invoke(placeOrder(), makeContext(), next);

    expect(logger.warn).toHaveBeenCalledWith('Dispatch failed', {
      ...meta,
      duration: 0,
      code: 'CONFLICT',
      error: "Request with idempotency key 'k' is already in progress",
    });
  });

  it('should warn about slow dispatches', async () => {
    const clock = new ManualClock();
    const logger = recordingLogger();
    const middleware = new LoggingMiddleware({ logger, clock, slowThresholdMs: 1_000 });
    const next = mockNext(async () => {
      clock.advance(1_500);
      return ok('late');
    });

    await middleware.invoke(placeOrder(), makeContext(), next);

    expect(messagesAt(logger, 'warn')).toEqual(['Slow dispatch']);
    expect(logger.warn).toHaveBeenCalledWith('Slow dispatch', {
      ...meta,
      duration: 1_500,
      thresholdMs: 1_000,
    });
  });
});
