/**
 * @fileoverview Unit tests for CircuitBreakerMiddleware
 */

import {
  CircuitBreakerMiddleware,
  CircuitBreakerRegistry,
  CircuitOpenError,
  CircuitState,
  ManualClock,
  TransientError,
  defaultBreakerName,
  err,
} from '../../../src';
import { makeContext, mockNext, placeOrder } from '../../helpers/dispatch';

describe('CircuitBreakerMiddleware', () => {
  const clock = new ManualClock();

  it('should keep one breaker per message type', async () => {
    const registry = new CircuitBreakerRegistry({ defaults: { failureThreshold: 1 } }, { clock });
    const middleware = new CircuitBreakerMiddleware(registry);
    const next = mockNext(async () => err(new TransientError('down')));

    await middleware.invoke(placeOrder(), makeContext(), next);
    const second = await middleware.invoke(placeOrder(), makeContext(), next);

    expect(second).toBeErrOf(CircuitOpenError);
    expect(next).toHaveBeenCalledTimes(1);
    expect(registry.get('handler:orders.place').state).toBe(CircuitState.Open);
    expect(defaultBreakerName(placeOrder())).toBe('handler:orders.place');
  });

  it('should accept a custom breaker name', async () => {
    const registry = new CircuitBreakerRegistry({}, { clock });
    const middleware = new CircuitBreakerMiddleware(registry, { breakerName: () => 'dependency:warehouse' });

    await middleware.invoke(placeOrder(), makeContext(), mockNext());

    expect(registry.names()).toEqual(['dependency:warehouse']);
  });
});
