/**
 * @file Reference Pipeline Integration Tests
 * @description Validation, retry, circuit breaking and timeouts wired by the bus factories
 */

import { z } from 'zod';
import {
  BulkheadFullError,
  CircuitBreakerRegistry,
  CircuitOpenError,
  CircuitState,
  InMemoryMetricsCollector,
  InMemoryQueryCache,
  ManualClock,
  TimeoutError,
  TransientError,
  ValidationError,
  createCommandBus,
  createQueryBus,
  err,
  noopLogger,
  ok,
  zodValidator,
  type DispatchConfigInput,
  type DispatchRuntime,
  type Result,
} from '../../../src';
import { deferred, getOrder, placeOrder, type GetOrder, type PlaceOrder } from '../../helpers/dispatch';
import { Order } from '../../helpers/orders';

describe('Reference pipeline', () => {
  // ============================================================================
  // TEST GROUP 1: Stage order
  // ============================================================================

  describe('Stage order', () => {
    it('should wire the command pipeline outermost first', () => {
      const bus = createCommandBus({}, { logger: noopLogger });

      expect(bus.pipeline).toEqual(['logging', 'idempotency', 'validation', 'retry', 'circuit-breaker']);
    });

    it('should leave idempotency out of the query pipeline', () => {
      const bus = createQueryBus({ logging: { enabled: false } }, { logger: noopLogger });

      expect(bus.pipeline).toEqual(['validation', 'retry', 'circuit-breaker']);
    });

    it('should add the timeout stage innermost when a budget is configured', () => {
      const bus = createCommandBus(
        { idempotency: { enabled: false }, timeout: { timeouts: { 'orders.place': 100 } } },
        { logger: noopLogger },
      );

      expect(bus.pipeline).toEqual(['logging', 'validation', 'retry', 'circuit-breaker', 'timeout']);
    });

    it('should place the optional stages when they are switched on', () => {
      const runtime: DispatchRuntime = {
        logger: noopLogger,
        metricsCollector: new InMemoryMetricsCollector(),
        fallbacks: { 'orders.get': () => ok(null) },
      };
      const config: DispatchConfigInput = {
        queryCache: { enabled: true },
        bulkhead: { enabled: true },
        timeout: { timeoutMs: 100 },
      };

      expect(createCommandBus(config, runtime).pipeline).toEqual([
        'logging',
        'metrics',
        'idempotency',
        'validation',
        'fallback',
        'retry',
        'circuit-breaker',
        'bulkhead',
        'timeout',
      ]);
      expect(createQueryBus(config, runtime).pipeline).toEqual([
        'logging',
        'metrics',
        'query-cache',
        'validation',
        'fallback',
        'retry',
        'circuit-breaker',
        'bulkhead',
        'timeout',
      ]);
    });

    it('should leave the metrics stage out without a collector', () => {
      const bus = createQueryBus({ logging: { enabled: false } }, { logger: noopLogger });

      expect(bus.pipeline).not.toContain('metrics');
    });
  });

  // ============================================================================
  // TEST GROUP 2: Retry and circuit breaking
  // ============================================================================

  describe('Retry and circuit breaking', () => {
    let clock: ManualClock;

    const busWith = (config: DispatchConfigInput, runtime: DispatchRuntime = {}) =>
      createCommandBus(
        { logging: { enabled: false }, ...config, retry: { jitterMax: 0, ...config.retry } },
        { clock, logger: noopLogger, ...runtime },
      );

    beforeEach(() => {
      clock = new ManualClock({ autoAdvance: true });
    });

    it('should retry a transient failure with doubling delays and return the original error', async () => {
      const failure = new TransientError('warehouse unavailable');
      const handler = jest.fn(async (_command: PlaceOrder): Promise<Result<string, Error>> => err(failure));
      const bus = busWith({ circuitBreaker: { failureThreshold: 10 } });
      bus.register('orders.place', handler);

      const result = await bus.dispatch(placeOrder());

      expect(result.unwrapErr()).toBe(failure);
      expect(handler).toHaveBeenCalledTimes(4);
      expect(clock.sleeps).toEqual([100, 200, 400]);
    });

    it('should stop retrying once the breaker opens', async () => {
      const handler = jest.fn(
        async (_command: PlaceOrder): Promise<Result<string, Error>> => err(new TransientError('down')),
      );
      const bus = busWith({ circuitBreaker: { failureThreshold: 2 } });
      bus.register('orders.place', handler);

      const result = await bus.dispatch(placeOrder());

      expect(handler).toHaveBeenCalledTimes(2);
      expect(clock.sleeps).toEqual([100, 200]);
      expect(result).toBeErrOf(CircuitOpenError);
      const error = result.unwrapErr();
      expect(error instanceof CircuitOpenError && error.retryAfterMs).toBe(29_800);
    });

    it('should keep breakers apart per message type', async () => {
      const breakers = new CircuitBreakerRegistry({ defaults: { failureThreshold: 1 } }, { clock });
      const bus = busWith({ retry: { maxAttempts: 0 } }, { breakers });
      bus.register('orders.place', async (): Promise<Result<string, Error>> => err(new TransientError('down')));
      bus.register('orders.cancel', async () => ok('cancelled'));

      await bus.dispatch(placeOrder());
      const cancel = await bus.dispatch({ typeId: 'orders.cancel', kind: 'command' });

      expect(cancel).toBeOk('cancelled');
      expect(breakers.get('handler:orders.place').state).toBe(CircuitState.Open);
      expect(breakers.get('handler:orders.cancel').state).toBe(CircuitState.Closed);
    });

    it('should apply per-breaker overrides from the configuration', async () => {
      const handler = jest.fn(
        async (_command: PlaceOrder): Promise<Result<string, Error>> => err(new TransientError('down')),
      );
      const bus = busWith({
        retry: { maxAttempts: 0 },
        circuitBreaker: { overrides: { 'handler:orders.place': { failureThreshold: 1 } } },
      });
      bus.register('orders.place', handler);

      await bus.dispatch(placeOrder());
      const second = await bus.dispatch(placeOrder());

      expect(second).toBeErrOf(CircuitOpenError);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should report retries through the runtime hook', async () => {
      const onRetry = jest.fn();
      const bus = busWith({ retry: { maxAttempts: 1 } }, { onRetry });
      bus.register('orders.place', async (): Promise<Result<string, Error>> => err(new TransientError('down')));

      await bus.dispatch(placeOrder());

      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(onRetry.mock.calls[0]?.[1]).toMatchObject({ attempt: 0, delay: 100 });
    });
  });

  // ============================================================================
  // TEST GROUP 3: Validation
  // ============================================================================

  describe('Validation', () => {
    it('should reject invalid input before retry, breaker or handler', async () => {
      const clock = new ManualClock({ autoAdvance: true });
      const handler = jest.fn(async () => ok('placed'));
      const bus = createCommandBus(
        { logging: { enabled: false } },
        {
          clock,
          logger: noopLogger,
          validators: {
            'orders.place': zodValidator(z.object({ quantity: z.number().int().positive() })),
          },
        },
      );
      bus.register('orders.place', handler);

      const result = await bus.dispatch(placeOrder({ quantity: 0 }));

      expect(result).toBeErrOf(ValidationError);
      expect(handler).not.toHaveBeenCalled();
      expect(clock.sleeps).toEqual([]);
    });
  });

  // ============================================================================
  // TEST GROUP 4: Timeouts
  // ============================================================================

  describe('Timeouts', () => {
    it('should time out a slow query and count it against the breaker', async () => {
      const clock = new ManualClock();
      const breakers = new CircuitBreakerRegistry({ defaults: { failureThreshold: 1 } }, { clock });
      const bus = createQueryBus(
        { logging: { enabled: false }, retry: { maxAttempts: 0 }, timeout: { timeoutMs: 250 } },
        { clock, logger: noopLogger, breakers },
      );
      bus.register('orders.get', (_query: GetOrder) => new Promise<Result<{ id: string; sku: string }, Error>>(() => undefined));

      const pending = bus.dispatch(getOrder());
      await flushPromises();
      clock.advance(250);
      const result = await pending;

      expect(result).toBeErrOf(TimeoutError);
      expect(breakers.get('handler:orders.get').state).toBe(CircuitState.Open);
    });
  });

  // ============================================================================
  // TEST GROUP 5: Query cache, fallback and bulkhead
  // ============================================================================

  describe('Query cache, fallback and bulkhead', () => {
    it('should serve cached queries until a published event invalidates them', async () => {
      const clock = new ManualClock({ autoAdvance: true });
      const queryCache = new InMemoryQueryCache(clock);
      const config: DispatchConfigInput = {
        logging: { enabled: false },
        idempotency: { enabled: false },
        queryCache: {
          enabled: true,
          invalidation: { OrderCancelled: ['query:orders.get:order:{orderId}'] },
        },
      };
      const queries = createQueryBus(config, { clock, logger: noopLogger, queryCache });
      const commands = createCommandBus(config, { clock, logger: noopLogger, queryCache });
      const lookups = jest.fn(async (query: GetOrder) => ok({ id: query.orderId, sku: 'SKU-42' }));
      const order = Order.place('o-1', 'SKU-42', 1);
      order.clearEvents();
      queries.register('orders.get', lookups);
      commands.register('orders.cancel', async () => {
        order.cancel('customer request');
        return ok(order);
      });
      const query: GetOrder = { ...getOrder('o-1'), cacheKey: 'order:o-1' };

      await queries.dispatch(query);
      await queries.dispatch(query);
      expect(lookups).toHaveBeenCalledTimes(1);

      await commands.dispatch({ typeId: 'orders.cancel', kind: 'command' });
      await queries.dispatch(query);

      expect(lookups).toHaveBeenCalledTimes(2);
      expect(order.domainEvents).toEqual([]);
    });

    it('should fall back once retries are spent and not cache the fallback', async () => {
      const clock = new ManualClock({ autoAdvance: true });
      const queryCache = new InMemoryQueryCache(clock);
      const bus = createQueryBus(
        {
          logging: { enabled: false },
          retry: { maxAttempts: 1, jitterMax: 0 },
          queryCache: { enabled: true },
        },
        {
          clock,
          logger: noopLogger,
          queryCache,
          fallbacks: { 'orders.get': () => ok({ id: 'o-1', sku: 'unknown' }) },
        },
      );
      const handler = jest.fn(async (_query: GetOrder) => err(new TransientError('db down')));
      bus.register('orders.get', handler);

      const query: GetOrder = { ...getOrder('o-1'), cacheKey: 'order:o-1' };
      const result = await bus.dispatch(query);

      expect(result).toBeOk({ id: 'o-1', sku: 'unknown' });
      expect(handler).toHaveBeenCalledTimes(2);
      expect(queryCache.size).toBe(0);
    });

    it('should turn away calls beyond the bulkhead without tripping the breaker', async () => {
      const clock = new ManualClock();
      const breakers = new CircuitBreakerRegistry({ defaults: { failureThreshold: 1 } }, { clock });
      const bus = createCommandBus(
        {
          logging: { enabled: false },
          retry: { maxAttempts: 0 },
          bulkhead: { enabled: true, maxWaitMs: 0, limits: { 'orders.place': 1 } },
        },
        { clock, logger: noopLogger, breakers },
      );
      const gate = deferred<Result<string, Error>>();
      bus.register('orders.place', (_command: PlaceOrder) => gate.promise);

      const first = bus.dispatch(placeOrder());
      await flushPromises();
      const second = await bus.dispatch(placeOrder());

      expect(second).toBeErrOf(BulkheadFullError);
      expect(breakers.get('handler:orders.place').state).toBe(CircuitState.Closed);

      gate.resolve(ok('placed'));
      expect(await first).toBeOk('placed');
    });
  });
});
