/**
 * @file Idempotent Dispatch Integration Tests
 * @description At-most-once execution per idempotency key through the command bus
 *
 * CRITICAL GUARANTEES:
 * - Concurrent duplicates share one execution and one Result
 * - A cancelled caller never cancels the execution other callers wait for
 * - Every outcome is remembered, failures included; only cancellation frees a key
 */

import {
  CancelledError,
  ConflictError,
  FatalError,
  InMemoryIdempotencyStore,
  ManualClock,
  TransientError,
  ValidationError,
  createCommandBus,
  err,
  noopLogger,
  ok,
  type CommandBus,
  type DispatchConfigInput,
  type HandlerContext,
  type HandlerReturn,
  type Result,
} from '../../../src';
import { deferred, placeOrder, type PlaceOrder } from '../../helpers/dispatch';

describe('Idempotent dispatch', () => {
  let clock: ManualClock;
  let store: InMemoryIdempotencyStore;

  const busWith = (idempotency: NonNullable<DispatchConfigInput['idempotency']> = {}): CommandBus =>
    createCommandBus(
      { logging: { enabled: false }, retry: { maxAttempts: 0 }, idempotency },
      { clock, logger: noopLogger, idempotencyStore: store },
    );

  beforeEach(() => {
    clock = new ManualClock();
    store = new InMemoryIdempotencyStore(clock);
  });

  // ============================================================================
  // TEST GROUP 1: Duplicates
  // ============================================================================

  describe('Duplicates', () => {
    it('should run concurrent duplicates once and hand both callers the same Result', async () => {
      const gate = deferred<Result<string, Error>>();
      const handler = jest.fn((_command: PlaceOrder) => gate.promise);
      const bus = busWith();
      bus.register('orders.place', handler);

      const first = bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));
      const second = bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));
      await flushPromises();
      expect(handler).toHaveBeenCalledTimes(1);

      gate.resolve(ok('order-1'));
      const [a, b] = await Promise.all([first, second]);

      expect(a).toBeOk('order-1');
      expect(b).toBe(a);

      const third = await bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));
      expect(third).toBe(a);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should reject a concurrent duplicate under the reject policy', async () => {
      const gate = deferred<Result<string, Error>>();
      const bus = busWith({ onInFlight: 'reject' });
      bus.register('orders.place', () => gate.promise);

      const first = bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));
      await flushPromises();
      const second = await bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));

      expect(second).toBeErrOf(ConflictError);
      const error = second.unwrapErr();
      expect(error instanceof ConflictError && error.reason).toBe('in-flight');

      gate.resolve(ok('order-1'));
      await expect(first).resolves.toBeOk('order-1');
    });

    it('should run again once the stored outcome expires', async () => {
      const handler = jest.fn(async (_command: PlaceOrder) => ok('order-1'));
      const bus = busWith();
      bus.register('orders.place', handler);

      await bus.dispatch(placeOrder({ idempotencyKey: 'k1', idempotencyTtl: 1_000 }));
      clock.advance(1_000);
      await bus.dispatch(placeOrder({ idempotencyKey: 'k1', idempotencyTtl: 1_000 }));
      clock.advance(1);
      await bus.dispatch(placeOrder({ idempotencyKey: 'k1', idempotencyTtl: 1_000 }));

      expect(handler).toHaveBeenCalledTimes(2);
    });
  });

  // ============================================================================
  // TEST GROUP 2: What is remembered
  // ============================================================================

  describe('Stored outcomes', () => {
    it('should remember terminal failures', async () => {
      const handler = jest.fn(
        async (_command: PlaceOrder): Promise<Result<string, Error>> => err(new ValidationError('sold out')),
      );
      const bus = busWith();
      bus.register('orders.place', handler);

      await bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));
      const again = await bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));

      expect(again.unwrapErr().message).toBe('sold out');
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should not run the handler again after a transient failure', async () => {
      let calls = 0;
      const bus = busWith();
      bus.register(
        'orders.place',
        async (_command: PlaceOrder): Promise<Result<string, Error>> =>
          ++calls === 1 ? err(new TransientError('warehouse down')) : ok('order-1'),
      );

      const failed = await bus.dispatch(placeOrder({ idempotencyKey: 'abc' }));
      const again = await bus.dispatch(placeOrder({ idempotencyKey: 'abc' }));

      expect(failed).toBeErrOf(TransientError);
      expect(again).toBe(failed);
      expect(calls).toBe(1);
    });

    it('should not run the handler again after it threw', async () => {
      let calls = 0;
      const bus = busWith();
      bus.register('orders.place', async (_command: PlaceOrder): Promise<Result<string, Error>> => {
        calls++;
        if (calls === 1) {
          throw new Error('crashed after charging the card');
        }
        return ok('order-1');
      });

      const crashed = await bus.dispatch(placeOrder({ idempotencyKey: 'abc' }));
      const again = await bus.dispatch(placeOrder({ idempotencyKey: 'abc' }));

      expect(crashed).toBeErrOf(FatalError);
      expect(again).toBe(crashed);
      expect(calls).toBe(1);
    });

    it('should hand a failure to waiters and remember it', async () => {
      const gate = deferred<Result<string, Error>>();
      const bus = busWith();
      bus.register('orders.place', () => gate.promise);

      const first = bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));
      const second = bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));
      await flushPromises();
      gate.resolve(err(new TransientError('down')));

      const [a, b] = await Promise.all([first, second]);
      expect(b).toBe(a);
      expect((await store.get('idem:orders.place:k1'))?.status).toBe('completed');
    });
  });

  // ============================================================================
  // TEST GROUP 3: Cancellation
  // ============================================================================

  describe('Cancellation', () => {
    it('should finish in the background for waiters when the first caller aborts', async () => {
      const gate = deferred<Result<string, Error>>();
      const handler = jest.fn((_command: PlaceOrder) => gate.promise);
      const bus = busWith();
      bus.register('orders.place', handler);
      const controller = new AbortController();

      const first = bus.dispatch(placeOrder({ idempotencyKey: 'k1' }), { signal: controller.signal });
      const second = bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));
      await flushPromises();
      controller.abort('caller left');

      await expect(first).resolves.toBeErrOf(CancelledError);

      gate.resolve(ok('order-1'));
      await expect(second).resolves.toBeOk('order-1');
      await expect(bus.dispatch(placeOrder({ idempotencyKey: 'k1' }))).resolves.toBeOk('order-1');
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should release the key under the release policy', async () => {
      let calls = 0;
      const bus = busWith({ cancellation: 'release' });
      bus.register('orders.place', (_command: PlaceOrder, context: HandlerContext): HandlerReturn<string> => {
        calls++;
        if (calls > 1) {
          return ok('order-1');
        }
        return new Promise<Result<string, Error>>((resolve) => {
          context.signal?.addEventListener('abort', () =>
            resolve(err(new CancelledError(context.signal?.reason))),
          );
        });
      });
      const controller = new AbortController();

      const first = bus.dispatch(placeOrder({ idempotencyKey: 'k1' }), { signal: controller.signal });
      await flushPromises();
      controller.abort('caller left');
      await expect(first).resolves.toBeErrOf(CancelledError);
      await flushPromises();

      const second = await bus.dispatch(placeOrder({ idempotencyKey: 'k1' }));

      expect(second).toBeOk('order-1');
      expect(calls).toBe(2);
    });
  });
});
