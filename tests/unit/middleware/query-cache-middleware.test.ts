/**
 * @fileoverview Unit tests for QueryCacheMiddleware
 */

import {
  FALLBACK_USED,
  InMemoryQueryCache,
  ManualClock,
  QueryCacheMiddleware,
  TransientError,
  err,
  ok,
  type IQueryCache,
} from '../../../src';
import {
  getOrder,
  makeContext,
  messagesAt,
  mockNext,
  placeOrder,
  recordingLogger,
  type GetOrder,
} from '../../helpers/dispatch';

describe('QueryCacheMiddleware', () => {
  let clock: ManualClock;
  let cache: InMemoryQueryCache;

  beforeEach(() => {
    clock = new ManualClock();
    cache = new InMemoryQueryCache(clock);
  });

  const queryContext = () => makeContext({ typeId: 'orders.get', kind: 'query' });
  const keyed = (orderId: string): GetOrder => ({ ...getOrder(orderId), cacheKey: `order:${orderId}` });

  it('should serve a repeated keyed query from the cache', async () => {
    const middleware = new QueryCacheMiddleware(cache, { ttl: 1_000 });
    const next = mockNext(async () => ok({ id: 'order-1', sku: 'SKU-42' }));

    const first = await middleware.invoke(keyed('order-1'), queryContext(), next);
    const second = await middleware.invoke(keyed('order-1'), queryContext(), next);

    expect(first).toBeOk({ id: 'order-1', sku: 'SKU-42' });
    expect(second).toBe(first);
    expect(next).toHaveBeenCalledTimes(1);
    expect(middleware.keyFor(keyed('order-1'))).toBe('query:orders.get:order:order-1');
  });

  it('should leave queries without a key and commands uncached', async () => {
    const middleware = new QueryCacheMiddleware(cache, { ttl: 1_000 });
    const next = mockNext();

    await middleware.invoke(getOrder(), queryContext(), next);
    await middleware.invoke(getOrder(), queryContext(), next);

    expect(next).toHaveBeenCalledTimes(2);
    expect(middleware.keyFor(getOrder())).toBeUndefined();
    expect(middleware.keyFor(placeOrder())).toBeUndefined();
  });

  it('should key every query by its fingerprint with cacheAll', async () => {
    const middleware = new QueryCacheMiddleware(cache, { ttl: 1_000, cacheAll: true, keyPrefix: 'q' });
    const next = mockNext();

    await middleware.invoke(getOrder('order-1'), queryContext(), next);
    await middleware.invoke(getOrder('order-1'), queryContext(), next);
    await middleware.invoke(getOrder('order-2'), queryContext(), next);

    expect(next).toHaveBeenCalledTimes(2);
    expect(middleware.keyFor(getOrder())).toMatch(/^q:orders\.get:[0-9a-f]{64}$/);
  });

  it('should expire entries after the per-type lifetime', async () => {
    const middleware = new QueryCacheMiddleware(cache, { ttl: 60_000, ttlByType: { 'orders.get': 500 } });
    const next = mockNext();

    await middleware.invoke(keyed('order-1'), queryContext(), next);
    clock.advance(500);
    await middleware.invoke(keyed('order-1'), queryContext(), next);
    clock.advance(1);
    await middleware.invoke(keyed('order-1'), queryContext(), next);

    expect(next).toHaveBeenCalledTimes(2);
  });

  it('should not cache failures or fallback answers', async () => {
    const middleware = new QueryCacheMiddleware(cache, { ttl: 1_000 });
    const failing = mockNext(async () => err(new TransientError('down')));
    const degraded = mockNext(async (_message, context) => {
      context.items.set(FALLBACK_USED, true);
      return ok('stale');
    });

    await middleware.invoke(keyed('order-1'), queryContext(), failing);
    await middleware.invoke(keyed('order-1'), queryContext(), failing);
    await middleware.invoke(keyed('order-2'), queryContext(), degraded);
    await middleware.invoke(keyed('order-2'), queryContext(), degraded);

    expect(failing).toHaveBeenCalledTimes(2);
    expect(degraded).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it('should bypass a cache that fails', async () => {
    const logger = recordingLogger();
    const broken: IQueryCache = {
      get: jest.fn(async () => {
        throw new Error('connection refused');
      }),
      set: jest.fn(async () => {
        throw new Error('connection refused');
      }),
      delete: jest.fn(async () => false),
      clear: jest.fn(async () => undefined),
      clearPattern: jest.fn(async () => 0),
    };
    const middleware = new QueryCacheMiddleware(broken, { ttl: 1_000, logger });

    const result = await middleware.invoke(keyed('order-1'), queryContext(), mockNext());

    expect(result).toBeOk('handled');
    expect(messagesAt(logger, 'warn')).toEqual(['Query cache read failed', 'Query cache write failed']);
  });
});
