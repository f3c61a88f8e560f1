/**
 * Query result cache stage.
 *
 * Queries that carry a `cacheKey` (or every query, with `cacheAll`) are
 * served from an {@link IQueryCache} under
 * `<prefix>:<typeId>:<cacheKey>`. With `cacheAll`, a query without its own
 * key is keyed by the fingerprint of its fields. Commands pass through.
 *
 * Only `Ok` results are cached, and never one a fallback produced. A cache
 * that fails is logged and bypassed.
 */

import type { IMessage } from '../../domain/messages';
import { isQuery } from '../../domain/messages';
import { toError } from '../../domain/result';
import type { DispatchContext } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';
import { noopLogger, type ILogger } from '../../application/logging';
import type { IQueryCache } from '../cache';
import { fingerprintMessage } from '../idempotency';
import { FALLBACK_USED } from './FallbackMiddleware';

export interface QueryCacheMiddlewareOptions {
  /** Default lifetime of a cached result, in milliseconds */
  ttl: number;

  /** Per-`typeId` lifetimes */
  ttlByType?: Record<string, number>;

  /** @defaultValue 'query' */
  keyPrefix?: string;

  /**
   * Cache queries without a `cacheKey`, keyed by their fingerprint.
   * @defaultValue false
   */
  cacheAll?: boolean;

  logger?: ILogger;
}

export class QueryCacheMiddleware implements IDispatchMiddleware {
  readonly name = 'query-cache';

  private readonly ttl: number;
  private readonly ttlByType: Record<string, number>;
  private readonly keyPrefix: string;
  private readonly cacheAll: boolean;
  private readonly logger: ILogger;

  constructor(
    private readonly cache: IQueryCache,
    options: QueryCacheMiddlewareOptions,
  ) {
    this.ttl = options.ttl;
    this.ttlByType = { ...options.ttlByType };
    this.keyPrefix = options.keyPrefix ?? 'query';
    this.cacheAll = options.cacheAll ?? false;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Cache key of `message`, or `undefined` when it is not cached.
   */
  keyFor(message: IMessage): string | undefined {
    if (!isQuery(message)) {
      return undefined;
    }
    const own = message.cacheKey ?? (this.cacheAll ? fingerprintMessage(message) : undefined);
    return own === undefined ? undefined : `${this.keyPrefix}:${message.typeId}:${own}`;
  }

  async invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult> {
    const key = this.keyFor(message);
    if (key === undefined) {
      return next(message, context);
    }

    const cached = await this.read(key);
    if (cached) {
      this.logger.debug('Query cache hit', { key, dispatchId: context.dispatchId });
      return cached;
    }

    const result = await next(message, context);
    if (result.kind === 'ok' && context.items.get(FALLBACK_USED) !== true) {
      await this.write(key, result, this.ttlByType[message.typeId] ?? this.ttl);
    }
    return result;
  }

  private async read(key: string): Promise<DispatchResult | undefined> {
    try {
      return await this.cache.get(key);
    } catch (thrown) {
      this.logger.warn('Query cache read failed', { key, error: toError(thrown).message });
      return undefined;
    }
  }

  private async write(key: string, result: DispatchResult, ttl: number): Promise<void> {
    try {
      await this.cache.set(key, result, ttl);
    } catch (thrown) {
      this.logger.warn('Query cache write failed', { key, error: toError(thrown).message });
    }
  }
}
