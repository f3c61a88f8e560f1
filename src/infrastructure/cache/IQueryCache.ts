/**
 * Query result cache port.
 *
 * Backed by memory here; a Redis implementation fits the same contract.
 *
 * @module infrastructure/cache/IQueryCache
 */

import type { DispatchResult } from '../../application/cqrs/IDispatchMiddleware';

export interface IQueryCache {
  /**
   * Cached result, or `undefined` when absent or expired.
   */
  get(key: string): Promise<DispatchResult | undefined>;

  set(key: string, result: DispatchResult, ttlMs: number): Promise<void>;

  delete(key: string): Promise<boolean>;

  clear(): Promise<void>;

  /**
   * Delete every key matching `pattern`, where `*` matches any run of
   * characters (e.g. `'query:orders.get:*'`).
   *
   * @returns number of keys deleted
   */
  clearPattern(pattern: string): Promise<number>;
}
