/**
 * Query result caching and event-driven invalidation.
 */

export type { IQueryCache } from './IQueryCache';

export { InMemoryQueryCache, wildcardToRegExp } from './InMemoryQueryCache';
export type { QueryCacheStats } from './InMemoryQueryCache';

export { QueryCacheInvalidator, expandPattern } from './QueryCacheInvalidator';
export type { QueryCacheInvalidatorOptions } from './QueryCacheInvalidator';
