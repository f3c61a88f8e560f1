/**
 * Event-driven query cache invalidation.
 *
 * Wraps the command bus's event publisher: every published domain event
 * clears the cache patterns registered for its `eventName`, then the
 * events go on to the inner publisher (if any).
 *
 * A pattern may reference payload fields as `{field}`; a field that is
 * missing or not a string/number becomes `*`.
 *
 * @example
 * ```typescript
 * const invalidator = new QueryCacheInvalidator(cache, {
 *   rules: {
 *     'orders.placed': ['query:orders.list:*'],
 *     'orders.cancelled': ['query:orders.get:order:{orderId}', 'query:orders.list:*'],
 *   },
 *   publisher: outbox,
 * });
 * ```
 */

import type { IDomainEvent, IEventPublisher } from '../../domain/events';
import { noopLogger, type ILogger } from '../../application/logging';
import type { IQueryCache } from './IQueryCache';

export interface QueryCacheInvalidatorOptions {
  /** Event name → key patterns to clear */
  rules: Record<string, readonly string[]>;

  /** Receives the events after invalidation */
  publisher?: IEventPublisher;

  logger?: ILogger;
}

export class QueryCacheInvalidator implements IEventPublisher {
  private readonly rules: Record<string, readonly string[]>;
  private readonly publisher?: IEventPublisher;
  private readonly logger: ILogger;

  constructor(
    private readonly cache: IQueryCache,
    options: QueryCacheInvalidatorOptions,
  ) {
    this.rules = { ...options.rules };
    this.publisher = options.publisher;
    this.logger = options.logger ?? noopLogger;
  }

  async publishAll(events: readonly IDomainEvent[]): Promise<void> {
    for (const event of events) {
      await this.invalidate(event);
    }
    if (this.publisher) {
      await this.publisher.publishAll(events);
    }
  }

  /**
   * Clear the patterns registered for `event`.
   *
   * @returns number of keys cleared
   */
  async invalidate(event: IDomainEvent): Promise<number> {
    const patterns = this.rules[event.eventName] ?? [];
    let cleared = 0;

    for (const template of patterns) {
      const pattern = expandPattern(template, event.payload);
      const count = await this.cache.clearPattern(pattern);
      cleared += count;
      if (count > 0) {
        this.logger.debug('Query cache invalidated', {
          eventName: event.eventName,
          pattern,
          keysCleared: count,
        });
      }
    }

    return cleared;
  }
}

export function expandPattern(template: string, payload: unknown): string {
  return template.replace(/\{(\w+)\}/g, (_match, field: string) => {
    if (typeof payload !== 'object' || payload === null) {
      return '*';
    }
    const value: unknown = Reflect.get(payload, field);
    return typeof value === 'string' || typeof value === 'number' ? String(value) : '*';
  });
}
