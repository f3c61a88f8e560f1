/**
 * Domain Event Abstractions
 *
 * Command handlers may return an aggregate that raised domain events. After
 * the command succeeds, the command bus publishes those events and clears
 * them from the aggregate.
 *
 * @module domain/events/IDomainEvent
 */

/**
 * Event metadata.
 */
export interface EventMetadata {
  /** Unique event identifier */
  eventId: string;

  /** ISO-8601 time the event occurred */
  occurredAt: string;

  /** Correlation ID of the dispatch that produced the event */
  correlationId?: string;

  /** ID of the message whose handler raised the event */
  causationId?: string;
}

/**
 * IDomainEvent - Something that happened in the domain.
 *
 * @template TPayload - Event payload type
 */
export interface IDomainEvent<TPayload = unknown> {
  readonly eventName: string;
  readonly metadata: EventMetadata;
  readonly payload: TPayload;
}

/**
 * An entity that buffers the events it raises until they are published.
 */
export interface IEventRaisingEntity {
  readonly domainEvents: readonly IDomainEvent[];
  clearEvents(): void;
}

/**
 * Outbound port the command bus publishes events through.
 */
export interface IEventPublisher {
  publishAll(events: readonly IDomainEvent[]): Promise<void>;
}

/**
 * Check whether a handler's success value carries domain events.
 */
export function isEventRaisingEntity(value: unknown): value is IEventRaisingEntity {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'domainEvents' in value &&
    Array.isArray(value.domainEvents) &&
    'clearEvents' in value &&
    typeof value.clearEvents === 'function'
  );
}

/**
 * Aggregate root base class with event raising.
 *
 * @example
 * ```typescript
 * class Order extends AggregateRoot {
 *   static place(id: string, total: number): Order {
 *     const order = new Order(id, total);
 *     order.raiseEvent(new OrderPlacedEvent({ orderId: id, total }));
 *     return order;
 *   }
 * }
 * ```
 */
export abstract class AggregateRoot implements IEventRaisingEntity {
  private _domainEvents: IDomainEvent[] = [];

  get domainEvents(): readonly IDomainEvent[] {
    return this._domainEvents;
  }

  protected raiseEvent(event: IDomainEvent): void {
    this._domainEvents.push(event);
  }

  clearEvents(): void {
    this._domainEvents = [];
  }
}
