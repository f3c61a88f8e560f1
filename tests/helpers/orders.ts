/**
 * Small order aggregate used by the event tests.
 */

import { AggregateRoot, type EventMetadata, type IDomainEvent } from '../../src';

export interface OrderPlacedPayload {
  orderId: string;
  sku: string;
  quantity: number;
}

export class OrderPlacedEvent implements IDomainEvent<OrderPlacedPayload> {
  readonly eventName = 'OrderPlaced';
  readonly metadata: EventMetadata;

  constructor(
    readonly payload: OrderPlacedPayload,
    eventId = `evt-${payload.orderId}-placed`,
  ) {
    this.metadata = { eventId, occurredAt: '2026-01-01T00:00:00.000Z' };
  }
}

export class OrderCancelledEvent implements IDomainEvent<{ orderId: string; reason: string }> {
  readonly eventName = 'OrderCancelled';
  readonly metadata: EventMetadata;

  constructor(readonly payload: { orderId: string; reason: string }) {
    this.metadata = { eventId: `evt-${payload.orderId}-cancelled`, occurredAt: '2026-01-01T00:00:01.000Z' };
  }
}

export class Order extends AggregateRoot {
  private cancelled = false;

  private constructor(
    readonly id: string,
    readonly sku: string,
    readonly quantity: number,
  ) {
    super();
  }

  static place(id: string, sku: string, quantity: number): Order {
    const order = new Order(id, sku, quantity);
    order.raiseEvent(new OrderPlacedEvent({ orderId: id, sku, quantity }));
    return order;
  }

  cancel(reason: string): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.raiseEvent(new OrderCancelledEvent({ orderId: this.id, reason }));
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }
}
