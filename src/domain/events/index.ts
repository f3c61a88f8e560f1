/**
 * @fileoverview Domain Event Exports
 * @module resilient-dispatch/domain/events
 */

export { AggregateRoot, isEventRaisingEntity } from './IDomainEvent';

export type {
  EventMetadata,
  IDomainEvent,
  IEventRaisingEntity,
  IEventPublisher,
} from './IDomainEvent';
