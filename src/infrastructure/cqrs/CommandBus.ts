/**
 * Command bus.
 *
 * Besides routing, publishes the domain events of an event-raising entity
 * returned by a successful command, then clears them from the entity.
 */

import { isEventRaisingEntity, type IEventPublisher } from '../../domain/events';
import type { ICommand, IMessage } from '../../domain/messages';
import type { DispatchResult } from '../../application/cqrs/IDispatchMiddleware';
import type { ICommandBus } from '../../application/cqrs/IMessageBus';
import { MessageBus, type MessageBusOptions } from './MessageBus';

export interface CommandBusOptions extends MessageBusOptions {
  /** Receives the domain events raised by successful commands */
  eventPublisher?: IEventPublisher;
}

export class CommandBus extends MessageBus<ICommand<unknown>> implements ICommandBus {
  private readonly eventPublisher?: IEventPublisher;

  constructor(options: CommandBusOptions = {}) {
    super('command', options);
    this.eventPublisher = options.eventPublisher;
  }

  /**
   * Publish pending events of the returned entity. A publisher failure is
   * logged and leaves both the Result and the entity's events untouched.
   */
  protected override async afterDispatch(message: IMessage, result: DispatchResult): Promise<void> {
    if (!this.eventPublisher || result.kind !== 'ok' || !isEventRaisingEntity(result.value)) {
      return;
    }

    const entity = result.value;
    const events = [...entity.domainEvents];
    if (events.length === 0) {
      return;
    }

    try {
      await this.eventPublisher.publishAll(events);
      entity.clearEvents();
      this.logger.debug('Domain events published', {
        typeId: message.typeId,
        count: events.length,
      });
    } catch (error) {
      this.logger.error('Failed to publish domain events', {
        typeId: message.typeId,
        count: events.length,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
