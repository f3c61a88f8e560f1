import type { IQuery } from '../../domain/messages';
import type { IQueryBus } from '../../application/cqrs/IMessageBus';
import { MessageBus, type MessageBusOptions } from './MessageBus';

/**
 * Query bus. Queries never carry idempotency keys, so the reference query
 * pipeline has no idempotency stage.
 */
export class QueryBus extends MessageBus<IQuery<unknown>> implements IQueryBus {
  constructor(options: MessageBusOptions = {}) {
    super('query', options);
  }
}
