/**
 * Message Bus Interfaces
 *
 * Buses route a message to the one handler registered for its `typeId`
 * through the configured middleware pipeline. `dispatch` never rejects:
 * every outcome, including unexpected faults, comes back as a `Result`.
 *
 * @module application/cqrs/IMessageBus
 */

import type { ICommand, IMessage, IQuery, MessageKind } from '../../domain/messages';
import type { Result } from '../../domain/result';
import type { Handler } from './IHandler';

/**
 * Per-call dispatch options.
 */
export interface DispatchOptions {
  /**
   * Caller-side cancellation. An abort ends the dispatch with
   * `Err(CancelledError)`.
   */
  signal?: AbortSignal;

  /**
   * Correlation id for this dispatch. Defaults to the message's own, then
   * to the enclosing dispatch's, then to a fresh uuid.
   */
  correlationId?: string;
}

/**
 * IMessageBus - Registration and dispatch for one message kind.
 */
export interface IMessageBus<TBase extends IMessage = IMessage> {
  readonly kind: MessageKind;

  /**
   * Register the handler for `typeId`.
   *
   * @throws DuplicateHandlerError when `typeId` already has a handler
   * @throws RegistrationClosedError once the bus has dispatched
   */
  register<TMessage extends TBase, TResult = unknown>(
    typeId: string,
    handler: Handler<TMessage, TResult>,
  ): void;

  hasHandler(typeId: string): boolean;

  /**
   * Route `message` to its handler through the pipeline.
   *
   * @example
   * ```typescript
   * const result = await commandBus.dispatch(new PlaceOrderCommand('cust-1', 'SKU-42', 2));
   *
   * result.match({
   *   ok: (orderId) => reply(201, { orderId }),
   *   err: (error) => reply(toErrorPayload(error).statusCode, toErrorPayload(error)),
   * });
   * ```
   */
  dispatch<TResult>(message: IMessage<TResult>, options?: DispatchOptions): Promise<Result<TResult, Error>>;
}

export type ICommandBus = IMessageBus<ICommand<unknown>>;

export type IQueryBus = IMessageBus<IQuery<unknown>>;
