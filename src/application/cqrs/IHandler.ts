/**
 * Handler Interfaces
 *
 * A handler receives a message plus the {@link DispatchContext} of the
 * current dispatch and returns a `Result`. Handlers may be plain functions
 * or objects with a `handle` method.
 *
 * @module application/cqrs/IHandler
 */

import type { ICommand, IMessage, IQuery, MessageKind } from '../../domain/messages';
import type { Result } from '../../domain/result';
import type { ILogger } from '../logging';

/**
 * Per-dispatch context handed to every middleware stage and to the handler.
 *
 * Stages never mutate it; a stage that changes something for the stages
 * inside it (signal, attempt) passes a derived copy to `next`. `items` is
 * shared by every stage of one dispatch.
 */
export interface DispatchContext {
  /** Unique id of this dispatch (uuid v4) */
  readonly dispatchId: string;

  readonly typeId: string;

  readonly kind: MessageKind;

  /** Clock reading when the dispatch started */
  readonly startedAt: number;

  /**
   * Correlation id shared by every dispatch caused by one inbound request.
   */
  readonly correlationId: string;

  /**
   * Message id of the dispatch whose handler issued this one.
   */
  readonly causationId?: string;

  /**
   * Aborted when the caller cancels or a timeout stage fires.
   */
  readonly signal?: AbortSignal;

  /**
   * Retries performed so far; 0 on the original call.
   */
  readonly attempt: number;

  /**
   * Scratch space shared by the stages of one dispatch.
   */
  readonly items: Map<string, unknown>;
}

/**
 * Alias used in handler signatures.
 */
export type HandlerContext = DispatchContext;

/**
 * What a handler may return.
 */
export type HandlerReturn<TResult> = Result<TResult, Error> | Promise<Result<TResult, Error>>;

/**
 * Object-style handler.
 *
 * @template TMessage - Message type handled
 * @template TResult - Success value type
 *
 * @example
 * ```typescript
 * class PlaceOrderHandler implements IMessageHandler<PlaceOrderCommand, string> {
 *   constructor(private readonly orders: OrderRepository) {}
 *
 *   async handle(command: PlaceOrderCommand): Promise<Result<string, Error>> {
 *     const order = Order.place(command.customerId, command.sku, command.quantity);
 *     await this.orders.save(order);
 *     return ok(order.id);
 *   }
 * }
 * ```
 */
export interface IMessageHandler<TMessage extends IMessage, TResult = unknown> {
  handle(message: TMessage, context: HandlerContext): HandlerReturn<TResult>;
}

/**
 * Function-style handler.
 */
export type HandlerFunction<TMessage extends IMessage, TResult = unknown> = (
  message: TMessage,
  context: HandlerContext,
) => HandlerReturn<TResult>;

export type Handler<TMessage extends IMessage, TResult = unknown> =
  | IMessageHandler<TMessage, TResult>
  | HandlerFunction<TMessage, TResult>;

export type ICommandHandler<TCommand extends ICommand<TResult>, TResult = void> = IMessageHandler<
  TCommand,
  TResult
>;

export type IQueryHandler<TQuery extends IQuery<TResult>, TResult = unknown> = IMessageHandler<
  TQuery,
  TResult
>;

/**
 * Abstract base for object handlers that want start/finish logging.
 *
 * @example
 * ```typescript
 * class RenameUserHandler extends MessageHandlerBase<RenameUserCommand, void> {
 *   constructor(logger: ILogger, private readonly users: UserRepository) {
 *     super(logger);
 *   }
 *
 *   protected async doHandle(command: RenameUserCommand): Promise<Result<void, Error>> {
 *     await this.users.rename(command.userId, command.name);
 *     return ok(undefined);
 *   }
 * }
 * ```
 */
export abstract class MessageHandlerBase<TMessage extends IMessage<TResult>, TResult = unknown>
  implements IMessageHandler<TMessage, TResult>
{
  protected constructor(protected readonly logger: ILogger) {}

  async handle(message: TMessage, context: HandlerContext): Promise<Result<TResult, Error>> {
    const startTime = Date.now();
    const meta = {
      typeId: message.typeId,
      dispatchId: context.dispatchId,
      correlationId: context.correlationId,
    };

    this.logger.debug(`Handling ${message.typeId}`, meta);

    const result = await this.doHandle(message, context);
    const duration = Date.now() - startTime;

    if (result.kind === 'ok') {
      this.logger.debug(`${message.typeId} handled`, { ...meta, duration });
    } else {
      this.logger.warn(`${message.typeId} failed`, {
        ...meta,
        duration,
        error: result.error.message,
      });
    }

    return result;
  }

  protected abstract doHandle(
    message: TMessage,
    context: HandlerContext,
  ): Promise<Result<TResult, Error>>;
}
