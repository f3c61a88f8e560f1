/**
 * Message Abstractions (Commands and Queries)
 *
 * A message is an immutable value object routed by its `typeId`. Commands
 * express an intention to change state and may carry an idempotency key;
 * queries only read.
 *
 * @module domain/messages/IMessage
 * @see {@link https://martinfowler.com/bliki/CQRS.html | CQRS Pattern}
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Message category. Decides which bus accepts the message.
 */
export type MessageKind = 'command' | 'query';

/**
 * Message metadata for tracing and auditing.
 *
 * @example
 * ```typescript
 * const metadata: MessageMetadata = {
 *   messageId: '0b7d0c55-2f0e-4f55-8f0f-7a4f1f3b8e21',
 *   timestamp: new Date(),
 *   correlationId: 'trace-789',
 *   causationId: 'a-parent-message-id',
 * };
 * ```
 */
export interface MessageMetadata {
  /**
   * Unique identifier of this message instance.
   */
  readonly messageId: string;

  /**
   * When the message was created.
   */
  readonly timestamp: Date;

  /**
   * Correlation ID linking every message caused by one inbound request.
   */
  readonly correlationId?: string;

  /**
   * ID of the message whose handler produced this one.
   */
  readonly causationId?: string;
}

/**
 * IMessage - Base contract for everything dispatched through a bus.
 *
 * @template TResult - Result type produced by the message's handler
 *
 * @remarks
 * `__resultType` never exists at runtime. It lets `dispatch()` infer the
 * success type from the message alone.
 */
export interface IMessage<TResult = unknown> {
  /**
   * Stable type identifier used as the handler registry key
   * (e.g. `'orders.place'`).
   */
  readonly typeId: string;

  /**
   * Message category.
   */
  readonly kind: MessageKind;

  /**
   * Optional tracing metadata.
   */
  readonly metadata?: MessageMetadata;

  /**
   * Phantom property carrying the result type.
   * @internal
   */
  readonly __resultType?: TResult;
}

/**
 * ICommand - A message representing a write.
 *
 * @template TResult - Result type of the command
 *
 * @example
 * ```typescript
 * const command: ICommand<string> = {
 *   typeId: 'users.create',
 *   kind: 'command',
 *   idempotencyKey: 'signup-7f3a',
 * };
 *
 * const result = await commandBus.dispatch(command);
 * ```
 */
export interface ICommand<TResult = void> extends IMessage<TResult> {
  readonly kind: 'command';

  /**
   * Caller-supplied token. At most one effective execution happens per key
   * until its record expires.
   */
  readonly idempotencyKey?: string;

  /**
   * Lifetime of the stored result for this command, in milliseconds.
   * Overrides the per-type and default TTLs.
   */
  readonly idempotencyTtl?: number;
}

/**
 * IQuery - A read-only message.
 *
 * @template TResult - Result type of the query
 */
export interface IQuery<TResult = unknown> extends IMessage<TResult> {
  readonly kind: 'query';

  /**
   * Opts the query into result caching under this key (e.g. `'order:42'`).
   */
  readonly cacheKey?: string;
}

/**
 * Options accepted by the message base classes.
 */
export interface MessageOptions {
  correlationId?: string;
  causationId?: string;
}

/**
 * Options accepted by {@link CommandBase}.
 */
export interface CommandOptions extends MessageOptions {
  idempotencyKey?: string;
  idempotencyTtl?: number;
}

/**
 * Abstract base for class-style messages.
 *
 * Subclasses declare their `typeId` and payload fields as readonly
 * properties. Metadata is generated and frozen on construction.
 */
export abstract class MessageBase<TResult = unknown> implements IMessage<TResult> {
  abstract readonly typeId: string;
  abstract readonly kind: MessageKind;
  readonly metadata: MessageMetadata;

  /**
   * Phantom property for result type inference.
   * @internal
   */
  declare readonly __resultType?: TResult;

  protected constructor(options: MessageOptions = {}) {
    this.metadata = Object.freeze({
      messageId: uuidv4(),
      timestamp: new Date(),
      correlationId: options.correlationId,
      causationId: options.causationId,
    });
  }
}

/**
 * Abstract base class for commands.
 *
 * @example
 * ```typescript
 * class PlaceOrderCommand extends CommandBase<string> {
 *   readonly typeId = 'orders.place';
 *
 *   constructor(
 *     readonly customerId: string,
 *     readonly sku: string,
 *     readonly quantity: number,
 *     options?: CommandOptions,
 *   ) {
 *     super(options);
 *   }
 * }
 *
 * await commandBus.dispatch(
 *   new PlaceOrderCommand('cust-1', 'SKU-42', 2, { idempotencyKey: 'order-abc' }),
 * );
 * ```
 */
export abstract class CommandBase<TResult = void>
  extends MessageBase<TResult>
  implements ICommand<TResult>
{
  readonly kind = 'command' as const;
  readonly idempotencyKey?: string;
  readonly idempotencyTtl?: number;

  protected constructor(options: CommandOptions = {}) {
    super(options);
    this.idempotencyKey = options.idempotencyKey;
    this.idempotencyTtl = options.idempotencyTtl;
  }
}

/**
 * Abstract base class for queries.
 *
 * @example
 * ```typescript
 * class GetOrderQuery extends QueryBase<Order | null> {
 *   readonly typeId = 'orders.get';
 *
 *   constructor(readonly orderId: string) {
 *     super();
 *   }
 * }
 * ```
 */
export abstract class QueryBase<TResult = unknown>
  extends MessageBase<TResult>
  implements IQuery<TResult>
{
  readonly kind = 'query' as const;

  protected constructor(options: MessageOptions = {}) {
    super(options);
  }
}

/**
 * Check whether a value looks like a dispatchable message.
 */
export function isMessage(value: unknown): value is IMessage {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'typeId' in value &&
    typeof value.typeId === 'string' &&
    'kind' in value &&
    (value.kind === 'command' || value.kind === 'query')
  );
}

/**
 * Narrow a message to a command.
 */
export function isCommand(message: IMessage): message is ICommand<unknown> {
  return message.kind === 'command';
}

/**
 * Narrow a message to a query.
 */
export function isQuery(message: IMessage): message is IQuery<unknown> {
  return message.kind === 'query';
}
