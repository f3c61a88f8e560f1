/**
 * @fileoverview MessageBus - Shared dispatch engine of the command and query buses
 *
 * @packageDocumentation
 * @module resilient-dispatch/infrastructure/cqrs
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ```
 * dispatch(message)
 *   │
 *   ├─ wrong kind / unknown typeId ──► Err(UnregisteredHandlerError)
 *   │
 *   └─ DispatchScope.run ──► [stage 1] ► ... ► [stage n] ► handler
 *                                                            │
 *   Result ◄──────────────────────────────────────────────────┘
 * ```
 *
 * The pipeline is composed once, in the constructor. The first dispatch
 * seals the handler registry. Throws from a handler become
 * `Err(FatalError)` at the innermost stage; throws from a middleware are
 * caught at the bus boundary the same way, so `dispatch` always resolves.
 */

import { v4 as uuidv4 } from 'uuid';
import { DispatchScope, getCurrentDispatch } from '../../domain/context';
import { CancelledError, FatalError, UnregisteredHandlerError } from '../../domain/errors';
import { isMessage, type IMessage, type MessageKind } from '../../domain/messages';
import { err, isResult, type Result } from '../../domain/result';
import type { DispatchContext, Handler } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';
import type { DispatchOptions, IMessageBus } from '../../application/cqrs/IMessageBus';
import { noopLogger, type ILogger } from '../../application/logging';
import { raceAbort } from '../concurrency';
import { compose } from '../pipeline';
import { systemClock, type IClock } from '../time';
import { HandlerRegistry } from './HandlerRegistry';

export interface MessageBusOptions {
  /** Pipeline stages, outermost first */
  middlewares?: IDispatchMiddleware[];
  logger?: ILogger;
  clock?: IClock;
}

export abstract class MessageBus<TBase extends IMessage = IMessage> implements IMessageBus<TBase> {
  protected readonly registry = new HandlerRegistry();
  protected readonly logger: ILogger;
  protected readonly clock: IClock;

  private readonly stages: readonly IDispatchMiddleware[];
  private readonly chain: Next;

  protected constructor(
    readonly kind: MessageKind,
    options: MessageBusOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
    this.clock = options.clock ?? systemClock;
    this.stages = [...(options.middlewares ?? [])];
    this.chain = compose(this.stages, (message, context) => this.invokeHandler(message, context));
  }

  register<TMessage extends TBase, TResult = unknown>(
    typeId: string,
    handler: Handler<TMessage, TResult>,
  ): void {
    this.registry.register(typeId, handler);
    this.logger.debug('Handler registered', { bus: this.kind, typeId });
  }

  hasHandler(typeId: string): boolean {
    return this.registry.has(typeId);
  }

  /**
   * Names of the pipeline stages, outermost first.
   */
  get pipeline(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  async dispatch<TResult>(
    message: IMessage<TResult>,
    options: DispatchOptions = {},
  ): Promise<Result<TResult, Error>> {
    let result: DispatchResult;
    try {
      result = await this.route(message, options);
    } catch (thrown) {
      this.logger.error('Unexpected failure at bus boundary', {
        bus: this.kind,
        typeId: describeType(message),
        error: thrown instanceof Error ? thrown.message : String(thrown),
      });
      result = err(new FatalError(thrown, describeType(message)));
    }

    // The handler registered for this typeId produces TResult; the pipeline
    // only carries it as `unknown`.
    return result as Result<TResult, Error>;
  }

  /**
   * Called after a dispatch finished with any Result, before it is returned.
   */
  protected async afterDispatch(_message: IMessage, _result: DispatchResult): Promise<void> {
    // no-op by default
  }

  private async route(message: IMessage, options: DispatchOptions): Promise<DispatchResult> {
    if (!isMessage(message)) {
      return err(new FatalError(new TypeError('Value is not a dispatchable message')));
    }

    this.registry.seal();

    if (message.kind !== this.kind || !this.registry.has(message.typeId)) {
      this.logger.warn('No handler for message', { bus: this.kind, typeId: message.typeId, kind: message.kind });
      return err(new UnregisteredHandlerError(message.typeId));
    }

    const { signal } = options;
    if (signal?.aborted) {
      return err(new CancelledError(signal.reason));
    }

    const parent = getCurrentDispatch();
    const context: DispatchContext = {
      dispatchId: uuidv4(),
      typeId: message.typeId,
      kind: message.kind,
      startedAt: this.clock.now(),
      correlationId:
        options.correlationId ?? message.metadata?.correlationId ?? parent?.correlationId ?? uuidv4(),
      causationId: message.metadata?.causationId ?? parent?.messageId,
      signal,
      attempt: 0,
      items: new Map(),
    };

    const execution = DispatchScope.run(
      {
        dispatchId: context.dispatchId,
        typeId: message.typeId,
        correlationId: context.correlationId,
        messageId: message.metadata?.messageId,
        depth: parent ? parent.depth + 1 : 0,
      },
      () => this.chain(message, context),
    );

    const raced = await raceAbort(execution, signal);
    if (raced.kind === 'aborted') {
      void execution.catch((error: unknown) => {
        this.logger.error('Cancelled dispatch failed after its caller left', {
          typeId: message.typeId,
          dispatchId: context.dispatchId,
          error: error instanceof Error ? error.message : String(error),
        });
      });
      return err(new CancelledError(raced.reason));
    }

    await this.afterDispatch(message, raced.value);
    return raced.value;
  }

  /**
   * Innermost stage: call the handler and turn throws and non-Result
   * returns into `Err(FatalError)`.
   */
  private async invokeHandler(message: IMessage, context: DispatchContext): Promise<DispatchResult> {
    const handler = this.registry.resolve(message.typeId);
    if (!handler) {
      return err(new UnregisteredHandlerError(message.typeId));
    }

    try {
      const result = await handler.handle(message, context);
      if (!isResult(result)) {
        return err(
          new FatalError(new TypeError('Handler did not return a Result'), message.typeId),
        );
      }
      return result;
    } catch (thrown) {
      this.logger.error('Handler threw', {
        typeId: message.typeId,
        dispatchId: context.dispatchId,
        error: thrown instanceof Error ? thrown.message : String(thrown),
      });
      return err(new FatalError(thrown, message.typeId));
    }
  }
}

function describeType(message: unknown): string | undefined {
  return isMessage(message) ? message.typeId : undefined;
}
