/**
 * Handler registry: exactly one handler per message `typeId`.
 *
 * Handlers are stored type-erased; the bus restores the result type at
 * its boundary from the message's phantom result type.
 */

import { DuplicateHandlerError, RegistrationClosedError } from '../../domain/errors';
import type { IMessage } from '../../domain/messages';
import type { Handler, IMessageHandler } from '../../application/cqrs/IHandler';

/**
 * A handler with its message and result types erased.
 */
export type ErasedHandler = IMessageHandler<IMessage, unknown>;

export class HandlerRegistry {
  private readonly handlers = new Map<string, ErasedHandler>();
  private sealed = false;

  /**
   * @throws DuplicateHandlerError when `typeId` is already registered
   * @throws RegistrationClosedError after {@link seal}
   */
  register<TMessage extends IMessage, TResult>(
    typeId: string,
    handler: Handler<TMessage, TResult>,
  ): void {
    if (this.sealed) {
      throw new RegistrationClosedError(typeId);
    }
    if (this.handlers.has(typeId)) {
      throw new DuplicateHandlerError(typeId);
    }

    const erased: ErasedHandler = typeof handler === 'function' ? { handle: handler } : handler;
    this.handlers.set(typeId, erased);
  }

  resolve(typeId: string): ErasedHandler | undefined {
    return this.handlers.get(typeId);
  }

  has(typeId: string): boolean {
    return this.handlers.has(typeId);
  }

  typeIds(): string[] {
    return [...this.handlers.keys()];
  }

  get size(): number {
    return this.handlers.size;
  }

  /**
   * Refuse further registrations. Idempotent.
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}
