/**
 * Dispatch Scope
 *
 * Async-local record of the dispatch currently executing. Uses Node.js
 * AsyncLocalStorage, so the scope follows the handler through every
 * `await`, timer and promise it creates. A dispatch started from inside a
 * handler reads the enclosing scope to inherit its correlation id and to
 * record the enclosing message as its cause.
 *
 * @module domain/context/DispatchScope
 *
 * @example
 * ```typescript
 * async handle(command: PlaceOrderCommand) {
 *   const scope = getCurrentDispatch();
 *   logger.info('placing order', { correlationId: scope?.correlationId });
 *
 *   // Inherits the correlation id, causationId = command's message id
 *   await commandBus.dispatch(new ReserveStockCommand(command.sku));
 * }
 * ```
 */

import { AsyncLocalStorage } from 'async_hooks';

export interface DispatchScopeData {
  readonly dispatchId: string;
  readonly typeId: string;
  readonly correlationId: string;

  /** Message id of the message being handled, when it carries metadata */
  readonly messageId?: string;

  /** Nesting depth, 0 for a dispatch started outside any handler */
  readonly depth: number;
}

export class DispatchScope {
  private static als = new AsyncLocalStorage<DispatchScopeData>();

  /**
   * Run `callback` with `data` as the current scope.
   */
  static run<R>(data: DispatchScopeData, callback: () => R): R {
    return DispatchScope.als.run(data, callback);
  }

  static current(): DispatchScopeData | undefined {
    return DispatchScope.als.getStore();
  }

  static hasScope(): boolean {
    return DispatchScope.als.getStore() !== undefined;
  }
}

/**
 * The dispatch currently executing, if any.
 */
export function getCurrentDispatch(): DispatchScopeData | undefined {
  return DispatchScope.current();
}
