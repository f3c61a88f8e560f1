/**
 * @fileoverview CQRS Exports
 * @description
 * Contracts of the command and query side: handlers, the per-dispatch
 * context, pipeline stages and the buses themselves. Implementations live
 * in the infrastructure layer.
 *
 * @packageDocumentation
 * @module resilient-dispatch/application/cqrs
 *
 * @see {@link https://martinfowler.com/bliki/CQRS.html | Martin Fowler - CQRS}
 */

export { MessageHandlerBase } from './IHandler';
export type {
  DispatchContext,
  HandlerContext,
  HandlerReturn,
  IMessageHandler,
  HandlerFunction,
  Handler,
  ICommandHandler,
  IQueryHandler,
} from './IHandler';

export { createMiddleware } from './IDispatchMiddleware';
export type {
  DispatchResult,
  Next,
  IDispatchMiddleware,
  MiddlewareFunction,
} from './IDispatchMiddleware';

export type { DispatchOptions, IMessageBus, ICommandBus, IQueryBus } from './IMessageBus';
