export { HandlerRegistry } from './HandlerRegistry';
export type { ErasedHandler } from './HandlerRegistry';
export { MessageBus } from './MessageBus';
export type { MessageBusOptions } from './MessageBus';
export { CommandBus } from './CommandBus';
export type { CommandBusOptions } from './CommandBus';
export { QueryBus } from './QueryBus';
export { createCommandBus, createQueryBus, buildStages } from './factories';
export type { DispatchRuntime } from './factories';
