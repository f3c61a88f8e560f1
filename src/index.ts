/**
 * @fileoverview resilient-dispatch
 *
 * @packageDocumentation
 *
 * Command/query dispatch core: a bus routes each message to its single
 * handler through an ordered middleware pipeline providing idempotency,
 * validation, retry with backoff and per-handler circuit breaking. Every
 * outcome is a `Result`; `dispatch` never throws.
 *
 * @example
 * ```typescript
 * import { CommandBase, createCommandBus, ok } from 'resilient-dispatch';
 *
 * class PlaceOrderCommand extends CommandBase<string> {
 *   readonly typeId = 'orders.place';
 *
 *   constructor(readonly sku: string, readonly quantity: number, idempotencyKey?: string) {
 *     super({ idempotencyKey });
 *   }
 * }
 *
 * const commandBus = createCommandBus({ retry: { maxAttempts: 2 } });
 * commandBus.register('orders.place', async (command: PlaceOrderCommand) => ok(await orders.place(command)));
 *
 * const result = await commandBus.dispatch(new PlaceOrderCommand('SKU-42', 2, 'order-abc'));
 * ```
 */

// ============================================================================
// DOMAIN LAYER EXPORTS (Result, Messages, Errors, Events)
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS (Contracts, Configuration, Logging)
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS (Buses, Pipeline, Resilience, Idempotency)
// ============================================================================

export * from './infrastructure';
