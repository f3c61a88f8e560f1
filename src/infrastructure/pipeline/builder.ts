/**
 * @fileoverview Pipeline Builder - Middleware Composition
 *
 * @packageDocumentation
 * @module resilient-dispatch/infrastructure/pipeline
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Composes dispatch middleware into a single {@link Next} function. The
 * composition happens once, when a bus is built; dispatching only walks
 * the prebuilt chain.
 *
 * ```
 * message → [Stage 1] → [Stage 2] → [Stage 3] → handler
 *                                                  ↓
 * Result  ← [Stage 1] ← [Stage 2] ← [Stage 3] ← Result
 * ```
 *
 * The first stage added is the outermost.
 *
 * @example
 * ```typescript
 * const chain = createPipeline()
 *   .use(new IdempotencyMiddleware(guard))
 *   .use(new ValidationMiddleware({ validators }))
 *   .use(new RetryMiddleware(new RetryPolicy()))
 *   .use(new CircuitBreakerMiddleware(breakers))
 *   .compose(invokeHandler);
 *
 * const result = await chain(message, context);
 * ```
 *
 * @see {@link https://en.wikipedia.org/wiki/Chain-of-responsibility_pattern | Chain of Responsibility Pattern}
 */

import {
  createMiddleware,
  type IDispatchMiddleware,
  type MiddlewareFunction,
  type Next,
} from '../../application/cqrs/IDispatchMiddleware';

/**
 * Pipeline builder for composing middleware with a fluent API.
 */
export class PipelineBuilder {
  private middlewares: IDispatchMiddleware[] = [];

  /**
   * Add a stage inside every stage added before it.
   */
  use(middleware: IDispatchMiddleware | MiddlewareFunction): this {
    this.middlewares.push(toMiddleware(middleware));
    return this;
  }

  /**
   * Add a stage only when `condition` holds at build time.
   */
  useIf(
    condition: boolean | (() => boolean),
    middleware: IDispatchMiddleware | MiddlewareFunction,
  ): this {
    const shouldUse = typeof condition === 'function' ? condition() : condition;
    if (shouldUse) {
      this.use(middleware);
    }
    return this;
  }

  /**
   * Add a stage outside every existing stage.
   */
  prepend(middleware: IDispatchMiddleware | MiddlewareFunction): this {
    this.middlewares.unshift(toMiddleware(middleware));
    return this;
  }

  /**
   * Snapshot of the stages, outermost first.
   */
  build(): IDispatchMiddleware[] {
    return [...this.middlewares];
  }

  /**
   * Fold the stages around `terminal` into one function.
   */
  compose(terminal: Next): Next {
    return compose(this.build(), terminal);
  }

  get length(): number {
    return this.middlewares.length;
  }

  clear(): this {
    this.middlewares = [];
    return this;
  }
}

export function createPipeline(): PipelineBuilder {
  return new PipelineBuilder();
}

/**
 * Wrap `terminal` in `middlewares`, the first element outermost.
 */
export function compose(middlewares: readonly IDispatchMiddleware[], terminal: Next): Next {
  return middlewares.reduceRight<Next>(
    (next, middleware) => (message, context) => middleware.invoke(message, context, next),
    terminal,
  );
}

function toMiddleware(middleware: IDispatchMiddleware | MiddlewareFunction): IDispatchMiddleware {
  return typeof middleware === 'function' ? createMiddleware(middleware) : middleware;
}
