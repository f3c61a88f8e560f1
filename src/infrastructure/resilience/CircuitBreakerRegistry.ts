/**
 * Named circuit breakers, created on first use.
 *
 * Breakers are keyed by name (the pipeline uses `handler:<typeId>`). Each
 * breaker owns its own state, so traffic through one name never contends
 * with another.
 */

import { CircuitBreaker } from './CircuitBreaker';
import type {
  CircuitBreakerDependencies,
  CircuitBreakerOptions,
  CircuitBreakerSnapshot,
} from './IResiliencePolicy';

export interface CircuitBreakerRegistryOptions {
  /** Options applied to every breaker */
  defaults?: CircuitBreakerOptions;

  /** Per-name overrides, merged over `defaults` */
  overrides?: Record<string, CircuitBreakerOptions>;
}

export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly defaults: CircuitBreakerOptions;
  private readonly overrides: Record<string, CircuitBreakerOptions>;

  constructor(
    options: CircuitBreakerRegistryOptions = {},
    private readonly dependencies: CircuitBreakerDependencies = {},
  ) {
    this.defaults = options.defaults ?? {};
    this.overrides = options.overrides ?? {};
  }

  /**
   * Return the breaker registered under `name`, creating it when missing.
   * `options` only apply on creation.
   */
  get(name: string, options?: CircuitBreakerOptions): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) {
      return existing;
    }

    const breaker = new CircuitBreaker(
      name,
      { ...this.defaults, ...this.overrides[name], ...options },
      this.dependencies,
    );
    this.breakers.set(name, breaker);
    return breaker;
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  names(): string[] {
    return [...this.breakers.keys()];
  }

  snapshot(): CircuitBreakerSnapshot[] {
    return [...this.breakers.values()].map((breaker) => breaker.snapshot());
  }

  /**
   * Reset one breaker to Closed, or drop every breaker when no name is given.
   */
  reset(name?: string): void {
    if (name === undefined) {
      this.breakers.clear();
      return;
    }
    this.breakers.get(name)?.reset();
  }
}
