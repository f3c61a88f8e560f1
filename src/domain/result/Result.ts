/**
 * @fileoverview Result - Success/Failure Sum Type
 *
 * @packageDocumentation
 * @module resilient-dispatch/domain/result
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * `Result<T, E>` is the return contract of every handler and every
 * middleware stage. Expected failures travel as `Err` values; only truly
 * unexpected faults are thrown, and those are converted back into a
 * `Result` at the handler and bus boundaries.
 *
 * ```
 * handler ──► Ok(value) ──► middleware ──► middleware ──► caller
 *        └──► Err(error) ─┘
 * ```
 *
 * Exactly one variant is populated. Combinators never invoke their callback
 * on the other variant:
 *
 * | Method      | Ok(value)             | Err(error)            |
 * |-------------|-----------------------|-----------------------|
 * | `map`       | `Ok(fn(value))`       | unchanged             |
 * | `mapErr`    | unchanged             | `Err(fn(error))`      |
 * | `andThen`   | `fn(value)`           | unchanged             |
 * | `orElse`    | unchanged             | `fn(error)`           |
 *
 * @example
 * ```typescript
 * const parsed = tryCatch(() => JSON.parse(raw));
 *
 * const total = parsed
 *   .map((order: Order) => order.lines)
 *   .andThen((lines) => (lines.length > 0 ? ok(sum(lines)) : err(new ValidationError('empty order'))))
 *   .unwrapOr(0);
 * ```
 */

/**
 * Pattern-matching handlers for {@link Ok.match} / {@link Err.match}.
 */
export interface ResultMatcher<T, E, U> {
  ok: (value: T) => U;
  err: (error: E) => U;
}

/**
 * Success variant.
 *
 * @template T - Success value type
 * @template E - Error type of the Result this value belongs to (phantom)
 */
export class Ok<T, E = never> {
  readonly kind = 'ok' as const;

  constructor(readonly value: T) {}

  isOk(): boolean {
    return true;
  }

  isErr(): boolean {
    return false;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return new Ok<U, E>(fn(this.value));
  }

  mapErr<F>(_fn: (error: E) => F): Result<T, F> {
    return new Ok<T, F>(this.value);
  }

  andThen<U, F>(fn: (value: T) => Result<U, F>): Result<U, E | F> {
    return fn(this.value);
  }

  orElse<F>(_fn: (error: E) => Result<T, F>): Result<T, F> {
    return new Ok<T, F>(this.value);
  }

  /**
   * Returns the success value.
   */
  unwrap(): T {
    return this.value;
  }

  /**
   * Throws, since there is no error to return.
   */
  unwrapErr(): E {
    throw new Error('Called unwrapErr() on an Ok result');
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }

  match<U>(matcher: ResultMatcher<T, E, U>): U {
    return matcher.ok(this.value);
  }

  /**
   * Run a side effect with the value and return this result unchanged.
   */
  tap(fn: (value: T) => void): Result<T, E> {
    fn(this.value);
    return this;
  }
}

/**
 * Failure variant.
 *
 * @template T - Success type of the Result this error belongs to (phantom)
 * @template E - Error type
 */
export class Err<T, E> {
  readonly kind = 'err' as const;

  constructor(readonly error: E) {}

  isOk(): boolean {
    return false;
  }

  isErr(): boolean {
    return true;
  }

  map<U>(_fn: (value: T) => U): Result<U, E> {
    return new Err<U, E>(this.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return new Err<T, F>(fn(this.error));
  }

  andThen<U, F>(_fn: (value: T) => Result<U, F>): Result<U, E | F> {
    return new Err<U, E | F>(this.error);
  }

  orElse<F>(fn: (error: E) => Result<T, F>): Result<T, F> {
    return fn(this.error);
  }

  /**
   * Throws the contained error (wrapped when it is not an `Error`).
   */
  unwrap(): T {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(`Called unwrap() on an Err result: ${String(this.error)}`);
  }

  unwrapErr(): E {
    return this.error;
  }

  unwrapOr(defaultValue: T): T {
    return defaultValue;
  }

  match<U>(matcher: ResultMatcher<T, E, U>): U {
    return matcher.err(this.error);
  }

  tap(_fn: (value: T) => void): Result<T, E> {
    return this;
  }
}

/**
 * Tagged union of {@link Ok} and {@link Err}.
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

/**
 * Async counterpart used by handlers and middleware.
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;

export function ok<T, E = never>(value: T): Result<T, E> {
  return new Ok<T, E>(value);
}

export function err<T = never, E = Error>(error: E): Result<T, E> {
  return new Err<T, E>(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T, E> {
  return result.kind === 'ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<T, E> {
  return result.kind === 'err';
}

/**
 * Check whether an arbitrary value is a Result produced by this module.
 */
export function isResult(value: unknown): value is Result<unknown, unknown> {
  return value instanceof Ok || value instanceof Err;
}

/**
 * Run a throwing function and capture its outcome as a Result.
 *
 * @param fn - Function that may throw
 * @param mapError - Converts the thrown value into the error type
 */
export function tryCatch<T>(fn: () => T): Result<T, Error>;
export function tryCatch<T, E>(fn: () => T, mapError: (thrown: unknown) => E): Result<T, E>;
export function tryCatch<T, E>(
  fn: () => T,
  mapError?: (thrown: unknown) => E,
): Result<T, E | Error> {
  try {
    return ok(fn());
  } catch (thrown) {
    return err(mapError ? mapError(thrown) : toError(thrown));
  }
}

/**
 * Async variant of {@link tryCatch}.
 */
export function tryCatchAsync<T>(fn: () => Promise<T>): AsyncResult<T, Error>;
export function tryCatchAsync<T, E>(
  fn: () => Promise<T>,
  mapError: (thrown: unknown) => E,
): AsyncResult<T, E>;
export async function tryCatchAsync<T, E>(
  fn: () => Promise<T>,
  mapError?: (thrown: unknown) => E,
): AsyncResult<T, E | Error> {
  try {
    return ok(await fn());
  } catch (thrown) {
    return err(mapError ? mapError(thrown) : toError(thrown));
  }
}

/**
 * Collapse a list of Results into a Result of a list. The first `Err` wins.
 */
export function combine<T, E>(results: ReadonlyArray<Result<T, E>>): Result<T[], E> {
  const values: T[] = [];
  for (const result of results) {
    if (result.kind === 'err') {
      return err(result.error);
    }
    values.push(result.value);
  }
  return ok(values);
}

/**
 * Normalise a thrown value into an `Error` instance.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
