/**
 * Validation slot.
 *
 * Runs a global validator and then the validator registered for the
 * message's `typeId`. The first `Err(ValidationError)` ends the dispatch
 * before retry, breaker or handler see the message. The rules themselves
 * belong to the caller.
 */

import type { ZodTypeAny } from 'zod';
import type { IMessage } from '../../domain/messages';
import { FatalError, ValidationError } from '../../domain/errors';
import { err, ok, type Result } from '../../domain/result';
import type { DispatchContext } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';

export type Validator = (
  message: IMessage,
) => Result<void, ValidationError> | Promise<Result<void, ValidationError>>;

export interface ValidationMiddlewareOptions {
  /** Runs for every message */
  validate?: Validator;

  /** Runs for messages of the given `typeId` */
  validators?: Record<string, Validator>;
}

export class ValidationMiddleware implements IDispatchMiddleware {
  readonly name = 'validation';

  private readonly validate?: Validator;
  private readonly validators: Record<string, Validator>;

  constructor(options: ValidationMiddlewareOptions = {}) {
    this.validate = options.validate;
    this.validators = { ...options.validators };
  }

  async invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult> {
    for (const validator of [this.validate, this.validators[message.typeId]]) {
      if (!validator) {
        continue;
      }

      let verdict: Result<void, ValidationError>;
      try {
        verdict = await validator(message);
      } catch (thrown) {
        return err(new FatalError(thrown, message.typeId));
      }

      if (verdict.kind === 'err') {
        return err(verdict.error);
      }
    }

    return next(message, context);
  }
}

/**
 * Build a validator from a zod schema.
 *
 * @param select - Picks the value to validate; the whole message by default
 *
 * @example
 * ```typescript
 * const validators = {
 *   'orders.place': zodValidator(
 *     z.object({ sku: z.string().min(1), quantity: z.number().int().positive() }),
 *   ),
 * };
 * ```
 */
export function zodValidator(
  schema: ZodTypeAny,
  select?: (message: IMessage) => unknown,
): Validator {
  return (message) => {
    const parsed = schema.safeParse(select ? select(message) : message);
    if (parsed.success) {
      return ok(undefined);
    }
    return err(
      new ValidationError(
        `Invalid ${message.typeId}`,
        parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      ),
    );
  };
}
