/**
 * Idempotency stage.
 *
 * Commands carrying an `idempotencyKey` run at most once per key while the
 * stored outcome lives. Everything else passes straight through.
 *
 * - A repeated key returns the stored Result of the first execution.
 * - A key already running either waits for that execution (`wait`) or is
 *   rejected with `ConflictError` (`reject`).
 * - The same key with a different payload is rejected with
 *   `ConflictError`.
 *
 * Every outcome of the admitted execution is stored, failures included: a
 * key never triggers a second independent execution while its record
 * lives. The one exception is a `CancelledError`, which releases the key so
 * the cancelled command can be sent again.
 */

import type { IMessage } from '../../domain/messages';
import { isCommand } from '../../domain/messages';
import { CancelledError, ConflictError, FatalError } from '../../domain/errors';
import { err } from '../../domain/result';
import type { DispatchContext } from '../../application/cqrs/IHandler';
import type {
  DispatchResult,
  IDispatchMiddleware,
  Next,
} from '../../application/cqrs/IDispatchMiddleware';
import { noopLogger, type ILogger } from '../../application/logging';
import { raceAbort } from '../concurrency';
import { fingerprintMessage, type IdempotencyGuard } from '../idempotency';

export type InFlightPolicy = 'wait' | 'reject';

export type CancellationPolicy = 'complete-in-background' | 'release';

export interface IdempotencyMiddlewareOptions {
  /** Default lifetime of a stored outcome, in milliseconds */
  ttl: number;

  /** Per-`typeId` lifetimes, used when the command has no `idempotencyTtl` */
  ttlByType?: Record<string, number>;

  /** @defaultValue 'idem' */
  keyPrefix?: string;

  /** @defaultValue 'wait' */
  onInFlight?: InFlightPolicy;

  /** @defaultValue 'complete-in-background' */
  cancellation?: CancellationPolicy;

  /**
   * Reject a known key presented with a different payload.
   * @defaultValue true
   */
  checkFingerprint?: boolean;

  logger?: ILogger;
}

/**
 * Whether a Result is stored as the final outcome of a key. Only a
 * cancelled execution leaves the key free.
 */
export function isCacheableResult(result: DispatchResult): boolean {
  return !(result.kind === 'err' && result.error instanceof CancelledError);
}

interface Admission {
  key: string;
  fingerprint?: string;
  ttl: number;
}

export class IdempotencyMiddleware implements IDispatchMiddleware {
  readonly name = 'idempotency';

  private readonly ttl: number;
  private readonly ttlByType: Record<string, number>;
  private readonly keyPrefix: string;
  private readonly onInFlight: InFlightPolicy;
  private readonly cancellation: CancellationPolicy;
  private readonly checkFingerprint: boolean;
  private readonly logger: ILogger;

  constructor(
    private readonly guard: IdempotencyGuard,
    options: IdempotencyMiddlewareOptions,
  ) {
    this.ttl = options.ttl;
    this.ttlByType = { ...options.ttlByType };
    this.keyPrefix = options.keyPrefix ?? 'idem';
    this.onInFlight = options.onInFlight ?? 'wait';
    this.cancellation = options.cancellation ?? 'complete-in-background';
    this.checkFingerprint = options.checkFingerprint ?? true;
    this.logger = options.logger ?? noopLogger;
  }

  async invoke(message: IMessage, context: DispatchContext, next: Next): Promise<DispatchResult> {
    if (!isCommand(message) || message.idempotencyKey === undefined) {
      return next(message, context);
    }

    const admission: Admission = {
      key: `${this.keyPrefix}:${message.typeId}:${message.idempotencyKey}`,
      fingerprint: this.checkFingerprint ? fingerprintMessage(message) : undefined,
      ttl: message.idempotencyTtl ?? this.ttlByType[message.typeId] ?? this.ttl,
    };
    const meta = { key: admission.key, dispatchId: context.dispatchId };

    for (;;) {
      const outcome = await this.guard.begin(admission.key, admission.fingerprint);

      switch (outcome.kind) {
        case 'admitted':
          return this.runAdmitted(admission, message, context, next);

        case 'duplicate':
          this.logger.debug('Returning stored result for idempotency key', meta);
          return outcome.result;

        case 'conflict':
          this.logger.warn('Idempotency conflict', { ...meta, reason: outcome.error.reason });
          return err(outcome.error);

        case 'in-flight': {
          if (this.onInFlight === 'reject') {
            return err(new ConflictError(admission.key, 'in-flight'));
          }

          this.logger.debug('Waiting for in-flight execution', meta);
          const waited = await raceAbort(outcome.completion, context.signal);
          if (waited.kind === 'aborted') {
            return err(new CancelledError(waited.reason));
          }
          if (waited.value.kind === 'completed') {
            return waited.value.result;
          }
          // Released without an outcome: compete for the key again.
          break;
        }
      }
    }
  }

  private async runAdmitted(
    admission: Admission,
    message: IMessage,
    context: DispatchContext,
    next: Next,
  ): Promise<DispatchResult> {
    const signal = context.signal;
    if (!signal || this.cancellation === 'release') {
      return this.execute(admission, message, context, next);
    }

    // The execution outlives its caller so waiters still get its outcome.
    const execution = this.execute(admission, message, { ...context, signal: undefined }, next);
    const raced = await raceAbort(execution, signal);
    if (raced.kind === 'settled') {
      return raced.value;
    }

    this.logger.info('Caller cancelled; execution continues in background', {
      key: admission.key,
      dispatchId: context.dispatchId,
    });
    void execution.catch((error: unknown) => {
      this.logger.error('Background idempotent execution failed', {
        key: admission.key,
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return err(new CancelledError(raced.reason));
  }

  /**
   * Run the inner stages and record their outcome for the key.
   */
  private async execute(
    admission: Admission,
    message: IMessage,
    context: DispatchContext,
    next: Next,
  ): Promise<DispatchResult> {
    let result: DispatchResult;
    try {
      result = await next(message, context);
    } catch (thrown) {
      result = err(new FatalError(thrown, message.typeId));
    }

    try {
      if (isCacheableResult(result)) {
        await this.guard.complete(admission.key, result, admission.ttl, admission.fingerprint);
      } else {
        await this.guard.release(admission.key);
      }
    } catch (error) {
      this.logger.error('Failed to record idempotency outcome', {
        key: admission.key,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return result;
  }
}
