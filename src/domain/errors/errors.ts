/**
 * Dispatch error taxonomy.
 *
 * Every expected failure of the dispatch core is one of these classes and
 * travels inside `Err(...)`. Configuration faults are the exception: they
 * are thrown synchronously during setup so a misconfigured bus never starts.
 */

/**
 * Stable machine-readable error codes.
 */
export enum DispatchErrorCode {
  ValidationFailed = 'VALIDATION_FAILED',
  UnregisteredHandler = 'UNREGISTERED_HANDLER',
  DuplicateHandler = 'DUPLICATE_HANDLER',
  RegistrationClosed = 'REGISTRATION_CLOSED',
  ConfigurationInvalid = 'CONFIGURATION_INVALID',
  Transient = 'TRANSIENT',
  Timeout = 'TIMEOUT',
  CircuitOpen = 'CIRCUIT_OPEN',
  BulkheadFull = 'BULKHEAD_FULL',
  Conflict = 'CONFLICT',
  Cancelled = 'CANCELLED',
  Fatal = 'FATAL',
}

/**
 * Status codes used when an error is surfaced to an HTTP-facing collaborator.
 */
export const ErrorStatus = {
  BAD_REQUEST: 400,
  CONFLICT: 409,
  CLIENT_CLOSED_REQUEST: 499,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504,
} as const;

/**
 * Base class for every error produced by the dispatch core.
 */
export class DispatchError extends Error {
  /**
   * Whether the failure is transient by nature. The retry stage decides
   * with its own policy; this flag only describes the error.
   */
  readonly retryable: boolean = false;

  constructor(
    public readonly code: DispatchErrorCode,
    message: string,
    public readonly statusCode: number = ErrorStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DispatchError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A single rejected field or rule.
 */
export interface ValidationViolation {
  /** Dotted path of the offending field, empty for message-level rules */
  path: string;
  message: string;
  code?: string;
}

/**
 * Input rejected before any side effect. Never retried.
 */
export class ValidationError extends DispatchError {
  constructor(
    message: string = 'Validation failed',
    public readonly violations: ValidationViolation[] = [],
  ) {
    super(DispatchErrorCode.ValidationFailed, message, ErrorStatus.BAD_REQUEST, {
      violations,
    });
    this.name = 'ValidationError';
  }

  override toString(): string {
    if (this.violations.length === 0) {
      return `${this.name}: ${this.message}`;
    }
    const detail = this.violations
      .map((v) => `${v.path || '(message)'}: ${v.message}`)
      .join('; ');
    return `${this.name}: ${this.message}: ${detail}`;
  }
}

/**
 * No handler is registered for the message type.
 */
export class UnregisteredHandlerError extends DispatchError {
  constructor(public readonly typeId: string) {
    super(
      DispatchErrorCode.UnregisteredHandler,
      `No handler registered for message type '${typeId}'`,
      ErrorStatus.INTERNAL_SERVER_ERROR,
      { typeId },
    );
    this.name = 'UnregisteredHandlerError';
  }
}

/**
 * A second handler was registered for the same message type.
 */
export class DuplicateHandlerError extends DispatchError {
  constructor(public readonly typeId: string) {
    super(
      DispatchErrorCode.DuplicateHandler,
      `Handler already registered for message type '${typeId}'`,
      ErrorStatus.INTERNAL_SERVER_ERROR,
      { typeId },
    );
    this.name = 'DuplicateHandlerError';
  }
}

/**
 * Registration attempted after the registry was sealed by the first dispatch.
 */
export class RegistrationClosedError extends DispatchError {
  constructor(public readonly typeId: string) {
    super(
      DispatchErrorCode.RegistrationClosed,
      `Cannot register '${typeId}': handler registration is closed once dispatching has started`,
      ErrorStatus.INTERNAL_SERVER_ERROR,
      { typeId },
    );
    this.name = 'RegistrationClosedError';
  }
}

/**
 * Invalid configuration values.
 */
export class ConfigurationError extends DispatchError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(DispatchErrorCode.ConfigurationInvalid, message, ErrorStatus.INTERNAL_SERVER_ERROR, {
      issues,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * A failure classified as temporary (network blip, lock timeout, ...).
 */
export class TransientError extends DispatchError {
  override readonly retryable: boolean = true;

  constructor(
    message: string = 'Transient failure',
    public readonly cause?: unknown,
    code: DispatchErrorCode = DispatchErrorCode.Transient,
    statusCode: number = ErrorStatus.SERVICE_UNAVAILABLE,
  ) {
    super(code, message, statusCode);
    this.name = 'TransientError';
  }
}

/**
 * The wrapped call did not finish within its time budget.
 */
export class TimeoutError extends TransientError {
  constructor(public readonly timeoutMs: number) {
    super(
      `Operation timed out after ${timeoutMs}ms`,
      undefined,
      DispatchErrorCode.Timeout,
      ErrorStatus.GATEWAY_TIMEOUT,
    );
    this.name = 'TimeoutError';
  }
}

/**
 * Fast-fail rejection while a circuit is open. Terminal for the attempt.
 */
export class CircuitOpenError extends DispatchError {
  constructor(
    public readonly circuitName: string,
    public readonly retryAfterMs: number,
  ) {
    super(
      DispatchErrorCode.CircuitOpen,
      Number.isFinite(retryAfterMs)
        ? `Circuit '${circuitName}' is open. Retry in ${(retryAfterMs / 1000).toFixed(1)}s`
        : `Circuit '${circuitName}' is isolated`,
      ErrorStatus.SERVICE_UNAVAILABLE,
      { circuitName, retryAfterMs },
    );
    this.name = 'CircuitOpenError';
  }
}

/**
 * Every concurrency slot of a bulkhead stayed taken for longer than the
 * caller may wait.
 */
export class BulkheadFullError extends DispatchError {
  constructor(
    public readonly bulkheadName: string,
    public readonly maxConcurrent: number,
  ) {
    super(
      DispatchErrorCode.BulkheadFull,
      `Bulkhead '${bulkheadName}' is full (${maxConcurrent} concurrent calls)`,
      ErrorStatus.SERVICE_UNAVAILABLE,
      { bulkheadName, maxConcurrent },
    );
    this.name = 'BulkheadFullError';
  }
}

/**
 * Idempotency policy rejection.
 */
export class ConflictError extends DispatchError {
  constructor(
    public readonly idempotencyKey: string,
    public readonly reason: 'in-flight' | 'payload-mismatch',
  ) {
    super(
      DispatchErrorCode.Conflict,
      reason === 'in-flight'
        ? `Request with idempotency key '${idempotencyKey}' is already in progress`
        : `Idempotency key '${idempotencyKey}' was used with different message contents`,
      ErrorStatus.CONFLICT,
      { idempotencyKey, reason },
    );
    this.name = 'ConflictError';
  }
}

/**
 * The caller aborted the dispatch.
 */
export class CancelledError extends DispatchError {
  constructor(public readonly reason?: unknown) {
    super(
      DispatchErrorCode.Cancelled,
      'Dispatch was cancelled by the caller',
      ErrorStatus.CLIENT_CLOSED_REQUEST,
    );
    this.name = 'CancelledError';
  }
}

/**
 * Unexpected runtime fault caught at a handler or bus boundary.
 */
export class FatalError extends DispatchError {
  constructor(
    public readonly cause: unknown,
    public readonly typeId?: string,
  ) {
    super(
      DispatchErrorCode.Fatal,
      `Unexpected failure${typeId ? ` while dispatching '${typeId}'` : ''}: ${describe(cause)}`,
      ErrorStatus.INTERNAL_SERVER_ERROR,
      typeId ? { typeId } : undefined,
    );
    this.name = 'FatalError';
  }
}

/**
 * Serializable view of an error, suitable for responses and logs.
 */
export interface ErrorPayload {
  code: string;
  message: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

export function toErrorPayload(error: Error): ErrorPayload {
  if (error instanceof DispatchError) {
    return {
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      details: error.details,
    };
  }
  return {
    code: DispatchErrorCode.Fatal,
    message: error.message,
    statusCode: ErrorStatus.INTERNAL_SERVER_ERROR,
  };
}

export function isDispatchError(value: unknown): value is DispatchError {
  return value instanceof DispatchError;
}

function describe(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return typeof cause === 'string' ? cause : String(cause);
}
