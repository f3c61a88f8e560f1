/**
 * @fileoverview Error Taxonomy Exports
 * @module resilient-dispatch/domain/errors
 */

export {
  DispatchErrorCode,
  ErrorStatus,
  DispatchError,
  ValidationError,
  UnregisteredHandlerError,
  DuplicateHandlerError,
  RegistrationClosedError,
  ConfigurationError,
  TransientError,
  TimeoutError,
  CircuitOpenError,
  BulkheadFullError,
  ConflictError,
  CancelledError,
  FatalError,
  toErrorPayload,
  isDispatchError,
} from './errors';

export type { ValidationViolation, ErrorPayload } from './errors';
