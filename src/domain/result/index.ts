/**
 * @fileoverview Result Exports
 * @module resilient-dispatch/domain/result
 */

export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  isResult,
  tryCatch,
  tryCatchAsync,
  combine,
  toError,
} from './Result';

export type { Result, AsyncResult, ResultMatcher } from './Result';
