export type {
  IIdempotencyStore,
  IdempotencyRecord,
  InFlightRecord,
  CompletedRecord,
} from './IIdempotencyStore';
export { InMemoryIdempotencyStore } from './InMemoryIdempotencyStore';
export { IdempotencyGuard } from './IdempotencyGuard';
export type { BeginOutcome, Completion, IdempotencyGuardDependencies } from './IdempotencyGuard';
export { canonicalJson, fingerprintMessage } from './fingerprint';
