export { KeyedMutex } from './KeyedMutex';
export { raceAbort } from './abort';
export type { RaceOutcome } from './abort';
