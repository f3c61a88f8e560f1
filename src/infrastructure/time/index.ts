export { systemClock, ManualClock } from './IClock';
export type { IClock, ManualClockOptions } from './IClock';
