export { InMemoryMetricsCollector } from './InMemoryMetricsCollector';
export type { DispatchStatistics, SlowDispatch } from './InMemoryMetricsCollector';
