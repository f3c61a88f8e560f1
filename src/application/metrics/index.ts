export type { IMetricsCollector } from './IMetricsCollector';
