/**
 * Metrics port.
 *
 * The metrics stage reports every dispatch through an `IMetricsCollector`;
 * exporters (Prometheus, StatsD, OpenTelemetry) live behind it.
 *
 * @module application/metrics/IMetricsCollector
 */

export interface IMetricsCollector {
  /**
   * Duration of one dispatch, in milliseconds.
   */
  recordDuration(typeId: string, durationMs: number, success: boolean): void;

  incrementCount(typeId: string, success: boolean): void;

  /**
   * Called in addition to `recordDuration` when a dispatch exceeds the
   * slow threshold.
   */
  recordSlowDispatch(typeId: string, durationMs: number): void;
}
