/**
 * In-process metrics collector.
 *
 * Keeps per-type counters and duration aggregates in memory. Useful in
 * tests and for a `/stats` style endpoint; ship a real exporter behind
 * {@link IMetricsCollector} in production.
 *
 * @example
 * ```typescript
 * const collector = new InMemoryMetricsCollector();
 * const bus = createCommandBus({}, { metricsCollector: collector });
 *
 * await bus.dispatch(command);
 * collector.getStatistics('orders.place');
 * // { typeId: 'orders.place', total: 1, successCount: 1, ... }
 * ```
 */

import type { IMetricsCollector } from '../../application/metrics';
import { systemClock, type IClock } from '../time';

export interface DispatchStatistics {
  typeId: string;
  total: number;
  successCount: number;
  failureCount: number;

  /** 0 when nothing was dispatched */
  successRate: number;

  avgDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
}

export interface SlowDispatch {
  typeId: string;
  durationMs: number;

  /** Clock reading when it was recorded */
  at: number;
}

interface TypeMetrics {
  successCount: number;
  failureCount: number;
  durations: number;
  totalDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
}

export class InMemoryMetricsCollector implements IMetricsCollector {
  private readonly metrics = new Map<string, TypeMetrics>();
  private readonly slow: SlowDispatch[] = [];

  constructor(
    private readonly clock: IClock = systemClock,
    private readonly maxSlowDispatches = 100,
  ) {}

  recordDuration(typeId: string, durationMs: number, _success: boolean): void {
    const entry = this.entry(typeId);
    entry.durations++;
    entry.totalDurationMs += durationMs;
    entry.minDurationMs = Math.min(entry.minDurationMs, durationMs);
    entry.maxDurationMs = Math.max(entry.maxDurationMs, durationMs);
  }

  incrementCount(typeId: string, success: boolean): void {
    const entry = this.entry(typeId);
    if (success) {
      entry.successCount++;
    } else {
      entry.failureCount++;
    }
  }

  recordSlowDispatch(typeId: string, durationMs: number): void {
    this.slow.push({ typeId, durationMs, at: this.clock.now() });
    if (this.slow.length > this.maxSlowDispatches) {
      this.slow.shift();
    }
  }

  getStatistics(typeId: string): DispatchStatistics {
    const entry = this.metrics.get(typeId);
    if (!entry) {
      return {
        typeId,
        total: 0,
        successCount: 0,
        failureCount: 0,
        successRate: 0,
        avgDurationMs: 0,
        minDurationMs: 0,
        maxDurationMs: 0,
      };
    }

    const total = entry.successCount + entry.failureCount;
    return {
      typeId,
      total,
      successCount: entry.successCount,
      failureCount: entry.failureCount,
      successRate: total > 0 ? entry.successCount / total : 0,
      avgDurationMs: entry.durations > 0 ? entry.totalDurationMs / entry.durations : 0,
      minDurationMs: entry.durations > 0 ? entry.minDurationMs : 0,
      maxDurationMs: entry.maxDurationMs,
    };
  }

  /**
   * Statistics of every type seen so far, sorted by `typeId`.
   */
  getSummary(): DispatchStatistics[] {
    return [...this.metrics.keys()].sort().map((typeId) => this.getStatistics(typeId));
  }

  /**
   * Most recent slow dispatches, oldest first.
   */
  get slowDispatches(): readonly SlowDispatch[] {
    return [...this.slow];
  }

  reset(): void {
    this.metrics.clear();
    this.slow.length = 0;
  }

  private entry(typeId: string): TypeMetrics {
    let entry = this.metrics.get(typeId);
    if (!entry) {
      entry = {
        successCount: 0,
        failureCount: 0,
        durations: 0,
        totalDurationMs: 0,
        minDurationMs: Number.POSITIVE_INFINITY,
        maxDurationMs: 0,
      };
      this.metrics.set(typeId, entry);
    }
    return entry;
  }
}
