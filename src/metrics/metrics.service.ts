import { Injectable } from '@nestjs/common';
import { METRIC_PATHS } from './metrics.constants';
import type { MetricPath } from './metrics.constants';
import type { Metrics } from './interfaces';

/**
 * @class MetricsService
 * @description In-memory counters for the reputation engine. Values are keyed by
 * their dotted {@link MetricPath} and reassembled into the nested {@link Metrics}
 * shape on read.
 */
@Injectable()
export class MetricsService {
  /** Timestamp when the service was initialized, used for uptime calculation */
  private readonly startTime: number = Date.now();

  private readonly values = new Map<MetricPath, number>(
    Object.values(METRIC_PATHS).map((path): [MetricPath, number] => [path, 0]),
  );

  /**
   * Retrieves the current state of all metrics.
   * @returns A snapshot of all metrics with dynamically calculated uptime.
   */
  getMetrics(): Readonly<Metrics> {
    const value = (path: MetricPath) => this.values.get(path) ?? 0;

    return {
      sessions: {
        connected_total: value(METRIC_PATHS.SESSIONS_CONNECTED_TOTAL),
        skipped_total: value(METRIC_PATHS.SESSIONS_SKIPPED_TOTAL),
        active: value(METRIC_PATHS.SESSIONS_ACTIVE),
        scored_total: value(METRIC_PATHS.SESSIONS_SCORED_TOTAL),
        handler_errors_total: value(METRIC_PATHS.SESSIONS_HANDLER_ERRORS_TOTAL),
      },
      transactions: {
        begun_total: value(METRIC_PATHS.TRANSACTIONS_BEGUN_TOTAL),
        committed_total: value(METRIC_PATHS.TRANSACTIONS_COMMITTED_TOTAL),
        rolled_back_total: value(METRIC_PATHS.TRANSACTIONS_ROLLED_BACK_TOTAL),
      },
      history: {
        recorded_total: value(METRIC_PATHS.HISTORY_RECORDED_TOTAL),
        trimmed_total: value(METRIC_PATHS.HISTORY_TRIMMED_TOTAL),
        expired_total: value(METRIC_PATHS.HISTORY_EXPIRED_TOTAL),
        tracked_addresses: value(METRIC_PATHS.HISTORY_TRACKED_ADDRESSES),
      },
      trust: {
        ip_entries: value(METRIC_PATHS.TRUST_IP_ENTRIES),
        rdns_entries: value(METRIC_PATHS.TRUST_RDNS_ENTRIES),
        host_entries: value(METRIC_PATHS.TRUST_HOST_ENTRIES),
      },
      server: {
        uptime_seconds: Math.floor((Date.now() - this.startTime) / 1000),
      },
    };
  }

  /**
   * Increments a specific metric by the given value.
   * @param path - The dot-separated path to the metric to increment.
   * @param value - The value to increment by (default: 1).
   */
  increment(path: MetricPath, value: number = 1): void {
    this.values.set(path, (this.values.get(path) ?? 0) + value);
  }

  /**
   * Decrements a specific metric by the given value.
   * @param path - The dot-separated path to the metric to decrement.
   * @param value - The value to decrement by (default: 1).
   */
  decrement(path: MetricPath, value: number = 1): void {
    this.values.set(path, (this.values.get(path) ?? 0) - value);
  }

  /**
   * Sets a gauge to the given value.
   */
  set(path: MetricPath, value: number): void {
    this.values.set(path, value);
  }
}
