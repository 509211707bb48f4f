/**
 * Reputation History Service
 *
 * Process-wide store of past session summaries keyed by remote address.
 * Appends happen at disconnect; the prior for a new connection is the mean
 * score of the address's stored sessions once there are enough of them.
 *
 * ## Retention
 * A periodic sweep bounds the store:
 * - a key holding more than `maxEntries` summaries is cut back to the newest `maxEntries`
 * - otherwise, a key whose newest summary is older than the retention window is deleted
 *
 * The size check wins: an oversized key is trimmed in a pass even when it is
 * also stale, and is only considered for expiry on a later pass.
 *
 * Every method runs to completion on the event loop, so each call is an
 * exclusive section over the map; callers never see the map itself.
 *
 * @module reputation-history
 */

import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MetricsService } from '../../metrics/metrics.service';
import { METRIC_PATHS } from '../../metrics/metrics.constants';
import {
  DEFAULT_HISTORY_MAX_ENTRIES,
  DEFAULT_HISTORY_MIN_SAMPLES,
  DEFAULT_HISTORY_RETENTION_SECONDS,
  DEFAULT_SWEEP_INTERVAL_SECONDS,
  NEUTRAL_TRUST,
} from '../../config/config.constants';
import type { HistoryConfig, SweepConfig } from '../../config/config.types';
import type { AggregatedSummary, SessionSummary, SweepResult } from '../interfaces/session-summary.interface';
import { aggregateSummaries } from '../scoring/session-summary';

export interface AddressHistoryAggregate extends AggregatedSummary {
  samples: number;
}

@Injectable()
export class ReputationHistoryService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ReputationHistoryService.name);
  private readonly history = new Map<string, SessionSummary[]>();
  private readonly config: HistoryConfig;
  private readonly sweepConfig: SweepConfig;
  private sweepTimer?: NodeJS.Timeout;

  constructor(
    private readonly configService: ConfigService,
    private readonly metricsService: MetricsService,
  ) {
    this.config = this.configService.get<HistoryConfig>('reputation.history') ?? {
      maxEntries: DEFAULT_HISTORY_MAX_ENTRIES,
      retentionSeconds: DEFAULT_HISTORY_RETENTION_SECONDS,
      minSamples: DEFAULT_HISTORY_MIN_SAMPLES,
    };
    this.sweepConfig = this.configService.get<SweepConfig>('reputation.sweep') ?? {
      enabled: true,
      intervalSeconds: DEFAULT_SWEEP_INTERVAL_SECONDS,
    };
  }

  onModuleInit(): void {
    if (this.sweepConfig.enabled) {
      this.startSweep();
    } else {
      this.logger.log('History sweep disabled');
    }
  }

  onModuleDestroy(): void {
    this.stopSweep();
  }

  /**
   * Starts the periodic sweep. Calling it while a sweep is scheduled does nothing.
   */
  startSweep(): void {
    if (this.sweepTimer) {
      return;
    }

    const intervalMs = this.sweepConfig.intervalSeconds * 1000;
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, intervalMs);

    this.logger.log(`History sweep scheduled every ${this.sweepConfig.intervalSeconds}s`);
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
      this.logger.log('History sweep stopped');
    }
  }

  isSweepRunning(): boolean {
    return this.sweepTimer !== undefined;
  }

  /**
   * Appends a summary to the address's history. Never trims; the sweep does.
   */
  recordSession(key: string, summary: SessionSummary): void {
    const entries = this.history.get(key);
    if (entries) {
      entries.push(summary);
    } else {
      this.history.set(key, [summary]);
    }

    this.metricsService.increment(METRIC_PATHS.HISTORY_RECORDED_TOTAL);
    this.metricsService.set(METRIC_PATHS.HISTORY_TRACKED_ADDRESSES, this.history.size);
  }

  /**
   * Trust to assume for a new session from this address.
   *
   * @returns The neutral prior while fewer than `minSamples` sessions are
   * stored, otherwise the mean stored score
   */
  priorTrust(key: string): number {
    const entries = this.history.get(key);

    if (!entries || entries.length === 0 || entries.length < this.config.minSamples) {
      return NEUTRAL_TRUST;
    }

    return aggregateSummaries(entries).score;
  }

  /**
   * Aggregated counters over the address's stored sessions, or undefined
   * when nothing is stored for it.
   */
  aggregate(key: string): AddressHistoryAggregate | undefined {
    const entries = this.history.get(key);
    if (!entries || entries.length === 0) {
      return undefined;
    }

    return { ...aggregateSummaries(entries), samples: entries.length };
  }

  /**
   * Copy of the stored summaries for an address, oldest first.
   */
  getHistory(key: string): SessionSummary[] {
    return [...(this.history.get(key) ?? [])];
  }

  sampleCount(key: string): number {
    return this.history.get(key)?.length ?? 0;
  }

  /**
   * Number of addresses with stored history (for metrics/debugging).
   */
  getTrackedAddressCount(): number {
    return this.history.size;
  }

  /**
   * One maintenance pass over every address.
   *
   * @param now - Reference time for the retention check (default: current time)
   */
  sweep(now: Date = new Date()): SweepResult {
    const retentionMs = this.config.retentionSeconds * 1000;
    let trimmed = 0;
    let expired = 0;

    for (const [key, entries] of this.history.entries()) {
      if (entries.length > this.config.maxEntries) {
        this.history.set(key, entries.slice(entries.length - this.config.maxEntries));
        trimmed++;
        continue;
      }

      const newest = entries.at(-1);
      if (!newest || newest.timestamp.getTime() + retentionMs < now.getTime()) {
        this.logger.debug(`Last session over ${this.config.retentionSeconds}s ago, deleting history for ${key}`);
        this.history.delete(key);
        expired++;
      }
    }

    if (trimmed > 0) {
      this.metricsService.increment(METRIC_PATHS.HISTORY_TRIMMED_TOTAL, trimmed);
    }
    if (expired > 0) {
      this.metricsService.increment(METRIC_PATHS.HISTORY_EXPIRED_TOTAL, expired);
    }
    this.metricsService.set(METRIC_PATHS.HISTORY_TRACKED_ADDRESSES, this.history.size);

    return { trimmed, expired };
  }
}
