import { registerAs } from '@nestjs/config';
import * as process from 'process';
import {
  DEFAULT_ENVIRONMENT,
  DEFAULT_SERVER_PORT,
  DEFAULT_REPUTATION_STRATEGY,
  DEFAULT_HISTORY_MAX_ENTRIES,
  DEFAULT_HISTORY_RETENTION_SECONDS,
  DEFAULT_HISTORY_MIN_SAMPLES,
  DEFAULT_SWEEP_INTERVAL_SECONDS,
} from './config/config.constants';
import {
  parseOptionalBoolean,
  parseNumberWithDefault,
  parseStringWithDefault,
  parseStrategy,
} from './config/config.parsers';
import type { HistoryConfig, ReputationConfiguration, SweepConfig } from './config/config.types';

/**
 * Build History Configuration
 *
 * Bounds on the per-address session history.
 *
 * Optional environment variables:
 * - REPUTATION_HISTORY_MAX_ENTRIES: Sessions kept per address after a sweep (default: 100)
 * - REPUTATION_HISTORY_RETENTION_SECONDS: Drop an address whose newest session is older than this (default: 432000 = 5 days)
 * - REPUTATION_HISTORY_MIN_SAMPLES: Sessions needed before the average replaces the neutral prior (default: 5)
 */
function buildHistoryConfig(): HistoryConfig {
  const maxEntries = parseNumberWithDefault(process.env.REPUTATION_HISTORY_MAX_ENTRIES, DEFAULT_HISTORY_MAX_ENTRIES);

  if (maxEntries === 0) {
    throw new Error('REPUTATION_HISTORY_MAX_ENTRIES must be at least 1');
  }

  return {
    maxEntries,
    retentionSeconds: parseNumberWithDefault(
      process.env.REPUTATION_HISTORY_RETENTION_SECONDS,
      DEFAULT_HISTORY_RETENTION_SECONDS,
    ),
    minSamples: parseNumberWithDefault(process.env.REPUTATION_HISTORY_MIN_SAMPLES, DEFAULT_HISTORY_MIN_SAMPLES),
  };
}

/**
 * Build Sweep Configuration
 *
 * Optional environment variables:
 * - REPUTATION_SWEEP_ENABLED: Run the periodic history sweep (default: true)
 * - REPUTATION_SWEEP_INTERVAL_SECONDS: Seconds between sweeps (default: 30)
 */
function buildSweepConfig(): SweepConfig {
  const intervalSeconds = parseNumberWithDefault(
    process.env.REPUTATION_SWEEP_INTERVAL_SECONDS,
    DEFAULT_SWEEP_INTERVAL_SECONDS,
  );

  if (intervalSeconds === 0) {
    throw new Error('REPUTATION_SWEEP_INTERVAL_SECONDS must be at least 1');
  }

  return {
    enabled: parseOptionalBoolean(process.env.REPUTATION_SWEEP_ENABLED, true),
    intervalSeconds,
  };
}

/**
 * Build Server Configuration
 *
 * Optional environment variables:
 * - REPUTATION_SERVER_PORT: HTTP port for the read API (default: 8080)
 * - REPUTATION_API_KEY: Key expected in the X-API-Key header; API routes reject every request when unset
 */
function buildServerConfig(): ReputationConfiguration['server'] {
  const apiKey = process.env.REPUTATION_API_KEY?.trim();

  return {
    port: parseNumberWithDefault(process.env.REPUTATION_SERVER_PORT, DEFAULT_SERVER_PORT),
    apiKey: apiKey || undefined,
  };
}

export default registerAs(
  'reputation',
  (): ReputationConfiguration => ({
    environment: parseStringWithDefault(process.env.REPUTATION_ENVIRONMENT, DEFAULT_ENVIRONMENT),
    server: buildServerConfig(),
    strategy: parseStrategy(process.env.REPUTATION_STRATEGY, DEFAULT_REPUTATION_STRATEGY),
    history: buildHistoryConfig(),
    sweep: buildSweepConfig(),
  }),
);
