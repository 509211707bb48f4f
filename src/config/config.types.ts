import type { ReputationStrategy } from './config.constants';

export interface HistoryConfig {
  /** Entries kept per address after a sweep */
  maxEntries: number;
  /** Age in seconds after which an address with no newer session is dropped */
  retentionSeconds: number;
  /** Sessions required before the average replaces the neutral prior */
  minSamples: number;
}

export interface SweepConfig {
  enabled: boolean;
  intervalSeconds: number;
}

/**
 * Configuration type definition for type-safe access
 */
export interface ReputationConfiguration {
  environment: string;
  server: {
    port: number;
    apiKey?: string;
  };
  strategy: ReputationStrategy;
  history: HistoryConfig;
  sweep: SweepConfig;
}
