export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];

/**
 * Reputation model driving the event handlers.
 */
export enum ReputationStrategy {
  /** Score each session on disconnect and average the address's past sessions */
  HISTORICAL = 'historical',
  /** Nudge per-resource trust after every event and fold it back on disconnect */
  INCREMENTAL = 'incremental',
}

export const DEFAULT_REPUTATION_STRATEGY = ReputationStrategy.HISTORICAL;

// Configuration defaults
export const DEFAULT_ENVIRONMENT = 'production';
export const DEFAULT_SERVER_PORT = 8080;
export const DEFAULT_HISTORY_MAX_ENTRIES = 100;
export const DEFAULT_HISTORY_RETENTION_SECONDS = 432000; // 5 days
export const DEFAULT_HISTORY_MIN_SAMPLES = 5;
export const DEFAULT_SWEEP_INTERVAL_SECONDS = 30;

/** Trust assumed for an address, name or session with no usable history */
export const NEUTRAL_TRUST = 0.5;
