/**
 * Snapshot of a finished session, appended to the address history at disconnect.
 */
export interface SessionSummary {
  readonly timestamp: Date;
  readonly score: number;
  readonly authFailures: number;
  readonly authSuccesses: number;
  readonly resets: number;
  /** Every recipient attempt, whatever its outcome */
  readonly rcptCount: number;
  readonly dataCount: number;
  readonly commitCount: number;
  /** Transactions that ended, or never ended, without a commit */
  readonly rollbackCount: number;
}

/**
 * Totals over a run of summaries; `score` is the mean, the counters are sums.
 */
export type AggregatedSummary = Omit<SessionSummary, 'timestamp'>;

export interface SweepResult {
  /** Keys cut back to the size cap */
  trimmed: number;
  /** Keys dropped because their newest session was too old */
  expired: number;
}
