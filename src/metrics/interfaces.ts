/**
 * @interface Metrics
 * @description Counters and gauges exposed by the reputation engine.
 */
export interface Metrics {
  sessions: {
    /** Connections whose connect event was handled */
    connected_total: number;
    /** Connections marked skip (no TCP source address) */
    skipped_total: number;
    /** Scoreable sessions between connect and disconnect */
    active: number;
    /** Sessions scored at disconnect */
    scored_total: number;
    /** Unexpected failures caught at the event boundary */
    handler_errors_total: number;
  };

  transactions: {
    begun_total: number;
    committed_total: number;
    rolled_back_total: number;
  };

  history: {
    /** Session summaries appended to the history store */
    recorded_total: number;
    /** Address histories cut back to the size cap by the sweep */
    trimmed_total: number;
    /** Address histories dropped by the sweep for age */
    expired_total: number;
    /** Addresses currently holding history */
    tracked_addresses: number;
  };

  /**
   * Sizes of the incremental model's trust table. These only grow.
   */
  trust: {
    ip_entries: number;
    rdns_entries: number;
    host_entries: number;
  };

  server: {
    /** Uptime in seconds since the service was created */
    uptime_seconds: number;
  };
}
