export const METRIC_PATHS = {
  // Sessions
  SESSIONS_CONNECTED_TOTAL: 'sessions.connected_total',
  SESSIONS_SKIPPED_TOTAL: 'sessions.skipped_total',
  SESSIONS_ACTIVE: 'sessions.active',
  SESSIONS_SCORED_TOTAL: 'sessions.scored_total',
  SESSIONS_HANDLER_ERRORS_TOTAL: 'sessions.handler_errors_total',

  // Transactions
  TRANSACTIONS_BEGUN_TOTAL: 'transactions.begun_total',
  TRANSACTIONS_COMMITTED_TOTAL: 'transactions.committed_total',
  TRANSACTIONS_ROLLED_BACK_TOTAL: 'transactions.rolled_back_total',

  // History
  HISTORY_RECORDED_TOTAL: 'history.recorded_total',
  HISTORY_TRIMMED_TOTAL: 'history.trimmed_total',
  HISTORY_EXPIRED_TOTAL: 'history.expired_total',
  HISTORY_TRACKED_ADDRESSES: 'history.tracked_addresses',

  // Resource trust table
  TRUST_IP_ENTRIES: 'trust.ip_entries',
  TRUST_RDNS_ENTRIES: 'trust.rdns_entries',
  TRUST_HOST_ENTRIES: 'trust.host_entries',
} as const;

export type MetricPath = (typeof METRIC_PATHS)[keyof typeof METRIC_PATHS];
