import { NEUTRAL_TRUST } from '../../config/config.constants';
import type { SessionState, TransactionState } from '../interfaces/session-state.interface';

/**
 * Allocates a fresh, zeroed session. Called once per connection before any
 * of its events are delivered.
 */
export function createSessionState(): SessionState {
  return {
    skip: false,
    rdns: false,
    fcrdns: false,
    authAttempted: false,
    authSuccesses: 0,
    authFailures: 0,
    tls: false,
    resets: 0,
    transactions: [],
    trust: {
      ip: NEUTRAL_TRUST,
      rdns: NEUTRAL_TRUST,
      helo: NEUTRAL_TRUST,
      overall: NEUTRAL_TRUST,
    },
  };
}

export function createTransactionState(messageId: string, beginTime: Date): TransactionState {
  return {
    messageId,
    beginTime,
    mailFromOk: false,
    rcptOk: 0,
    rcptTempfail: 0,
    rcptPermfail: 0,
    sawData: false,
    committed: false,
  };
}

/**
 * Returns the transaction still accepting events, if any.
 *
 * Only the most recently begun transaction can be open; once it is
 * committed or rolled back the session has no open transaction until the
 * next tx-begin.
 */
export function currentTransaction(session: SessionState): TransactionState | undefined {
  const tx = session.transactions.at(-1);
  return tx && !tx.endTime ? tx : undefined;
}
