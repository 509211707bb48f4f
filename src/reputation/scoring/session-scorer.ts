import type { SessionState } from '../interfaces/session-state.interface';
import { scoreTransaction } from './transaction-scorer';
import { clampScore } from './score.utils';

export const SESSION_WEIGHTS = {
  AUTH_SUCCESS: 0.1,
  AUTH_FAILURE_PENALTY: 0.1,
  TLS: 0.2,
  RDNS: 0.1,
  FCRDNS: 0.1,
  RESET_PENALTY: 0.05,
} as const;

/**
 * Scores a whole session in [0, 1]: the mean transaction score plus fixed
 * bonuses for TLS and verified DNS identity, adjusted per auth outcome and
 * per reset.
 */
export function scoreSession(session: SessionState): number {
  let score = 0;

  const { transactions } = session;
  if (transactions.length > 0) {
    const total = transactions.reduce((sum, tx) => sum + scoreTransaction(tx), 0);
    score += total / transactions.length;
  }

  score += session.authSuccesses * SESSION_WEIGHTS.AUTH_SUCCESS;
  score -= session.authFailures * SESSION_WEIGHTS.AUTH_FAILURE_PENALTY;

  if (session.tls) {
    score += SESSION_WEIGHTS.TLS;
  }
  if (session.rdns) {
    score += SESSION_WEIGHTS.RDNS;
  }
  if (session.fcrdns) {
    score += SESSION_WEIGHTS.FCRDNS;
  }

  score -= session.resets * SESSION_WEIGHTS.RESET_PENALTY;

  return clampScore(score);
}
