import type { TransactionState } from '../interfaces/session-state.interface';
import { clampScore } from './score.utils';

export const TRANSACTION_WEIGHTS = {
  VALID_SENDER: 0.4,
  DATA: 0.3,
  COMMIT: 0.3,
  /** Per accepted recipient */
  ACCEPTED_RECIPIENT: 0.1,
  /** Per temp- or perm-failed recipient */
  FAILED_RECIPIENT_PENALTY: 0.2,
} as const;

/**
 * Scores one envelope attempt in [0, 1].
 *
 * Recipient outcomes are linear so that a client walking through many
 * invalid recipients loses proportionally to how many it tried.
 */
export function scoreTransaction(tx: TransactionState): number {
  let score = 0;

  if (tx.mailFromOk) {
    score += TRANSACTION_WEIGHTS.VALID_SENDER;
  }
  if (tx.sawData) {
    score += TRANSACTION_WEIGHTS.DATA;
  }
  if (tx.committed) {
    score += TRANSACTION_WEIGHTS.COMMIT;
  }

  score += tx.rcptOk * TRANSACTION_WEIGHTS.ACCEPTED_RECIPIENT;
  score -= (tx.rcptTempfail + tx.rcptPermfail) * TRANSACTION_WEIGHTS.FAILED_RECIPIENT_PENALTY;

  return clampScore(score);
}
