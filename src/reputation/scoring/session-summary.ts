import type { SessionState } from '../interfaces/session-state.interface';
import type { AggregatedSummary, SessionSummary } from '../interfaces/session-summary.interface';
import { scoreSession } from './session-scorer';

/**
 * Freezes a finished session into the record kept in its address history.
 */
export function summarizeSession(session: SessionState, timestamp: Date): SessionSummary {
  let rcptCount = 0;
  let dataCount = 0;
  let commitCount = 0;
  let rollbackCount = 0;

  for (const tx of session.transactions) {
    rcptCount += tx.rcptOk + tx.rcptTempfail + tx.rcptPermfail;
    if (tx.sawData) {
      dataCount++;
    }
    if (tx.committed) {
      commitCount++;
    } else {
      rollbackCount++;
    }
  }

  return Object.freeze({
    timestamp: new Date(timestamp.getTime()),
    score: scoreSession(session),
    authFailures: session.authFailures,
    authSuccesses: session.authSuccesses,
    resets: session.resets,
    rcptCount,
    dataCount,
    commitCount,
    rollbackCount,
  });
}

/**
 * Sums the counters of a run of summaries and averages their score.
 * An empty run aggregates to all zeroes.
 */
export function aggregateSummaries(summaries: readonly SessionSummary[]): AggregatedSummary {
  const aggregate = {
    score: 0,
    authFailures: 0,
    authSuccesses: 0,
    resets: 0,
    rcptCount: 0,
    dataCount: 0,
    commitCount: 0,
    rollbackCount: 0,
  };

  if (summaries.length === 0) {
    return aggregate;
  }

  for (const summary of summaries) {
    aggregate.score += summary.score;
    aggregate.authFailures += summary.authFailures;
    aggregate.authSuccesses += summary.authSuccesses;
    aggregate.resets += summary.resets;
    aggregate.rcptCount += summary.rcptCount;
    aggregate.dataCount += summary.dataCount;
    aggregate.commitCount += summary.commitCount;
    aggregate.rollbackCount += summary.rollbackCount;
  }

  aggregate.score /= summaries.length;

  return aggregate;
}
