import { scoreSession } from '../session-scorer';
import { aggregateSummaries, summarizeSession } from '../session-summary';
import { buildSession, buildSummary, buildTransaction } from '../../../../test/helpers/sessions';

describe('scoreSession', () => {
  it('should score a bare session as 0', () => {
    expect(scoreSession(buildSession())).toBe(0);
  });

  it('should reward TLS and verified DNS with fixed bonuses', () => {
    const session = buildSession({ tls: true, rdns: true, fcrdns: true });

    expect(scoreSession(session)).toBeCloseTo(0.4, 10);
  });

  it('should average transaction scores', () => {
    const session = buildSession({
      transactions: [
        buildTransaction({ mailFromOk: true, sawData: true, committed: true }),
        buildTransaction({ mailFromOk: true, rcptTempfail: 1 }),
      ],
    });

    // (1.0 + 0.2) / 2
    expect(scoreSession(session)).toBeCloseTo(0.6, 10);
  });

  it('should apply auth outcomes and resets per occurrence', () => {
    const session = buildSession({
      tls: true,
      authSuccesses: 2,
      authFailures: 1,
      resets: 2,
      transactions: [buildTransaction({ mailFromOk: true })],
    });

    // 0.4 + 0.2 - 0.1 + 0.2 - 0.1
    expect(scoreSession(session)).toBeCloseTo(0.6, 10);
  });

  it('should floor at 0 after repeated auth failures', () => {
    const session = buildSession({ tls: true, rdns: true, fcrdns: true, authFailures: 12 });

    expect(scoreSession(session)).toBe(0);
  });

  it('should cap at 1', () => {
    const session = buildSession({
      tls: true,
      rdns: true,
      fcrdns: true,
      authSuccesses: 3,
      transactions: [buildTransaction({ mailFromOk: true, sawData: true, committed: true })],
    });

    expect(scoreSession(session)).toBe(1);
  });

  it('should stay within [0, 1] across signal combinations', () => {
    for (const tls of [false, true]) {
      for (const authSuccesses of [0, 1, 20]) {
        for (const authFailures of [0, 1, 20]) {
          for (const resets of [0, 3, 40]) {
            const score = scoreSession(
              buildSession({ tls, rdns: tls, fcrdns: !tls, authSuccesses, authFailures, resets }),
            );
            expect(score).toBeGreaterThanOrEqual(0);
            expect(score).toBeLessThanOrEqual(1);
          }
        }
      }
    }
  });
});

describe('summarizeSession', () => {
  it('should count recipients, data phases, commits and rollbacks', () => {
    const timestamp = new Date('2026-03-01T12:00:00Z');
    const session = buildSession({
      authFailures: 1,
      authSuccesses: 2,
      resets: 1,
      transactions: [
        buildTransaction({ mailFromOk: true, rcptOk: 2, rcptTempfail: 1, sawData: true, committed: true }),
        buildTransaction({ mailFromOk: true, rcptPermfail: 1 }),
        buildTransaction({ mailFromOk: false }),
      ],
    });

    const summary = summarizeSession(session, timestamp);

    expect(summary).toEqual({
      timestamp,
      score: scoreSession(session),
      authFailures: 1,
      authSuccesses: 2,
      resets: 1,
      rcptCount: 4,
      dataCount: 1,
      commitCount: 1,
      rollbackCount: 2,
    });
    expect(Object.isFrozen(summary)).toBe(true);
  });

  it('should not share the timestamp object with the caller', () => {
    const timestamp = new Date('2026-03-01T12:00:00Z');

    const summary = summarizeSession(buildSession(), timestamp);
    timestamp.setUTCFullYear(2020);

    expect(summary.timestamp).not.toBe(timestamp);
    expect(summary.timestamp.toISOString()).toBe('2026-03-01T12:00:00.000Z');
  });
});

describe('aggregateSummaries', () => {
  it('should return zeroes for no summaries', () => {
    expect(aggregateSummaries([])).toEqual({
      score: 0,
      authFailures: 0,
      authSuccesses: 0,
      resets: 0,
      rcptCount: 0,
      dataCount: 0,
      commitCount: 0,
      rollbackCount: 0,
    });
  });

  it('should average scores and sum counters', () => {
    const aggregate = aggregateSummaries([
      buildSummary(0.2, new Date(), { rcptCount: 3, commitCount: 1, authFailures: 2 }),
      buildSummary(0.6, new Date(), { rcptCount: 1, rollbackCount: 1, resets: 4 }),
    ]);

    expect(aggregate.score).toBeCloseTo(0.4, 10);
    expect(aggregate.rcptCount).toBe(4);
    expect(aggregate.commitCount).toBe(1);
    expect(aggregate.rollbackCount).toBe(1);
    expect(aggregate.authFailures).toBe(2);
    expect(aggregate.resets).toBe(4);
  });
});
