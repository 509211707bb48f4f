import type { ReputationStrategy } from '../../config/config.constants';
import type { SessionState } from './session-state.interface';
import type { SmtpResult } from './reputation-events.interface';

/**
 * Injection token for the engine selected by `reputation.strategy`.
 */
export const REPUTATION_ENGINE = Symbol('REPUTATION_ENGINE');

/**
 * Capability set shared by the historical and incremental models.
 *
 * Every hook is synchronous. Hooks returning a number return the trust
 * estimate the model holds for the session at that point, in [0, 1].
 */
export interface ReputationEngine {
  readonly strategy: ReputationStrategy;

  /** Session has its address and DNS outcome */
  onConnect(session: SessionState): number;

  /** Session has declared its HELO/EHLO name */
  onIdentify(session: SessionState): number;

  onMailFrom(session: SessionState, accepted: boolean): void;

  onRecipient(session: SessionState, result: SmtpResult): void;

  /** Session is over; fold it into shared state and return its final score */
  onDisconnect(session: SessionState, timestamp: Date): number;
}
