import { Injectable } from '@nestjs/common';
import { NEUTRAL_TRUST, ReputationStrategy } from '../../config/config.constants';
import type { ReputationEngine } from '../interfaces/reputation-engine.interface';
import type { SessionState } from '../interfaces/session-state.interface';
import { ReputationHistoryService } from '../storage/reputation-history.service';
import { scoreSession } from '../scoring/session-scorer';
import { summarizeSession } from '../scoring/session-summary';

/**
 * Retrospective model: a session is scored once, at disconnect, and the
 * address's prior is the average of its past session scores.
 */
@Injectable()
export class HistoricalReputationEngine implements ReputationEngine {
  readonly strategy = ReputationStrategy.HISTORICAL;

  constructor(private readonly historyService: ReputationHistoryService) {}

  onConnect(session: SessionState): number {
    return session.address ? this.historyService.priorTrust(session.address) : NEUTRAL_TRUST;
  }

  onIdentify(session: SessionState): number {
    return scoreSession(session);
  }

  onMailFrom(): void {
    // scored from transaction state at disconnect
  }

  onRecipient(): void {
    // scored from transaction state at disconnect
  }

  onDisconnect(session: SessionState, timestamp: Date): number {
    const summary = summarizeSession(session, timestamp);
    if (session.address) {
      this.historyService.recordSession(session.address, summary);
    }
    return summary.score;
  }
}
