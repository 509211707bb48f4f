import { Injectable } from '@nestjs/common';
import { ReputationStrategy } from '../../config/config.constants';
import type { ReputationEngine } from '../interfaces/reputation-engine.interface';
import type { SessionState } from '../interfaces/session-state.interface';
import type { SmtpResult } from '../interfaces/reputation-events.interface';
import { ResourceTrustService } from '../storage/resource-trust.service';
import { BLEND_WEIGHTS, adjust, blendFeedback } from '../adjuster/trust-adjuster';
import { normalizeHostname } from '../utils/address.utils';

/**
 * Live model: the session's trust moves on every event, starting from the
 * shared per-resource trusts, and is folded back into them at disconnect.
 */
@Injectable()
export class IncrementalReputationEngine implements ReputationEngine {
  readonly strategy = ReputationStrategy.INCREMENTAL;

  constructor(private readonly trustService: ResourceTrustService) {}

  onConnect(session: SessionState): number {
    const { trust } = session;

    trust.ip = session.address ? this.trustService.ipTrust(session.address) : trust.ip;
    trust.rdns = session.rdnsName ? this.trustService.rdnsTrust(session.rdnsName) : trust.rdns;

    trust.ip = adjust('ip', trust.ip, session.rdns);
    trust.rdns = adjust('rdns', trust.rdns, session.rdns);

    trust.ip = adjust('ip', trust.ip, session.fcrdns);
    trust.rdns = adjust('rdns', trust.rdns, session.fcrdns);

    trust.overall = trust.ip * BLEND_WEIGHTS.ip + trust.rdns * BLEND_WEIGHTS.rdns;
    return trust.overall;
  }

  onIdentify(session: SessionState): number {
    const { trust } = session;

    if (session.heloName) {
      const heloKey = normalizeHostname(session.heloName);
      if (heloKey !== trust.heloKey) {
        trust.helo = this.trustService.hostTrust(heloKey);
        trust.heloKey = heloKey;
      }
    }

    if (session.rdns && session.rdnsName) {
      const matches = session.heloName !== undefined && normalizeHostname(session.heloName) === session.rdnsName;

      trust.ip = adjust('ip', trust.ip, matches);
      trust.rdns = adjust('rdns', trust.rdns, matches);
      trust.helo = adjust('helo', trust.helo, matches);
    }

    trust.overall = trust.ip * BLEND_WEIGHTS.ip + trust.rdns * BLEND_WEIGHTS.rdns + trust.helo * BLEND_WEIGHTS.helo;
    return trust.overall;
  }

  onMailFrom(session: SessionState, accepted: boolean): void {
    session.trust.overall = adjust('mailFrom', session.trust.overall, accepted);
  }

  onRecipient(session: SessionState, result: SmtpResult): void {
    session.trust.overall = adjust('recipient', session.trust.overall, result === 'ok');
  }

  /**
   * Feedback step: the only point where a session changes the shared tables.
   */
  onDisconnect(session: SessionState): number {
    const { trust } = session;

    if (session.address) {
      this.trustService.update('ip', session.address, blendFeedback('ip', trust.ip, trust.overall));
    }
    if (session.rdnsName) {
      this.trustService.update('rdns', session.rdnsName, blendFeedback('rdns', trust.rdns, trust.overall));
    }
    if (session.heloName) {
      const heloKey = normalizeHostname(session.heloName);
      this.trustService.update('helo', heloKey, blendFeedback('helo', trust.helo, trust.overall));
    }

    return trust.overall;
  }
}
