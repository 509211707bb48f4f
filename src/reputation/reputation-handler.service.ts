/**
 * Reputation Handler Service
 *
 * Event boundary between the mail server's session lifecycle reports and
 * the reputation engine. The protocol layer allocates one session per
 * connection with {@link ReputationHandlerService.allocateSession} and then
 * delivers that connection's events, in order, to the handlers below.
 *
 * ## Behaviour
 * - A connection whose source is not a TCP endpoint is marked `skip`;
 *   every later event for it is dropped, and it is never scored or recorded
 * - Transaction events apply to the open transaction (the last one begun
 *   and not yet committed or rolled back); without one they are dropped
 * - Handlers never throw: failures are logged and counted, and only the
 *   session that raised them is affected
 *
 * @module reputation-handler
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { getErrorMessage, getErrorStack } from '../shared/error.utils';
import { REPUTATION_ENGINE } from './interfaces/reputation-engine.interface';
import type { ReputationEngine } from './interfaces/reputation-engine.interface';
import type { IdentifyMethod, SessionState, TransactionState } from './interfaces/session-state.interface';
import { FCRDNS_PASS_VALUES, RDNS_UNKNOWN } from './interfaces/reputation-events.interface';
import type { SmtpResult } from './interfaces/reputation-events.interface';
import { createSessionState, createTransactionState, currentTransaction } from './session/session-state.factory';
import { normalizeHostname, parseConnectionAddress } from './utils/address.utils';
import { scoreTransaction } from './scoring/transaction-scorer';
import { formatScore } from './scoring/score.utils';

function isSmtpResult(value: string): value is SmtpResult {
  return value === 'ok' || value === 'tempfail' || value === 'permfail';
}

function parseIdentifyMethod(method: string): IdentifyMethod | undefined {
  const normalized = method.trim().toUpperCase();
  return normalized === 'HELO' || normalized === 'EHLO' ? normalized : undefined;
}

@Injectable()
export class ReputationHandlerService {
  private readonly logger = new Logger(ReputationHandlerService.name);

  constructor(
    @Inject(REPUTATION_ENGINE) private readonly engine: ReputationEngine,
    private readonly metricsService: MetricsService,
  ) {
    this.logger.log(`Reputation handler initialized with ${this.engine.strategy.toUpperCase()} strategy`);
  }

  /**
   * Allocates the state for a new connection. Must be called before any
   * event for that connection is delivered.
   */
  allocateSession(): SessionState {
    return createSessionState();
  }

  linkConnect(timestamp: Date, session: SessionState, rdns: string, fcrdns: string, src: string, dest: string): void {
    this.dispatch('link-connect', session, () => {
      if (session.address !== undefined) {
        this.logger.warn(`Duplicate connect for ${session.address} ignored`);
        return;
      }

      const source = parseConnectionAddress(src);
      if (source.transport !== 'tcp') {
        session.skip = true;
        this.metricsService.increment(METRIC_PATHS.SESSIONS_SKIPPED_TOTAL);
        this.logger.debug(`connect: skipping non-TCP session src=${src} dest=${dest}`);
        return;
      }

      session.connectTime = timestamp;
      session.address = source.address;
      session.rdns = rdns !== RDNS_UNKNOWN;
      session.rdnsName = session.rdns ? normalizeHostname(rdns) : undefined;
      session.fcrdns = FCRDNS_PASS_VALUES.includes(fcrdns.trim().toLowerCase());
      // paired with the decrement in linkDisconnect, which runs for every session with an address
      this.metricsService.increment(METRIC_PATHS.SESSIONS_ACTIVE);

      const score = this.engine.onConnect(session);

      this.metricsService.increment(METRIC_PATHS.SESSIONS_CONNECTED_TOTAL);
      this.logger.log(`connect: ip-address=${source.address} score=${formatScore(score)}`);
    });
  }

  linkDisconnect(timestamp: Date, session: SessionState): void {
    this.dispatch('link-disconnect', session, () => {
      if (session.address === undefined || session.disconnectTime) {
        return;
      }

      session.disconnectTime = timestamp;
      const score = this.engine.onDisconnect(session, timestamp);

      this.metricsService.increment(METRIC_PATHS.SESSIONS_SCORED_TOTAL);
      this.metricsService.decrement(METRIC_PATHS.SESSIONS_ACTIVE);
      this.logger.log(`disconnect: ip-address=${session.address} score=${formatScore(score)}`);
    });
  }

  linkIdentify(timestamp: Date, session: SessionState, method: string, hostname: string): void {
    this.dispatch('link-identify', session, () => {
      session.identifyMethod = parseIdentifyMethod(method);
      session.heloName = hostname;

      const score = this.engine.onIdentify(session);
      this.logger.debug(`identify: ip-address=${session.address} ${method} ${hostname} score=${formatScore(score)}`);
    });
  }

  linkAuth(timestamp: Date, session: SessionState, result: string, username: string): void {
    this.dispatch('link-auth', session, () => {
      session.authAttempted = true;
      if (result === 'ok') {
        session.authSuccesses++;
      } else {
        session.authFailures++;
        this.logger.debug(`auth: ip-address=${session.address} user=${username} result=${result}`);
      }
    });
  }

  linkTls(timestamp: Date, session: SessionState, descriptor: string): void {
    this.dispatch('link-tls', session, () => {
      session.tls = true;
      session.tlsDescriptor = descriptor;
    });
  }

  txReset(timestamp: Date, session: SessionState, messageId: string): void {
    this.dispatch('tx-reset', session, () => {
      session.resets++;
      this.logger.debug(`txReset: ip-address=${session.address} msgid=${messageId || '-'}`);
    });
  }

  txBegin(timestamp: Date, session: SessionState, messageId: string): void {
    this.dispatch('tx-begin', session, () => {
      session.transactions.push(createTransactionState(messageId, timestamp));
      this.metricsService.increment(METRIC_PATHS.TRANSACTIONS_BEGUN_TOTAL);
      this.logger.debug(`txBegin: msgid=${messageId} at ${timestamp.toISOString()}`);
    });
  }

  txMail(timestamp: Date, session: SessionState, messageId: string, result: string, from: string): void {
    this.withTransaction('tx-mail', session, messageId, (tx) => {
      const accepted = result === 'ok';
      tx.mailFrom = from;
      if (accepted) {
        tx.mailFromOk = true;
      }
      this.engine.onMailFrom(session, accepted);
    });
  }

  txRcpt(timestamp: Date, session: SessionState, messageId: string, result: string, to: string): void {
    this.withTransaction('tx-rcpt', session, messageId, (tx) => {
      if (!isSmtpResult(result)) {
        this.logger.debug(`txRcpt: unknown result "${result}" for ${to} ignored`);
        return;
      }

      switch (result) {
        case 'ok':
          tx.rcptOk++;
          break;
        case 'tempfail':
          tx.rcptTempfail++;
          break;
        case 'permfail':
          tx.rcptPermfail++;
          break;
      }
      this.engine.onRecipient(session, result);
    });
  }

  txData(timestamp: Date, session: SessionState, messageId: string, result: string): void {
    this.withTransaction('tx-data', session, messageId, (tx) => {
      tx.sawData = true;
      if (result !== 'ok') {
        this.logger.debug(`txData: msgid=${messageId} result=${result}`);
      }
    });
  }

  txCommit(timestamp: Date, session: SessionState, messageId: string, messageSize: number): void {
    this.withTransaction('tx-commit', session, messageId, (tx) => {
      tx.endTime = timestamp;
      tx.committed = true;
      tx.messageSize = messageSize;

      this.metricsService.increment(METRIC_PATHS.TRANSACTIONS_COMMITTED_TOTAL);
      this.logger.log(`txCommit: msgid=${messageId} score=${formatScore(scoreTransaction(tx))}`);
    });
  }

  txRollback(timestamp: Date, session: SessionState, messageId: string): void {
    this.withTransaction('tx-rollback', session, messageId, (tx) => {
      tx.endTime = timestamp;

      this.metricsService.increment(METRIC_PATHS.TRANSACTIONS_ROLLED_BACK_TOTAL);
      this.logger.log(`txRollback: msgid=${messageId} score=${formatScore(scoreTransaction(tx))}`);
    });
  }

  private withTransaction(
    event: string,
    session: SessionState,
    messageId: string,
    handler: (tx: TransactionState) => void,
  ): void {
    this.dispatch(event, session, () => {
      const tx = currentTransaction(session);
      if (!tx) {
        this.logger.debug(`${event}: no open transaction for msgid=${messageId}, event dropped`);
        return;
      }
      handler(tx);
    });
  }

  /**
   * Runs a handler body unless the session is skipped, containing any failure.
   */
  private dispatch(event: string, session: SessionState, handler: () => void): void {
    if (session.skip) {
      return;
    }

    try {
      handler();
    } catch (error) {
      this.metricsService.increment(METRIC_PATHS.SESSIONS_HANDLER_ERRORS_TOTAL);
      this.logger.error(
        `Failed to handle ${event} for ${session.address ?? 'unknown address'}: ${getErrorMessage(error)}`,
        getErrorStack(error),
      );
    }
  }
}
