/**
 * Per-connection state built from SMTP lifecycle events.
 *
 * One {@link SessionState} is allocated per connection before its first
 * event and is only ever touched by that connection's events, which arrive
 * in order. Nothing here is shared between sessions.
 */

export type IdentifyMethod = 'HELO' | 'EHLO';

/**
 * One envelope attempt (MAIL FROM, RCPT TO..., DATA, commit or rollback).
 */
export interface TransactionState {
  messageId: string;
  beginTime: Date;
  /** Set on commit or rollback; the transaction takes no further events afterwards */
  endTime?: Date;
  mailFrom?: string;
  mailFromOk: boolean;
  rcptOk: number;
  rcptTempfail: number;
  rcptPermfail: number;
  sawData: boolean;
  committed: boolean;
  messageSize?: number;
}

/**
 * Running trust values kept by the incremental model.
 */
export interface SessionTrust {
  ip: number;
  rdns: number;
  helo: number;
  overall: number;
  /** Canonical HELO name `helo` was loaded for; a repeated identify with the same name keeps the running value */
  heloKey?: string;
}

export interface SessionState {
  /** Set when the connection is not scoreable (e.g. a local socket) */
  skip: boolean;

  connectTime?: Date;
  disconnectTime?: Date;

  /** Remote address, assigned once at connect */
  address?: string;
  rdnsName?: string;
  rdns: boolean;
  fcrdns: boolean;

  identifyMethod?: IdentifyMethod;
  heloName?: string;

  authAttempted: boolean;
  authSuccesses: number;
  authFailures: number;

  tls: boolean;
  tlsDescriptor?: string;

  resets: number;

  transactions: TransactionState[];

  trust: SessionTrust;
}
