/**
 * Outcome strings reported by the mail server for envelope commands.
 */
export type SmtpResult = 'ok' | 'tempfail' | 'permfail';

/**
 * Parsed form of a connection endpoint descriptor.
 */
export type ConnectionAddress =
  | { transport: 'tcp'; address: string; port: number }
  | { transport: 'unix'; path: string }
  | { transport: 'unknown'; raw: string };

/** rDNS value reported when the reverse lookup found no name */
export const RDNS_UNKNOWN = '<unknown>';

/** FCrDNS outcomes that count as forward-confirmed */
export const FCRDNS_PASS_VALUES: readonly string[] = ['ok', 'pass'];
