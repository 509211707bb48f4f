/**
 * Connection address helpers
 *
 * The mail server describes each end of a connection as a string:
 * `192.0.2.10:25`, `[2001:db8::1]:25` or `unix:/var/run/smtpd.sock`.
 * Only TCP endpoints carry an address that reputation can be keyed on.
 *
 * @module address-utils
 */

import { isIP } from 'net';
import type { ConnectionAddress } from '../interfaces/reputation-events.interface';

/**
 * Normalizes an IP address for consistent keying and logging.
 *
 * - Trims whitespace
 * - Removes IPv6 zone identifiers (e.g., %eth0)
 * - Strips the IPv4-mapped IPv6 prefix (::ffff:)
 * - Lowercases IPv6 hex digits
 *
 * @example
 * ```typescript
 * normalizeIp('::ffff:192.168.1.1') // returns '192.168.1.1'
 * normalizeIp('FE80::1%eth0') // returns 'fe80::1'
 * ```
 */
export function normalizeIp(ip: string): string {
  let normalized = ip.trim();

  const zoneIndex = normalized.indexOf('%');
  if (zoneIndex >= 0) {
    normalized = normalized.slice(0, zoneIndex);
  }

  if (normalized.toLowerCase().startsWith('::ffff:') && isIP(normalized.slice(7)) === 4) {
    normalized = normalized.slice(7);
  }

  return normalized.toLowerCase();
}

function parsePort(value: string): number | undefined {
  if (!/^\d{1,5}$/.test(value)) {
    return undefined;
  }
  const port = Number(value);
  return port <= 65535 ? port : undefined;
}

/**
 * Parses a connection endpoint descriptor.
 *
 * Anything that is neither a `unix:` path nor an `ip:port` / `[ipv6]:port`
 * pair comes back as `unknown`.
 */
export function parseConnectionAddress(raw: string): ConnectionAddress {
  const value = raw.trim();

  if (value.startsWith('unix:')) {
    return { transport: 'unix', path: value.slice('unix:'.length) };
  }

  let host: string;
  let portText: string;

  if (value.startsWith('[')) {
    const close = value.indexOf(']:');
    if (close < 0) {
      return { transport: 'unknown', raw };
    }
    host = value.slice(1, close);
    portText = value.slice(close + 2);
  } else {
    const colon = value.lastIndexOf(':');
    if (colon < 0) {
      return { transport: 'unknown', raw };
    }
    host = value.slice(0, colon);
    portText = value.slice(colon + 1);
  }

  const port = parsePort(portText);
  if (port === undefined || isIP(host.replace(/%.*$/, '')) === 0) {
    return { transport: 'unknown', raw };
  }

  return { transport: 'tcp', address: normalizeIp(host), port };
}

/**
 * Canonical form of a DNS name for comparison: lowercase, no trailing dot.
 */
export function normalizeHostname(name: string): string {
  return name.trim().toLowerCase().replace(/\.$/, '');
}
