import punycode from 'punycode/';
import { isIPv4, isIPv6 } from 'net';

/**
 * Normalize a hostname: trim, drop surrounding dots, lowercase and convert
 * IDN labels to ASCII (punycode). Brackets around IPv6 literals are removed.
 */
export function normalizeHostname(input: string): string {
  let s = input.trim();
  if (s.startsWith('[') && s.endsWith(']')) s = s.slice(1, -1);
  s = s.replace(/^\.+|\.+$/g, '');
  if (s.includes(':')) return s.toLowerCase();
  return punycode.toASCII(s.toLowerCase());
}

/** Split on `.` and drop empty tokens ("a..b" has two labels). */
export function tokenize(hostname: string): string[] {
  return hostname.split('.').filter(Boolean);
}

export type AddressFamily = 4 | 6 | null;

/**
 * Classify a normalized hostname as an IPv4 literal, IPv6 literal or a name.
 * Parsing only; no resolver involved.
 */
export function literalFamily(hostname: string): AddressFamily {
  if (isIPv4(hostname)) return 4;
  if (isIPv6(hostname)) return 6;
  return null;
}

/**
 * The trailing `level` labels joined with `.`, or null when the hostname has
 * fewer labels than requested.
 */
export function domainAtLevel(labels: readonly string[], level: number): string | null {
  const offset = labels.length - level;
  if (offset < 0) return null;
  return labels.slice(offset, offset + level).join('.');
}
