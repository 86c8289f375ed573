export type CheckReason =
  | 'listed'
  | 'not-listed'
  | 'local-host' // fewer than two labels
  | 'public-suffix' // hostname is itself a known multi-level suffix
  | 'resolver-error';

export interface CheckResult {
  hostname: string; // as passed by the caller
  listed: boolean;
  domain: string | null; // domain-check string, e.g. "example.co.uk"
  query: string | null; // full query name, e.g. "example.co.uk.multi.surbl.org."
  level: number; // label granularity used, 0 when not checked
  addresses: string[]; // A records returned by the blacklist zone
  reason: CheckReason;
}

export interface SurblOptions {
  /** Directory for the cached TLD lists (default: OS temp dir). */
  cacheDir?: string;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  dnsTimeoutMs?: number;
  dnsServers?: string[];
  /** Blacklist zone, default `multi.surbl.org`. */
  zone?: string;
  failClosed?: boolean;
  resultCacheTtlMs?: number;
  tldMaxAgeMs?: number;
  twoLevelUrl?: string;
  threeLevelUrl?: string;
}
