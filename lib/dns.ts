import dns, { Resolver } from 'dns/promises';
import { withTimeout } from './net/timeout';
import { CONFIG } from './config';

/**
 * Forward A lookup used for blacklist zone queries.
 */
export interface BlacklistResolver {
  resolve4(name: string): Promise<string[]>;
}

const NOT_FOUND_CODES = new Set(['ENOTFOUND', 'ENODATA']);

/** NXDOMAIN / no A record: the expected "not listed" outcome. */
export function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err
    && typeof err.code === 'string' && NOT_FOUND_CODES.has(err.code);
}

/**
 * Build the default resolver: the system resolver, or a dedicated one bound
 * to `servers` when given. Every lookup is bounded by `timeoutMs`.
 */
export function createResolver(opts?: { servers?: string[]; timeoutMs?: number }): BlacklistResolver {
  const timeoutMs = opts?.timeoutMs ?? CONFIG.DNS_TIMEOUT_MS;
  const servers = opts?.servers ?? CONFIG.DNS_SERVERS;

  if (servers.length > 0) {
    const resolver = new Resolver();
    resolver.setServers(servers);
    return {
      resolve4: (name) => withTimeout(resolver.resolve4(name), timeoutMs, `resolve4 ${name}`),
    };
  }
  return {
    resolve4: (name) => withTimeout(dns.resolve4(name), timeoutMs, `resolve4 ${name}`),
  };
}

/** Absolute `<domain>.<zone>.` name, so the resolver appends no search domain. */
export function blacklistQueryName(domain: string, zone: string): string {
  return `${domain}.${zone.replace(/^\.+|\.+$/g, '')}.`;
}

/** Blacklist convention: any answer in 127.0.0.0/8 means "listed". */
export function isListedAddress(addr: string): boolean {
  return addr.startsWith('127.');
}
