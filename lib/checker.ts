import { performance } from 'perf_hooks';
import pLimit from 'p-limit';
import { createResultCache, type CacheAdapter } from './cache';
import { CONFIG } from './config';
import { blacklistQueryName, isListedAddress, isNotFound, type BlacklistResolver } from './dns';
import { InvalidInputError, MalformedInputError } from './errors';
import { domainAtLevel, literalFamily, normalizeHostname, tokenize } from './hostname';
import logger from './logger';
import { incChecks, incResolverErrors, observeQueryLatency } from './metrics';
import type { TldTableProvider } from './tldProvider';
import type { CheckReason, CheckResult } from './types';

export interface CheckerOptions {
  provider: TldTableProvider;
  resolver: BlacklistResolver;
  zone?: string;
  /** Treat resolver failures as "listed" instead of "clean". */
  failClosed?: boolean;
  resultCacheTtlMs?: number;
  resultCacheMax?: number;
}

export interface DomainCheck {
  labels: readonly string[];
  /** Final granularity, 2..4. */
  level: number;
  /** Domain-check string, null when the hostname is itself a public suffix. */
  domain: string | null;
  /** Number of suffix table lookups made while escalating. */
  lookups: number;
}

/**
 * Pick the registrable-domain granularity for a label sequence.
 *
 * Starting at `startLevel`, a level-2 string found in the two-level table
 * escalates to 3, a level-3 string found in the three-level table escalates
 * to 4. Level 4 is never looked up, so there are at most two table lookups
 * per call.
 */
export function resolveDomainCheck(
  labels: readonly string[],
  startLevel: number,
  tableFor: (level: 2 | 3) => ReadonlySet<string>,
): DomainCheck {
  let level = startLevel;
  let lookups = 0;
  while (true) {
    const domain = domainAtLevel(labels, level);
    if (domain === null) return { labels, level, domain: null, lookups };
    if (level === 2 || level === 3) {
      lookups++;
      if (tableFor(level).has(domain)) {
        level++;
        continue;
      }
    }
    return { labels, level, domain, lookups };
  }
}

/**
 * Labels ordered for querying plus the starting level. IPv4 literals are
 * reversed and start at 4; IPv6 literals cannot be queried.
 */
export function prepareLabels(hostname: string): { labels: string[]; startLevel: number } {
  const family = literalFamily(hostname);
  if (family === 6) throw new MalformedInputError(hostname);
  const labels = tokenize(hostname);
  if (family === 4) return { labels: labels.reverse(), startLevel: 4 };
  if (labels.length < 2) throw new InvalidInputError(hostname);
  return { labels, startLevel: 2 };
}

export class BlacklistChecker {
  private readonly provider: TldTableProvider;
  private readonly resolver: BlacklistResolver;
  private readonly zone: string;
  private readonly failClosed: boolean;
  private readonly results: CacheAdapter<CheckResult>;

  constructor(opts: CheckerOptions) {
    this.provider = opts.provider;
    this.resolver = opts.resolver;
    this.zone = opts.zone ?? CONFIG.ZONE;
    this.failClosed = opts.failClosed ?? CONFIG.FAIL_CLOSED;
    this.results = createResultCache<CheckResult>(
      opts.resultCacheTtlMs ?? CONFIG.RESULT_CACHE_TTL_MS,
      opts.resultCacheMax ?? CONFIG.RESULT_CACHE_MAX,
    );
  }

  async check(hostname: string): Promise<boolean> {
    const result = await this.checkDetailed(hostname);
    return result.listed;
  }

  /**
   * Check a hostname and report which domain was queried and why the
   * answer is what it is. Throws `MalformedInputError` for IPv6 literals
   * and `NotLoadedError` when the TLD tables were never loaded.
   */
  async checkDetailed(hostname: string): Promise<CheckResult> {
    const normalized = normalizeHostname(hostname);

    let prepared: { labels: string[]; startLevel: number };
    try {
      prepared = prepareLabels(normalized);
    } catch (err) {
      if (err instanceof InvalidInputError) {
        logger.debug({ hostname }, 'Local host, not checked');
        return this.finish(hostname, { listed: false, domain: null, query: null, level: 0, reason: 'local-host' });
      }
      throw err;
    }
    logger.debug({ hostname, labels: prepared.labels, startLevel: prepared.startLevel }, 'Domain tokens');

    const resolved = resolveDomainCheck(prepared.labels, prepared.startLevel, (level) => this.provider.tableFor(level));
    if (resolved.domain === null) {
      logger.debug({ hostname, level: resolved.level }, 'Hostname is a public suffix, not checked');
      return this.finish(hostname, { listed: false, domain: null, query: null, level: resolved.level, reason: 'public-suffix' });
    }

    const query = blacklistQueryName(resolved.domain, this.zone);
    const cached = this.results.get(query);
    if (cached) {
      incChecks(cached.reason);
      return { ...cached, hostname };
    }

    const outcome = await this.lookup(query, resolved.domain, resolved.level);
    const result = this.finish(hostname, {
      domain: resolved.domain,
      query,
      level: resolved.level,
      ...outcome,
    });
    if (outcome.reason !== 'resolver-error') this.results.set(query, result);
    return result;
  }

  /**
   * Check many hostnames with bounded concurrency. IPv6 literals map to
   * false here rather than failing the whole batch.
   */
  async checkMany(hostnames: string[], opts?: { concurrency?: number }): Promise<Record<string, boolean>> {
    const limit = pLimit(opts?.concurrency ?? CONFIG.CHECK_CONCURRENCY);
    const entries = await Promise.all(
      hostnames.map((h) =>
        limit(async () => {
          try {
            return [h, await this.check(h)] as const;
          } catch (err) {
            if (!(err instanceof MalformedInputError)) throw err;
            logger.warn({ hostname: h }, 'Skipping unsupported IPv6 literal');
            return [h, false] as const;
          }
        }),
      ),
    );
    return Object.fromEntries(entries);
  }

  clearCache(): void {
    this.results.clear();
  }

  private async lookup(
    query: string,
    domain: string,
    level: number,
  ): Promise<{ listed: boolean; addresses: string[]; reason: CheckReason }> {
    logger.debug({ level, domain, query }, 'Querying blacklist zone');
    const started = performance.now();
    try {
      const addresses = await this.resolver.resolve4(query);
      observeQueryLatency((performance.now() - started) / 1000);
      if (addresses.some(isListedAddress)) {
        logger.info({ domain, addresses }, 'Domain listed');
        return { listed: true, addresses, reason: 'listed' };
      }
      logger.debug({ domain, addresses }, 'Domain not listed');
      return { listed: false, addresses, reason: 'not-listed' };
    } catch (err) {
      observeQueryLatency((performance.now() - started) / 1000);
      if (isNotFound(err)) {
        logger.debug({ domain }, 'Domain not listed');
        return { listed: false, addresses: [], reason: 'not-listed' };
      }
      incResolverErrors();
      logger.warn({ err, domain, query, failClosed: this.failClosed }, 'Blacklist query failed');
      return { listed: this.failClosed, addresses: [], reason: 'resolver-error' };
    }
  }

  private finish(hostname: string, partial: Omit<CheckResult, 'hostname' | 'addresses'> & { addresses?: string[] }): CheckResult {
    const result: CheckResult = { ...partial, hostname, addresses: partial.addresses ?? [] };
    incChecks(result.reason);
    return result;
  }
}
