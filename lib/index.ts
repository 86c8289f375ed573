/**
 * SURBL client: checks whether a hostname's registrable domain is listed in
 * a URI reputation blacklist zone.
 *
 * Usage:
 * import { Surbl } from 'surbl-check'
 *
 * const surbl = new Surbl({ cacheDir: '/var/cache/surbl' })
 * await surbl.load()
 * if (await surbl.check('www.acme.com')) { // spam }
 */

import { BlacklistChecker } from './checker';
import { CONFIG } from './config';
import { createResolver, type BlacklistResolver } from './dns';
import { TldTableProvider, type TldFetcher } from './tldProvider';
import { FsTldCacheStore, type TldCacheStore } from './tldStore';
import type { CheckResult, SurblOptions } from './types';

export interface SurblDependencies {
  resolver?: BlacklistResolver;
  store?: TldCacheStore;
  fetcher?: TldFetcher;
  now?: () => number;
}

export class Surbl {
  readonly provider: TldTableProvider;
  readonly checker: BlacklistChecker;

  /**
   * Throws `ConfigError` when the cache directory cannot be created.
   */
  constructor(opts: SurblOptions = {}, deps: SurblDependencies = {}) {
    const store = deps.store ?? new FsTldCacheStore(opts.cacheDir ?? CONFIG.CACHE_DIR);
    this.provider = new TldTableProvider({
      store,
      urls: {
        2: opts.twoLevelUrl ?? CONFIG.TLD.TWO_LEVEL_URL,
        3: opts.threeLevelUrl ?? CONFIG.TLD.THREE_LEVEL_URL,
      },
      maxAgeMs: opts.tldMaxAgeMs,
      connectTimeoutMs: opts.connectTimeoutMs,
      readTimeoutMs: opts.readTimeoutMs,
      fetcher: deps.fetcher,
      now: deps.now,
    });
    this.checker = new BlacklistChecker({
      provider: this.provider,
      resolver: deps.resolver ?? createResolver({ servers: opts.dnsServers, timeoutMs: opts.dnsTimeoutMs }),
      zone: opts.zone,
      failClosed: opts.failClosed,
      resultCacheTtlMs: opts.resultCacheTtlMs,
    });
  }

  /** Load or refresh the TLD tables. Resolves true when any table changed. */
  load(): Promise<boolean> {
    return this.provider.refresh();
  }

  refresh(): Promise<boolean> {
    return this.provider.refresh();
  }

  check(hostname: string): Promise<boolean> {
    return this.checker.check(hostname);
  }

  checkDetailed(hostname: string): Promise<CheckResult> {
    return this.checker.checkDetailed(hostname);
  }

  checkMany(hostnames: string[], opts?: { concurrency?: number }): Promise<Record<string, boolean>> {
    return this.checker.checkMany(hostnames, opts);
  }
}

export { BlacklistChecker, prepareLabels, resolveDomainCheck } from './checker';
export { createResolver, blacklistQueryName, isListedAddress, isNotFound } from './dns';
export type { BlacklistResolver } from './dns';
export * from './errors';
export { TldTableProvider, parseTldLines } from './tldProvider';
export type { TldSnapshot, TldFetcher } from './tldProvider';
export { FsTldCacheStore } from './tldStore';
export type { TldCacheStore, TldLevel, CacheFileMetadata } from './tldStore';
export { fetchTldList } from './tldSource';
export type { TldFetchResult } from './tldSource';
export { normalizeHostname, tokenize } from './hostname';
export { register as metricsRegister } from './metrics';
export type { CheckResult, CheckReason, SurblOptions } from './types';
export default Surbl;
