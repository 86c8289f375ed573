import pLimit from 'p-limit';
import { CONFIG } from './config';
import { IOError, NotLoadedError, TransientNetworkError } from './errors';
import logger from './logger';
import { recordTableLoad } from './metrics';
import { fetchTldList, type TldFetchOptions, type TldFetchResult } from './tldSource';
import type { CacheFileMetadata, TldCacheStore, TldLevel } from './tldStore';

/**
 * Published view of both suffix tables. A level is either fully loaded or
 * absent; the object is replaced as a whole on every reload.
 */
export interface TldSnapshot {
  readonly levelTwo?: ReadonlySet<string>;
  readonly levelThree?: ReadonlySet<string>;
}

export type TldFetcher = (url: string, opts?: TldFetchOptions) => Promise<TldFetchResult>;

export interface TldProviderOptions {
  store: TldCacheStore;
  urls?: Partial<Record<TldLevel, string>>;
  maxAgeMs?: number;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  fetcher?: TldFetcher;
  now?: () => number;
}

/**
 * Parse cache file lines into a suffix set. Blank lines and `#` comments are
 * skipped, entries are lowercased, duplicates collapse.
 */
export function parseTldLines(lines: Iterable<string>): Set<string> {
  const set = new Set<string>();
  for (const line of lines) {
    const entry = line.trim().toLowerCase();
    if (!entry || entry.startsWith('#')) continue;
    set.add(entry);
  }
  return set;
}

export class TldTableProvider {
  private current: TldSnapshot = {};
  private readonly store: TldCacheStore;
  private readonly urls: Record<TldLevel, string>;
  private readonly maxAgeMs: number;
  private readonly fetchOpts: TldFetchOptions;
  private readonly fetcher: TldFetcher;
  private readonly now: () => number;
  // single slot: one refresh at a time, later callers queue behind it
  private readonly gate = pLimit(1);

  constructor(opts: TldProviderOptions) {
    this.store = opts.store;
    this.urls = {
      2: opts.urls?.[2] ?? CONFIG.TLD.TWO_LEVEL_URL,
      3: opts.urls?.[3] ?? CONFIG.TLD.THREE_LEVEL_URL,
    };
    this.maxAgeMs = opts.maxAgeMs ?? CONFIG.TLD.MAX_AGE_MS;
    this.fetchOpts = {
      connectTimeoutMs: opts.connectTimeoutMs ?? CONFIG.HTTP.CONNECT_TIMEOUT_MS,
      readTimeoutMs: opts.readTimeoutMs ?? CONFIG.HTTP.READ_TIMEOUT_MS,
    };
    this.fetcher = opts.fetcher ?? fetchTldList;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Bring both tables up to date.
   * @returns true when at least one table was (re)loaded into memory
   */
  refresh(): Promise<boolean> {
    return this.gate(async () => {
      const two = await this.refreshLevel(2);
      const three = await this.refreshLevel(3);
      return two || three;
    });
  }

  tableFor(level: TldLevel): ReadonlySet<string> {
    const table = level === 2 ? this.current.levelTwo : this.current.levelThree;
    if (!table) throw new NotLoadedError(level);
    return table;
  }

  snapshot(): TldSnapshot {
    return this.current;
  }

  isLoaded(): boolean {
    return this.current.levelTwo !== undefined && this.current.levelThree !== undefined;
  }

  private loaded(level: TldLevel): boolean {
    return (level === 2 ? this.current.levelTwo : this.current.levelThree) !== undefined;
  }

  private async refreshLevel(level: TldLevel): Promise<boolean> {
    let meta: CacheFileMetadata;
    try {
      meta = await this.store.stat(level);
    } catch (err) {
      throw new IOError(`Unable to stat level ${level} TLD cache`, { cause: err });
    }
    const stale = meta.mtimeMs + this.maxAgeMs < this.now();

    if (!stale) {
      if (this.loaded(level)) return false;
      await this.loadFromCache(level);
      return true;
    }

    const url = this.urls[level];
    try {
      const result = await this.fetcher(url, { ...this.fetchOpts, ifModifiedSince: meta.mtimeMs });
      if (result.status === 'fresh') {
        try {
          await this.store.write(level, result.body);
        } catch (err) {
          logger.warn({ err, level, file: meta.path }, 'TLD cache write failed, using downloaded list');
          this.publish(level, parseTldLines(result.body.split('\n')));
          return true;
        }
        await this.loadFromCache(level);
        return true;
      }
      // unchanged upstream: restart the freshness window
      try {
        await this.store.touch(level);
      } catch (err) {
        logger.warn({ err, level, file: meta.path }, 'TLD cache touch failed');
      }
      if (this.loaded(level)) return false;
      await this.loadFromCache(level);
      return true;
    } catch (err) {
      if (!(err instanceof TransientNetworkError)) throw err;
      if (this.loaded(level)) {
        logger.warn({ err, level, url }, 'TLD fetch failed, keeping loaded table');
        return false;
      }
      if (meta.mtimeMs > 0) {
        logger.warn({ err, level, url, file: meta.path }, 'TLD fetch failed, falling back to stale cache');
        await this.loadFromCache(level);
        return true;
      }
      throw new IOError(`Unable to load level ${level} TLDs from ${url} or ${meta.path}`, { cause: err });
    }
  }

  private async loadFromCache(level: TldLevel): Promise<void> {
    let lines: string[];
    try {
      lines = await this.store.readLines(level);
    } catch (err) {
      throw new IOError(`Unable to read level ${level} TLD cache`, { cause: err });
    }
    this.publish(level, parseTldLines(lines));
  }

  private publish(level: TldLevel, set: Set<string>): void {
    this.current = level === 2
      ? { ...this.current, levelTwo: set }
      : { ...this.current, levelThree: set };
    recordTableLoad(level, set.size);
    logger.info({ level, size: set.size }, 'Loaded TLDs');
  }
}
