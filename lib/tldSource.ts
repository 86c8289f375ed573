import { fetchWithRetry, type FetchAttempt } from './net/fetchWithRetry';
import { withTimeout } from './net/timeout';
import { TransientNetworkError } from './errors';
import { CONFIG } from './config';
import logger from './logger';

export type TldFetchResult =
  | { status: 'fresh'; body: string }
  | { status: 'not-modified' };

export interface TldFetchOptions {
  /** Cached copy's mtime; sent as If-Modified-Since when > 0. */
  ifModifiedSince?: number;
  /** Time to response headers, shared by all attempts. */
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  retries?: number;
}

/**
 * Conditionally download one TLD list.
 * Any outcome other than 200 or 304 is a `TransientNetworkError`.
 */
export async function fetchTldList(url: string, opts?: TldFetchOptions): Promise<TldFetchResult> {
  const headers: Record<string, string> = { 'User-Agent': 'surbl-check/1.0' };
  if (opts?.ifModifiedSince && opts.ifModifiedSince > 0) {
    headers['If-Modified-Since'] = new Date(opts.ifModifiedSince).toUTCString();
  }

  let attempt: FetchAttempt;
  try {
    attempt = await fetchWithRetry(
      url,
      { headers },
      {
        timeoutMs: opts?.connectTimeoutMs ?? CONFIG.HTTP.CONNECT_TIMEOUT_MS,
        retries: opts?.retries ?? CONFIG.HTTP.RETRIES,
      },
    );
  } catch (err) {
    throw new TransientNetworkError(url, { cause: err });
  }

  const { res, abort } = attempt;
  if (res.status === 304) {
    abort();
    logger.info({ url }, 'HTTP_NOT_MODIFIED');
    return { status: 'not-modified' };
  }
  if (res.status !== 200) {
    abort();
    throw new TransientNetworkError(url, { status: res.status });
  }

  try {
    const body = await withTimeout(
      res.text(),
      opts?.readTimeoutMs ?? CONFIG.HTTP.READ_TIMEOUT_MS,
      `read ${url}`,
    );
    logger.info({ url, bytes: body.length }, 'HTTP_OK');
    return { status: 'fresh', body };
  } catch (err) {
    // closes the socket of a stalled download
    abort();
    throw new TransientNetworkError(url, { cause: err });
  }
}
