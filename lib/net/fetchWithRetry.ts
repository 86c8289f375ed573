import { CONFIG } from '../config';
import logger from '../logger';

export interface FetchRetryOptions {
  retries?: number; // total attempts
  backoffMs?: number; // base backoff, doubled per attempt
  /** Budget for getting response headers, shared by all attempts and backoff sleeps. */
  timeoutMs?: number;
}

/**
 * A response whose request can still be aborted. The abort signal stays
 * armed after headers arrive so the caller can cut off a slow body.
 */
export interface FetchAttempt {
  res: Response;
  abort(): void;
}

/**
 * Fetch with retries and exponential backoff inside a fixed deadline.
 * 5xx and 429 responses are retried while time remains; the last response is
 * returned as is. Network errors are retried and the last one is rethrown.
 */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<FetchAttempt> {
  const retries = Math.max(1, opts?.retries ?? CONFIG.HTTP.RETRIES);
  const base = opts?.backoffMs ?? 200;
  const deadline = Date.now() + (opts?.timeoutMs ?? CONFIG.HTTP.CONNECT_TIMEOUT_MS);

  let attempt = 0;
  while (true) {
    attempt++;
    const remaining = Math.max(0, deadline - Date.now());
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), remaining);
    try {
      const res = await fetch(url, { ...(init || {}), signal: controller.signal });
      clearTimeout(timer);
      const retryable = res.status === 429 || res.status >= 500;
      if (!retryable || !(await backoff(attempt, retries, base, deadline))) {
        return { res, abort: () => controller.abort() };
      }
      logger.debug({ url, attempt, status: res.status }, 'fetchWithRetry retrying after status');
      // drop the unused body so the connection is released
      await res.body?.cancel();
    } catch (err) {
      clearTimeout(timer);
      logger.debug({ url, attempt, err }, 'fetchWithRetry request failed');
      if (!(await backoff(attempt, retries, base, deadline))) throw err;
    }
  }
}

/** Sleep before the next attempt; false when attempts or time ran out. */
async function backoff(attempt: number, retries: number, base: number, deadline: number): Promise<boolean> {
  if (attempt >= retries) return false;
  const remaining = deadline - Date.now();
  if (remaining <= 0) return false;
  const delay = Math.min(base * Math.pow(2, attempt - 1), remaining);
  await new Promise((r) => setTimeout(r, delay));
  return deadline - Date.now() > 0;
}
