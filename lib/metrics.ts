/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `surbl_checks_total` (Counter, label `result`)
 * - `surbl_resolver_errors_total` (Counter)
 * - `surbl_tld_reloads_total` (Counter, label `level`)
 * - `surbl_tld_entries` (Gauge, label `level`)
 * - `surbl_query_latency_seconds` (Histogram)
 *
 * Expose `register.metrics()` wherever the host application serves Prometheus scrapes.
 */

import { Counter, Gauge, Histogram, register } from 'prom-client';

export const checksTotal = new Counter({
  name: 'surbl_checks_total',
  help: 'Total number of hostname checks, by outcome',
  labelNames: ['result'] as const,
});

export const resolverErrorsTotal = new Counter({
  name: 'surbl_resolver_errors_total',
  help: 'Blacklist queries that failed for a reason other than not-found',
});

export const tldReloadsTotal = new Counter({
  name: 'surbl_tld_reloads_total',
  help: 'Number of times a TLD table was (re)loaded into memory',
  labelNames: ['level'] as const,
});

export const tldEntries = new Gauge({
  name: 'surbl_tld_entries',
  help: 'Number of suffixes in the currently published TLD table',
  labelNames: ['level'] as const,
});

export const queryLatency = new Histogram({
  name: 'surbl_query_latency_seconds',
  help: 'Histogram of blacklist DNS query latency in seconds',
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
});

export function incChecks(result: string): void {
  checksTotal.inc({ result });
}

export function incResolverErrors(): void {
  resolverErrorsTotal.inc();
}

export function recordTableLoad(level: 2 | 3, size: number): void {
  tldReloadsTotal.inc({ level: String(level) });
  tldEntries.set({ level: String(level) }, size);
}

export function observeQueryLatency(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  queryLatency.observe(seconds);
}

export { register };
