// Centralized runtime configuration for TLD tables, timeouts and the blacklist zone.
// Values are read from env with sane defaults and can be overridden per instance.

import os from 'os';

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function envBool(name: string, fallback: boolean): boolean {
  const v = process.env[name];
  if (!v) return fallback;
  return v === 'true' || v === '1';
}

export const CONFIG = {
  ZONE: process.env.SURBL_ZONE || 'multi.surbl.org',
  CACHE_DIR: process.env.SURBL_CACHE_DIR || os.tmpdir(),

  HTTP: {
    CONNECT_TIMEOUT_MS: envInt('HTTP_CONNECT_TIMEOUT_MS', 30000),
    READ_TIMEOUT_MS: envInt('HTTP_READ_TIMEOUT_MS', 60000),
    RETRIES: envInt('HTTP_RETRIES', 2),
  },

  DNS_TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 5000),
  DNS_SERVERS: (process.env.DNS_SERVERS || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean),

  TLD: {
    TWO_LEVEL_URL: process.env.TWO_LEVEL_TLDS_URL || 'http://www.surbl.org/tld/two-level-tlds',
    THREE_LEVEL_URL: process.env.THREE_LEVEL_TLDS_URL || 'http://www.surbl.org/tld/three-level-tlds',
    MAX_AGE_MS: envInt('TLD_MAX_AGE_MS', 1000 * 60 * 60 * 24), // 24h
  },

  FAIL_CLOSED: envBool('SURBL_FAIL_CLOSED', false),
  RESULT_CACHE_TTL_MS: envInt('RESULT_CACHE_TTL_MS', 1000 * 60 * 5), // 5m
  RESULT_CACHE_MAX: envInt('RESULT_CACHE_MAX', 5000),
  CHECK_CONCURRENCY: envInt('CHECK_CONCURRENCY', 10),
};

export default CONFIG;
