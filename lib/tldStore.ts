import fs from 'fs';
import path from 'path';
import { ConfigError } from './errors';
import logger from './logger';

export type TldLevel = 2 | 3;

export interface CacheFileMetadata {
  path: string;
  /** Last modification time, 0 when the file does not exist. */
  mtimeMs: number;
}

/**
 * On-disk store for the cached TLD lists, one file per table level.
 */
export interface TldCacheStore {
  stat(level: TldLevel): Promise<CacheFileMetadata>;
  readLines(level: TldLevel): Promise<string[]>;
  write(level: TldLevel, body: string): Promise<void>;
  touch(level: TldLevel): Promise<void>;
}

const FILE_NAMES: Record<TldLevel, string> = {
  2: 'tlds.2',
  3: 'tlds.3',
};

// distinguishes temp files of concurrent writes within one process
let writeSeq = 0;

/**
 * Ensure the cache directory exists, creating it when missing.
 * Throws `ConfigError` when the path cannot be used as a directory.
 */
export function ensureCacheDir(dir: string): string {
  const resolved = path.resolve(dir);
  try {
    fs.mkdirSync(resolved, { recursive: true });
  } catch (err) {
    throw new ConfigError(`Invalid cache directory: ${dir}`, { cause: err });
  }
  if (!fs.statSync(resolved).isDirectory()) {
    throw new ConfigError(`Invalid cache directory: ${dir}`);
  }
  return resolved;
}

export class FsTldCacheStore implements TldCacheStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = ensureCacheDir(dir);
  }

  fileFor(level: TldLevel): string {
    return path.join(this.dir, FILE_NAMES[level]);
  }

  async stat(level: TldLevel): Promise<CacheFileMetadata> {
    const file = this.fileFor(level);
    try {
      const st = await fs.promises.stat(file);
      return { path: file, mtimeMs: st.mtimeMs };
    } catch (err) {
      if (isMissing(err)) return { path: file, mtimeMs: 0 };
      throw err;
    }
  }

  async readLines(level: TldLevel): Promise<string[]> {
    const text = await fs.promises.readFile(this.fileFor(level), 'utf8');
    return text.split('\n');
  }

  async write(level: TldLevel, body: string): Promise<void> {
    // write beside the target and rename so readers never see a partial file
    const file = this.fileFor(level);
    const tmp = `${file}.${process.pid}.${++writeSeq}.tmp`;
    try {
      await fs.promises.writeFile(tmp, body, 'utf8');
      await fs.promises.rename(tmp, file);
    } catch (err) {
      await fs.promises.rm(tmp, { force: true });
      throw err;
    }
    logger.debug({ file, bytes: Buffer.byteLength(body) }, 'TLD cache file written');
  }

  async touch(level: TldLevel): Promise<void> {
    const now = new Date();
    await fs.promises.utimes(this.fileFor(level), now, now);
  }
}

function isMissing(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
