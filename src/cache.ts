import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { log } from './logger';

interface CacheFile {
  timestamp: number;
  data: unknown;
}

export interface CachedValue {
  data: unknown;
  fresh: boolean;
}

/** Directory holding the cache, block lists and log file; `WARDEN_HOME` overrides `~/.warden`. */
export function wardenHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.WARDEN_HOME ? path.resolve(env.WARDEN_HOME) : path.join(os.homedir(), '.warden');
}

/**
 * Reads a cached value. Entries older than `ttlMs` are still returned, marked
 * stale, so that callers can fall back on them when a refresh fails.
 */
export function loadCache(file: string, ttlMs: number, now: number = Date.now()): CachedValue | null {
  if (!fs.existsSync(file)) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null || !('timestamp' in parsed) || !('data' in parsed)) {
      return null;
    }
    const { timestamp, data } = parsed;
    if (typeof timestamp !== 'number') return null;
    return { data, fresh: now - timestamp <= ttlMs };
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    log.debug(`Ignoring unreadable cache ${file}: ${msg}`);
    return null;
  }
}

export function saveCache(file: string, data: unknown, now: number = Date.now()): void {
  const entry: CacheFile = { timestamp: now, data };
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(entry), 'utf8');
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    log.warn(`Failed to write cache ${file}: ${msg}`);
  }
}
