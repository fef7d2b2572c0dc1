import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { ClientConfig } from './config/client.js';
import { toErrorMessage } from './errors.js';
import { silentLogger, type Logger } from './observability/log.js';

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Readonly<Record<string, QueryValue>>;

export interface CacheLike {
  get<T = unknown>(key: string): Promise<T | null>;
  set<T = unknown>(key: string, val: T): Promise<void>;
}

/** md5 of `endpoint?k1=v1&k2=v2` with the pairs sorted, so parameter order never changes the key. */
export function fingerprint(endpoint: string, params: QueryParams = {}): string {
  const pairs = Object.entries(params)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${String(v)}`)
    .sort();
  const key = pairs.length ? `${endpoint}?${pairs.join('&')}` : endpoint;
  return crypto.createHash('md5').update(key).digest('hex');
}

type Entry = { capturedAt: number; val: unknown };

export class MemoryCache implements CacheLike {
  private m = new Map<string, Entry>();
  constructor(private ttlMs: number, private now: () => number = Date.now) {}

  // Stale entries are left in place and overwritten by the next set.
  async get<T>(key: string): Promise<T | null> {
    return this.peek<T>(key);
  }

  peek<T>(key: string): T | null {
    const e = this.m.get(key);
    if (!e) return null;
    if (this.now() - e.capturedAt >= this.ttlMs) return null;
    return e.val as T;
  }

  async set<T>(key: string, val: T) { this.put(key, val, this.now()); }

  put(key: string, val: unknown, capturedAt: number) { this.m.set(key, { capturedAt, val }); }

  size() { return this.m.size; }
}

/**
 * Mirrors a MemoryCache to `<dir>/<key>.json` so entries survive a restart.
 * Reads fall through to disk on a memory miss and rehydrate the memory layer.
 * Disk writes are best-effort: a failed write is logged and the memory entry stands.
 */
export class FileCache implements CacheLike {
  private ready?: Promise<unknown>;
  constructor(
    private dir: string,
    private ttlMs: number,
    private mem: MemoryCache,
    private now: () => number = Date.now,
    private log: Logger = silentLogger,
  ) {}

  private file(key: string) { return path.join(this.dir, `${key}.json`); }

  async get<T>(key: string): Promise<T | null> {
    const hit = this.mem.peek<T>(key);
    if (hit !== null) return hit;
    let raw: string;
    try {
      raw = await fs.readFile(this.file(key), 'utf8');
    } catch {
      return null; // not on disk
    }
    const entry = parseEntry(raw);
    if (!entry || this.now() - entry.capturedAt >= this.ttlMs) return null;
    this.mem.put(key, entry.val, entry.capturedAt);
    return entry.val as T;
  }

  async set<T>(key: string, val: T) {
    const capturedAt = this.now();
    this.mem.put(key, val, capturedAt);
    const body: Entry = { capturedAt, val };
    try {
      this.ready ??= fs.mkdir(this.dir, { recursive: true });
      await this.ready;
      await fs.writeFile(this.file(key), JSON.stringify(body));
    } catch (e) {
      this.ready = undefined; // mkdir again on the next write
      this.log.warn('cache.write_failed', { dir: this.dir, error: toErrorMessage(e) });
    }
  }
}

function parseEntry(raw: string): Entry | null {
  let j: unknown;
  try { j = JSON.parse(raw); } catch { return null; }
  if (typeof j !== 'object' || j === null || !('capturedAt' in j) || !('val' in j)) return null;
  const capturedAt = Number(j.capturedAt);
  return Number.isFinite(capturedAt) ? { capturedAt, val: j.val } : null;
}

export function createCache(cfg: Pick<ClientConfig, 'cacheTtlMs' | 'cacheDir'>, log: Logger = silentLogger): CacheLike {
  const mem = new MemoryCache(cfg.cacheTtlMs);
  return cfg.cacheDir ? new FileCache(cfg.cacheDir, cfg.cacheTtlMs, mem, Date.now, log) : mem;
}
