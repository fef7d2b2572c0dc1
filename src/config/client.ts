export const DEFAULT_BASE_URL = 'https://api.dexpaprika.com';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ClientConfig = Readonly<{
  baseUrl: string;
  requestTimeoutMs: number;
  cacheTtlMs: number;
  maxConcurrency: number; // 0 = unbounded
  cacheDir?: string;
  jsonLogs: boolean;
  logLevel: LogLevel;
  piiMask: boolean;
}>;

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function num(k: string, d: number): number {
  const raw = process.env[k];
  if (raw === undefined || raw.trim() === '') return d;
  const n = Number(raw);
  return Number.isFinite(n) ? n : d;
}

function str(k: string): string | undefined {
  const v = (process.env[k] ?? '').trim();
  return v ? v : undefined;
}

function level(v: string | undefined): LogLevel {
  const found = LEVELS.find(l => l === (v ?? '').toLowerCase());
  return found ?? 'info';
}

export function readClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  const base = overrides.baseUrl ?? str('API_BASE_URL') ?? DEFAULT_BASE_URL;
  return Object.freeze({
    baseUrl: base.replace(/\/+$/, ''),
    requestTimeoutMs: Math.max(1, overrides.requestTimeoutMs ?? num('REQUEST_TIMEOUT_MS', 10_000)),
    cacheTtlMs: Math.max(0, overrides.cacheTtlMs ?? num('CACHE_TTL_MS', 300_000)),
    maxConcurrency: Math.max(0, Math.floor(overrides.maxConcurrency ?? num('BATCH_MAX_CONCURRENCY', 0))),
    cacheDir: overrides.cacheDir ?? str('CACHE_DIR'),
    jsonLogs: overrides.jsonLogs ?? process.env.JSON_LOGS === 'true',
    logLevel: overrides.logLevel ?? level(process.env.LOG_LEVEL),
    piiMask: overrides.piiMask ?? process.env.PII_MASK !== 'false',
  });
}
