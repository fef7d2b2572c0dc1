import type { LogLevel } from '../config/client.js';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(at: string, fields?: LogFields): void;
  info(at: string, fields?: LogFields): void;
  warn(at: string, fields?: LogFields): void;
  error(at: string, fields?: LogFields): void;
}

export type LoggerOptions = { json?: boolean; level?: LogLevel; mask?: boolean; sink?: (line: string, level: LogLevel) => void };

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const mask = (s: string, keep = 6) => (s.length > keep * 2 ? s.slice(0, keep) + '…' + s.slice(-keep) : s);
export const maskText = (s: string) => s.replace(/0x[a-f0-9]{40,64}/gi, (m) => mask(m.toLowerCase(), 8));

function consoleSink(line: string, level: LogLevel) {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const json = opts.json ?? process.env.JSON_LOGS === 'true';
  const min = RANK[opts.level ?? 'info'];
  const masking = opts.mask ?? process.env.PII_MASK !== 'false';
  const sink = opts.sink ?? consoleSink;

  const emit = (level: LogLevel, at: string, fields: LogFields = {}) => {
    if (RANK[level] < min) return;
    let out: string;
    if (json) {
      out = JSON.stringify({ ts: new Date().toISOString(), level, at, ...fields });
    } else {
      const tail = Object.entries(fields)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => `${k}=${v}`)
        .join(' ');
      out = tail ? `[${at}] ${tail}` : `[${at}]`;
    }
    sink(masking ? maskText(out) : out, level);
  };

  return {
    debug: (at, f) => emit('debug', at, f),
    info: (at, f) => emit('info', at, f),
    warn: (at, f) => emit('warn', at, f),
    error: (at, f) => emit('error', at, f),
  };
}

export const silentLogger: Logger = { debug() {}, info() {}, warn() {}, error() {} };
