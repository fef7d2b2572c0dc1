import type { z } from 'zod';
import { fingerprint, type CacheLike, type QueryParams } from './cache.js';
import { CancellationError, DecodeError, RemoteError, throwIfCancelled, toErrorMessage, type ApiErrorBody } from './errors.js';
import { recordCacheHit, recordCacheMiss, recordDeduped, recordRequestFailure, recordRequestSuccess } from './metrics.js';
import { ApiErrorBodySchema } from './model/schemas.js';
import { silentLogger, type Logger } from './observability/log.js';
import type { Transport } from './transport.js';

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type GatewayOptions = {
  transport: Transport;
  cache: CacheLike;
  baseUrl: string;
  timeoutMs: number;
  logger?: Logger;
  now?: () => number;
};

export type CallOptions = { signal?: AbortSignal };

export function buildUrl(baseUrl: string, endpoint: string, params: QueryParams = {}): string {
  const qs = new URLSearchParams();
  for (const [k, v] of Object.entries(params)) {
    if (v !== undefined) qs.append(k, String(v));
  }
  const q = qs.toString();
  return `${baseUrl}${endpoint}${q ? `?${q}` : ''}`;
}

function decodeApiError(body: string): ApiErrorBody | undefined {
  try {
    const r = ApiErrorBodySchema.safeParse(JSON.parse(body));
    return r.success && (r.data.error || r.data.message) ? r.data : undefined;
  } catch {
    return undefined; // non-JSON error body
  }
}

/**
 * One logical request: cache lookup, then transport, decode and cache fill on a miss.
 * Concurrent misses for the same fingerprint share a single transport call.
 */
export class RequestGateway {
  private inflight = new Map<string, Promise<unknown>>();
  private log: Logger;
  private now: () => number;

  constructor(private opts: GatewayOptions) {
    this.log = opts.logger ?? silentLogger;
    this.now = opts.now ?? Date.now;
  }

  async fetch<T>(endpoint: string, params: QueryParams, schema: Schema<T>, call: CallOptions = {}): Promise<T> {
    throwIfCancelled(call.signal);
    const key = fingerprint(endpoint, params);

    const cached = await this.readCache(endpoint, key);
    if (cached !== null) {
      const again = schema.safeParse(cached);
      if (again.success) {
        recordCacheHit();
        this.log.debug('gateway.cache_hit', { endpoint });
        return again.data;
      }
      this.log.warn('gateway.cache_stale_shape', { endpoint });
    }
    recordCacheMiss();

    const shared = this.inflight.get(key);
    if (shared) {
      recordDeduped();
      let value: unknown;
      try {
        value = await raceSignal(shared, call.signal);
      } catch (e) {
        // the caller that started the request gave up; this one has not
        if (e instanceof CancellationError && !call.signal?.aborted) return this.load(endpoint, params, schema, key, call.signal);
        throw e;
      }
      const r = schema.safeParse(value);
      if (!r.success) throw new DecodeError(endpoint, r.error.issues, r.error);
      return r.data;
    }

    const p = this.load(endpoint, params, schema, key, call.signal);
    this.inflight.set(key, p);
    try {
      return await p;
    } finally {
      if (this.inflight.get(key) === p) this.inflight.delete(key);
    }
  }

  // A cache that cannot be read is a miss, and one that cannot be written leaves the response intact.
  private async readCache(endpoint: string, key: string): Promise<unknown> {
    try {
      return await this.opts.cache.get<unknown>(key);
    } catch (e) {
      this.log.warn('gateway.cache_read_failed', { endpoint, error: toErrorMessage(e) });
      return null;
    }
  }

  private async fillCache(endpoint: string, key: string, value: unknown): Promise<void> {
    try {
      await this.opts.cache.set(key, value);
    } catch (e) {
      this.log.warn('gateway.cache_fill_failed', { endpoint, error: toErrorMessage(e) });
    }
  }

  private async load<T>(endpoint: string, params: QueryParams, schema: Schema<T>, key: string, signal?: AbortSignal): Promise<T> {
    throwIfCancelled(signal);
    const url = buildUrl(this.opts.baseUrl, endpoint, params);
    const t0 = this.now();
    try {
      const res = await this.opts.transport({ url, timeoutMs: this.opts.timeoutMs, signal });
      if (res.status < 200 || res.status >= 300) {
        throw new RemoteError(res.status, res.body, decodeApiError(res.body));
      }
      let json: unknown;
      try {
        json = JSON.parse(res.body);
      } catch (e) {
        throw new DecodeError(endpoint, [{ code: 'custom', path: [], message: 'body is not valid JSON' }], e);
      }
      const decoded = schema.safeParse(json);
      if (!decoded.success) throw new DecodeError(endpoint, decoded.error.issues, decoded.error);
      await this.fillCache(endpoint, key, decoded.data);
      recordRequestSuccess(endpoint, this.now() - t0);
      this.log.debug('gateway.fetched', { endpoint, ms: this.now() - t0 });
      return decoded.data;
    } catch (e) {
      if (!(e instanceof CancellationError)) {
        recordRequestFailure(endpoint, this.now() - t0, e);
        this.log.warn('gateway.failed', { endpoint, error: toErrorMessage(e) });
      }
      throw e;
    }
  }
}

// Lets a caller with its own signal stop waiting on a request another caller started.
function raceSignal<T>(p: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return p;
  throwIfCancelled(signal);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancellationError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    p.then(
      v => { signal.removeEventListener('abort', onAbort); resolve(v); },
      e => { signal.removeEventListener('abort', onAbort); reject(e); },
    );
  });
}
