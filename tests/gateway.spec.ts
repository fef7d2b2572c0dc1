import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { beforeEach, describe, expect, it } from 'vitest';
import { createCache, fingerprint, MemoryCache, type CacheLike } from '../src/cache.js';
import { CancellationError, DecodeError, RemoteError, TransportError } from '../src/errors.js';
import { buildUrl } from '../src/gateway.js';
import { getGatewayMetrics, resetGatewayMetrics } from '../src/metrics.js';
import { json, makeClient, recordingLogger, sleep } from './helpers/fakeTransport.js';

const STATS = { chains: 30, factories: 200, pools: 5_000, tokens: 9_000 };

describe('request gateway', () => {
  beforeEach(() => resetGatewayMetrics());

  it('serves a repeated request from cache', async () => {
    const { client, calls } = makeClient(() => json(STATS));
    expect(await client.getStats()).toEqual(STATS);
    expect(await client.getStats()).toEqual(STATS);
    expect(calls).toHaveLength(1);
    expect(getGatewayMetrics().cache).toEqual({ hits: 1, misses: 1, deduped: 0 });
  });

  it('refetches once the ttl has elapsed', async () => {
    let now = 0;
    const cache = new MemoryCache(300_000, () => now);
    const { client, calls } = makeClient(() => json(STATS), { cache });
    await client.getStats();
    now = 299_999;
    await client.getStats();
    expect(calls).toHaveLength(1);
    now = 300_000;
    await client.getStats();
    expect(calls).toHaveLength(2);
  });

  it('raises RemoteError with status and body, and caches nothing', async () => {
    const body = JSON.stringify({ error: 'not found', message: 'unknown pool' });
    const { client, calls } = makeClient(() => ({ status: 404, body }));
    const err = await client.getPoolDetails('ethereum', '0xdead').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteError);
    if (!(err instanceof RemoteError)) return;
    expect(err.status).toBe(404);
    expect(err.body).toBe(body);
    expect(err.message).toBe('HTTP 404: not found (unknown pool)');
    expect(err.apiError).toEqual({ error: 'not found', message: 'unknown pool' });
    await expect(client.getPoolDetails('ethereum', '0xdead')).rejects.toBeInstanceOf(RemoteError);
    expect(calls).toHaveLength(2);
  });

  it('keeps a non-JSON error body as is', async () => {
    const { client } = makeClient(() => ({ status: 503, body: 'upstream down' }));
    const err = await client.getStats().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteError);
    if (!(err instanceof RemoteError)) return;
    expect(err.message).toBe('HTTP 503');
    expect(err.body).toBe('upstream down');
    expect(err.apiError).toBeUndefined();
  });

  it('raises DecodeError on a shape mismatch and does not cache it', async () => {
    const { client, calls } = makeClient(() => json({ chains: 'many' }));
    const err = await client.getStats().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DecodeError);
    if (!(err instanceof DecodeError)) return;
    expect(err.endpoint).toBe('/stats');
    expect(err.issues[0].path).toEqual(['chains']);
    expect(err.message).toBe('unexpected response shape from /stats at chains: Expected number, received string');
    await expect(client.getStats()).rejects.toBeInstanceOf(DecodeError);
    expect(calls).toHaveLength(2);
  });

  it('raises DecodeError on a body that is not JSON', async () => {
    const { client } = makeClient(() => ({ status: 200, body: '<html>' }));
    await expect(client.getStats()).rejects.toThrow('unexpected response shape from /stats at <root>: body is not valid JSON');
  });

  it('propagates TransportError and records the failure per route', async () => {
    const { client } = makeClient((url) => { throw new TransportError(url.toString(), new Error('ECONNRESET')); });
    await expect(client.getNetworkPools('ethereum')).rejects.toBeInstanceOf(TransportError);
    const ep = getGatewayMetrics().endpoints['/networks/:id/pools'];
    expect(ep.fail).toBe(1);
    expect(ep.success).toBe(0);
    expect(ep.lastError).toBe('transport failed for https://api.test/networks/ethereum/pools: ECONNRESET');
  });

  it('shares one transport call between concurrent identical requests', async () => {
    const { client, calls } = makeClient(async () => { await sleep(10); return json(STATS); });
    const [a, b] = await Promise.all([client.getStats(), client.getStats()]);
    expect(a).toEqual(STATS);
    expect(b).toEqual(STATS);
    expect(calls).toHaveLength(1);
    expect(getGatewayMetrics().cache.deduped).toBe(1);
  });

  it('lets a waiting caller carry on when the caller it shared with cancels', async () => {
    const { client, calls } = makeClient(async (_url, req) => { await sleep(20, req.signal); return json(STATS); });
    const ctrl = new AbortController();
    const first = client.getStats({ signal: ctrl.signal });
    const second = client.getStats();
    await sleep(5);
    ctrl.abort('user');
    await expect(first).rejects.toBeInstanceOf(CancellationError);
    expect(await second).toEqual(STATS);
    expect(calls).toHaveLength(2);
  });

  it('rejects an already-cancelled call without touching the transport', async () => {
    const { client, calls } = makeClient(() => json(STATS));
    const ctrl = new AbortController();
    ctrl.abort();
    await expect(client.getStats({ signal: ctrl.signal })).rejects.toBeInstanceOf(CancellationError);
    expect(calls).toHaveLength(0);
  });

  it('returns the decoded response when the disk mirror cannot be written', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'poolscope-'));
    const blocked = path.join(root, 'blocked');
    await fs.writeFile(blocked, 'not a directory');
    const { logger, lines } = recordingLogger();
    const cache = createCache({ cacheTtlMs: 60_000, cacheDir: blocked }, logger);
    const { client, calls } = makeClient(() => json(STATS), { cache });
    try {
      expect(await client.getStats()).toEqual(STATS);
      expect(calls).toHaveLength(1);
      expect(getGatewayMetrics().endpoints['/stats']).toEqual(expect.objectContaining({ success: 1, fail: 0 }));
      expect(lines.map(l => l.at)).toEqual(['cache.write_failed']);
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });

  it('treats a cache that throws as a miss and still answers', async () => {
    const broken: CacheLike = {
      async get() { throw new Error('store offline'); },
      async set() { throw new Error('store offline'); },
    };
    const { logger, lines } = recordingLogger();
    const { client, calls } = makeClient(() => json(STATS), { cache: broken, logger });
    expect(await client.getStats()).toEqual(STATS);
    expect(calls).toHaveLength(1);
    expect(lines.filter(l => l.level === 'warn').map(l => [l.at, l.fields?.error])).toEqual([
      ['gateway.cache_read_failed', 'store offline'],
      ['gateway.cache_fill_failed', 'store offline'],
    ]);
    expect(getGatewayMetrics().endpoints['/stats'].fail).toBe(0);
  });

  it('refetches when a cached value no longer matches the schema', async () => {
    const cache = new MemoryCache(60_000);
    await cache.set(fingerprint('/stats', {}), { chains: 'stale' });
    const { logger, lines } = recordingLogger();
    const { client, calls } = makeClient(() => json(STATS), { cache, logger });
    expect(await client.getStats()).toEqual(STATS);
    expect(calls).toHaveLength(1);
    expect(lines.some(l => l.level === 'warn' && l.at === 'gateway.cache_stale_shape')).toBe(true);
  });
});

describe('buildUrl', () => {
  it('appends defined params only', () => {
    expect(buildUrl('https://a.test', '/search', { query: 'weth usdc', limit: undefined })).toBe('https://a.test/search?query=weth+usdc');
    expect(buildUrl('https://a.test', '/stats')).toBe('https://a.test/stats');
  });
});
