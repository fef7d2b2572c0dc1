import { dispatchBatch, withBatchDefaults, type BatchOptions, type BatchResult } from './batch.js';
import type { PaprikaClient } from './client.js';
import { toErrorMessage } from './errors.js';
import type { PoolsPage, PriceUpdate, SearchResult, Token } from './model/types.js';
import { toNumber } from './analytics/fields.js';

export function getMultiplePools(client: PaprikaClient, networks: readonly string[], opts: BatchOptions & { limit?: number } = {}): Promise<BatchResult<string, PoolsPage>> {
  const limit = opts.limit ?? 10;
  return dispatchBatch(networks, (network, signal) => client.getNetworkPools(network, { limit, signal }), withBatchDefaults(client.batchDefaults, opts, 'batch.pools'));
}

export function getTokenDataBatch(client: PaprikaClient, addresses: readonly string[], network = 'ethereum', opts: BatchOptions = {}): Promise<BatchResult<string, Token>> {
  return dispatchBatch(addresses, (address, signal) => client.getTokenDetails(network, address, { signal }), withBatchDefaults(client.batchDefaults, opts, 'batch.tokens'));
}

export function batchSearch(client: PaprikaClient, queries: readonly string[], opts: BatchOptions = {}): Promise<BatchResult<string, SearchResult>> {
  return dispatchBatch(queries, (query, signal) => client.search(query, { signal }), withBatchDefaults(client.batchDefaults, opts, 'batch.search'));
}

export type MonitorOptions = BatchOptions & {
  intervalMs?: number;
  onUpdate: (update: PriceUpdate) => void;
  onError?: (pool: string, error: unknown) => void;
};

/**
 * Polls pool details every `intervalMs` (first poll immediately) and reports a
 * PriceUpdate for every pool that carries a price. Returns a stop function.
 */
export function monitorPrices(client: PaprikaClient, pools: readonly string[], network: string, opts: MonitorOptions): () => void {
  const intervalMs = Math.max(1, opts.intervalMs ?? 60_000);
  const ctrl = new AbortController();
  const batch = withBatchDefaults(client.batchDefaults, opts, 'monitor.poll');
  const log = batch.logger;
  let timer: NodeJS.Timeout | undefined;
  let stopped = false;

  const stop = () => {
    if (stopped) return;
    stopped = true;
    if (timer) clearTimeout(timer);
    ctrl.abort(new Error('monitor stopped'));
    opts.signal?.removeEventListener('abort', stop);
  };
  if (opts.signal?.aborted) { stop(); return stop; }
  opts.signal?.addEventListener('abort', stop, { once: true });

  const tick = async () => {
    try {
      const res = await dispatchBatch(
        pools,
        (pool, signal) => client.getPoolDetails(network, pool, false, { signal }),
        { ...batch, signal: ctrl.signal },
      );
      if (stopped) return;
      const timestamp = new Date().toISOString();
      for (const [pool, s] of res) {
        if (s.status === 'rejected') { opts.onError?.(pool, s.error); continue; }
        const p = s.value;
        if (p.price_usd === undefined) continue;
        opts.onUpdate({
          pool,
          price_usd: p.price_usd,
          last_price_change_usd_24h: toNumber(p.last_price_change_usd_24h),
          volume_usd: toNumber(p['24h']?.volume_usd),
          timestamp,
        });
      }
    } catch (e) {
      if (!stopped) log?.warn('monitor.poll_failed', { error: toErrorMessage(e) });
    }
    if (!stopped) timer = setTimeout(() => { void tick(); }, intervalMs);
  };

  void tick();
  return stop;
}
