import { analyzeDexDistribution, analyzeLiquidityDistribution } from './analytics/distribution.js';
import { toNumber } from './analytics/fields.js';
import { filterByVolume, topN } from './analytics/filters.js';
import { dispatchBatch, withBatchDefaults, type BatchOptions } from './batch.js';
import type { PaprikaClient } from './client.js';
import { toErrorMessage } from './errors.js';
import type { DexDistribution, LiquidityAnalysis, Pool, SystemStats, Token } from './model/types.js';
import type { CallOptions } from './gateway.js';

export async function getTopMovers(client: PaprikaClient, network: string, limit = 10, minVolume = 1_000_000, o: CallOptions = {}): Promise<Pool[]> {
  const page = await client.getNetworkPools(network, { limit: 100, signal: o.signal });
  return topN(filterByVolume(page.pools, minVolume), 'last_price_change_usd_24h', limit);
}

export async function getHighVolumePools(client: PaprikaClient, network: string, limit = 10, o: CallOptions = {}): Promise<Pool[]> {
  const page = await client.getNetworkPools(network, { limit: 100, signal: o.signal });
  return topN(page.pools, 'volume_usd', limit);
}

export type TokenLiquidityReport = Readonly<{
  token: Token;
  totalVolume: number;
  poolCount: number;
  topPools: readonly Pool[];
  dexDistribution: DexDistribution;
  liquidity: LiquidityAnalysis;
}>;

export async function getTokenLiquidityAnalysis(client: PaprikaClient, tokenAddress: string, network = 'ethereum', o: CallOptions = {}): Promise<TokenLiquidityReport> {
  const [token, page] = await Promise.all([
    client.getTokenDetails(network, tokenAddress, o),
    client.getTokenPools(network, tokenAddress, o),
  ]);
  const pools = page.pools;
  return {
    token,
    totalVolume: pools.reduce((s, p) => s + toNumber(p.volume_usd), 0),
    poolCount: pools.length,
    topPools: topN(pools, 'volume_usd', 5),
    dexDistribution: analyzeDexDistribution(pools),
    liquidity: analyzeLiquidityDistribution(pools),
  };
}

export type NetworkSummary = Readonly<{ displayName: string; totalVolume: number; poolCount: number }>;

export type MarketOverview = Readonly<{
  stats: SystemStats;
  networks: Readonly<Record<string, NetworkSummary>>;
  failures: Readonly<Record<string, string>>;
  timestamp: string;
}>;

export async function getMarketOverview(
  client: PaprikaClient,
  o: BatchOptions & { networkLimit?: number; poolLimit?: number } = {},
): Promise<MarketOverview> {
  const [stats, networks] = await Promise.all([client.getStats({ signal: o.signal }), client.getNetworks({ signal: o.signal })]);
  const picked = networks.slice(0, o.networkLimit ?? 5);
  const names = new Map(picked.map(n => [n.id, n.display_name]));
  const res = await dispatchBatch(
    picked.map(n => n.id),
    (id, signal) => client.getNetworkPools(id, { limit: o.poolLimit ?? 10, signal }),
    withBatchDefaults(client.batchDefaults, o, 'overview.networks'),
  );
  const out: Record<string, NetworkSummary> = Object.create(null);
  const failures: Record<string, string> = Object.create(null);
  for (const [id, s] of res) {
    if (s.status === 'rejected') { failures[id] = toErrorMessage(s.error); continue; }
    out[id] = {
      displayName: names.get(id) ?? id,
      totalVolume: s.value.pools.reduce((sum, p) => sum + toNumber(p.volume_usd), 0),
      poolCount: s.value.pools.length,
    };
  }
  return { stats, networks: out, failures, timestamp: new Date().toISOString() };
}
