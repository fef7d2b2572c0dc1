import type { DexDistribution, HistogramBucket, LiquidityAnalysis, Pool } from '../model/types.js';
import { toNumber } from './fields.js';
import { gini } from './stats.js';

const BUCKETS: ReadonlyArray<{ name: HistogramBucket; min: number; max: number }> = [
  { name: '<1M', min: -Infinity, max: 1e6 },
  { name: '1M-10M', min: 1e6, max: 1e7 },
  { name: '10M-100M', min: 1e7, max: 1e8 },
  { name: '>100M', min: 1e8, max: Infinity },
];

function median(sorted: readonly number[]): number {
  const n = sorted.length;
  if (n === 0) return 0;
  const mid = Math.floor(n / 2);
  return n % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** Volume is the liquidity proxy: the pool listing carries no depth figure. */
export function analyzeLiquidityDistribution(pools: readonly Pool[]): LiquidityAnalysis {
  const volumes = pools.map(p => toNumber(p.volume_usd)).sort((a, b) => a - b);
  const n = volumes.length;
  const total = volumes.reduce((s, v) => s + v, 0);
  const histogram: Record<HistogramBucket, number> = { '<1M': 0, '1M-10M': 0, '10M-100M': 0, '>100M': 0 };
  if (n === 0) {
    return { totalVolume: 0, poolCount: 0, averageVolume: 0, medianVolume: 0, giniCoefficient: 0, topDecileShare: 0, histogram };
  }

  for (const b of BUCKETS) {
    const count = volumes.filter(v => v >= b.min && v < b.max).length;
    histogram[b.name] = count / n;
  }

  const topCount = Math.max(1, Math.ceil(n / 10));
  const topVolume = volumes.slice(n - topCount).reduce((s, v) => s + v, 0);

  return {
    totalVolume: total,
    poolCount: n,
    averageVolume: total / n,
    medianVolume: median(volumes),
    giniCoefficient: gini(volumes),
    topDecileShare: total > 0 ? topVolume / total : 0,
    histogram,
  };
}

export function analyzeDexDistribution(pools: readonly Pool[]): DexDistribution {
  const volumes = new Map<string, number>();
  const counts: Record<string, number> = Object.create(null);
  let total = 0;
  for (const p of pools) {
    const dex = p.dex_name || 'Unknown';
    const v = toNumber(p.volume_usd);
    volumes.set(dex, (volumes.get(dex) ?? 0) + v);
    counts[dex] = (counts[dex] ?? 0) + 1;
    total += v;
  }

  const shares: Record<string, number> = Object.create(null);
  let hhi = 0;
  for (const [dex, v] of volumes) {
    const share = total > 0 ? v / total : 0;
    shares[dex] = share;
    hhi += share * share;
  }
  const topDexes = [...volumes.entries()].sort((a, b) => b[1] - a[1]).map(([dex]) => dex);

  return { totalVolume: total, dexCount: volumes.size, shares, counts, topDexes, hhi };
}
