import { INTERVALS } from '../model/schemas.js';
import type {
  Interval, IntervalActivity, IntervalPerformance, Pool, PoolActivity, Token, TokenPerformance, Transaction,
  TransactionPatterns,
} from '../model/types.js';
import { toNumber } from './fields.js';

export function analyzePoolActivity(pool: Pool): PoolActivity {
  const volumeUsd = toNumber(pool.volume_usd);
  const transactions = toNumber(pool.transactions);
  const intervals: Partial<Record<Interval, IntervalActivity>> = {};
  for (const k of INTERVALS) {
    const m = pool[k];
    if (!m) continue;
    intervals[k] = { volume_usd: toNumber(m.volume_usd), txns: toNumber(m.txns), price_change: toNumber(m.last_price_usd_change) };
  }
  const [t0, t1] = pool.tokens;
  return {
    poolId: pool.id,
    dexName: pool.dex_name ?? '',
    chain: pool.chain ?? '',
    volumeUsd,
    transactions,
    priceUsd: toNumber(pool.price_usd),
    volumePerTransaction: transactions > 0 ? volumeUsd / transactions : 0,
    priceChange5m: toNumber(pool.last_price_change_usd_5m),
    priceChange1h: toNumber(pool.last_price_change_usd_1h),
    priceChange24h: toNumber(pool.last_price_change_usd_24h),
    activityScore: Math.log10(Math.max(0, volumeUsd) + 1) * Math.log10(Math.max(0, transactions) + 1),
    tokenPair: t0 && t1 ? `${t0.symbol ?? '?'}/${t1.symbol ?? '?'}` : undefined,
    intervals,
  };
}

export function analyzeTokenPerformance(token: Token): TokenPerformance {
  const s = token.summary;
  const fdv = toNumber(token.fdv ?? s?.fdv);
  const liquidity = toNumber(s?.liquidity_usd);
  const pools = toNumber(s?.pools);
  const day = s?.['24h'];
  const volume24h = toNumber(day?.volume_usd);
  const intervals: Partial<Record<Interval, IntervalPerformance>> = {};
  for (const k of INTERVALS) {
    const m = s?.[k];
    if (!m) continue;
    const vol = toNumber(m.volume_usd);
    intervals[k] = {
      volume_usd: vol,
      price_change: toNumber(m.last_price_usd_change),
      txns: toNumber(m.txns),
      buy_ratio: vol > 0 ? toNumber(m.buy_usd) / vol : 0,
    };
  }
  return {
    tokenId: token.id,
    name: token.name ?? '',
    symbol: token.symbol ?? '',
    chain: token.chain ?? '',
    fdv,
    priceUsd: toNumber(s?.price_usd),
    liquidityUsd: liquidity,
    poolsCount: pools,
    avgLiquidityPerPool: pools > 0 ? liquidity / pools : 0,
    fdvToLiquidity: liquidity > 0 ? fdv / liquidity : 0,
    volume24h,
    priceChange24h: toNumber(day?.last_price_usd_change),
    transactions24h: toNumber(day?.txns),
    volumeToLiquidity: liquidity > 0 ? volume24h / liquidity : 0,
    intervals,
  };
}

export function analyzeTransactionPatterns(txs: readonly Transaction[]): TransactionPatterns {
  const hourly: Record<number, number> = {};
  const pairs: Record<string, number> = Object.create(null); // keys are API symbols
  let total = 0;
  for (const tx of txs) {
    total += toNumber(tx.price_0_usd) + toNumber(tx.price_1_usd);
    const t = tx.created_at ? Date.parse(tx.created_at) : NaN;
    if (Number.isFinite(t)) {
      const h = new Date(t).getUTCHours();
      hourly[h] = (hourly[h] ?? 0) + 1;
    }
    const pair = `${tx.token_0_symbol ?? ''}/${tx.token_1_symbol ?? ''}`;
    pairs[pair] = (pairs[pair] ?? 0) + 1;
  }
  let peakHour: number | null = null;
  let peakHourCount = 0;
  for (let h = 0; h < 24; h++) {
    const c = hourly[h] ?? 0;
    if (c > peakHourCount) { peakHour = h; peakHourCount = c; }
  }
  return {
    totalTransactions: txs.length,
    totalValueUsd: total,
    avgValuePerTx: txs.length ? total / txs.length : 0,
    hourly,
    peakHour,
    peakHourCount,
    pairs,
    uniquePairs: Object.keys(pairs).length,
  };
}
