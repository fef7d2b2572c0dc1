import type { z } from 'zod';
import type {
  DexSchema, DexesPageSchema, IntervalMetricsSchema, Interval, NetworkSchema, OhlcvBarSchema, PageInfoSchema,
  PoolSchema, PoolsPageSchema, SearchResultSchema, SystemStatsSchema, TokenSchema, TokenSummarySchema,
  TransactionSchema, TransactionsPageSchema,
} from './schemas.js';

export type { Interval };

export type Network = Readonly<z.infer<typeof NetworkSchema>>;
export type IntervalMetrics = Readonly<z.infer<typeof IntervalMetricsSchema>>;
export type TokenSummary = Readonly<z.infer<typeof TokenSummarySchema>>;
export type Token = Readonly<z.infer<typeof TokenSchema>>;
export type Pool = Readonly<z.infer<typeof PoolSchema>>;
export type Dex = Readonly<z.infer<typeof DexSchema>>;
export type Transaction = Readonly<z.infer<typeof TransactionSchema>>;
export type OhlcvBar = Readonly<z.infer<typeof OhlcvBarSchema>>;
export type PageInfo = Readonly<z.infer<typeof PageInfoSchema>>;
export type PoolsPage = Readonly<z.infer<typeof PoolsPageSchema>>;
export type DexesPage = Readonly<z.infer<typeof DexesPageSchema>>;
export type TransactionsPage = Readonly<z.infer<typeof TransactionsPageSchema>>;
export type SearchResult = Readonly<z.infer<typeof SearchResultSchema>>;
export type SystemStats = Readonly<z.infer<typeof SystemStatsSchema>>;

export type AnomalyResult<T> = Readonly<{
  index: number;
  value: number;
  zScore: number;
  item: T; // reporting back-reference only
}>;

export type HistogramBucket = '<1M' | '1M-10M' | '10M-100M' | '>100M';

export type LiquidityAnalysis = Readonly<{
  totalVolume: number;
  poolCount: number;
  averageVolume: number;
  medianVolume: number;
  giniCoefficient: number;
  topDecileShare: number;
  histogram: Readonly<Record<HistogramBucket, number>>;
}>;

export type DexDistribution = Readonly<{
  totalVolume: number;
  dexCount: number;
  shares: Readonly<Record<string, number>>;
  counts: Readonly<Record<string, number>>;
  topDexes: readonly string[];
  hhi: number;
}>;

export type IntervalActivity = Readonly<{ volume_usd: number; txns: number; price_change: number }>;

export type PoolActivity = Readonly<{
  poolId: string;
  dexName: string;
  chain: string;
  volumeUsd: number;
  transactions: number;
  priceUsd: number;
  volumePerTransaction: number;
  priceChange5m: number;
  priceChange1h: number;
  priceChange24h: number;
  activityScore: number;
  tokenPair?: string;
  intervals: Readonly<Partial<Record<Interval, IntervalActivity>>>;
}>;

export type IntervalPerformance = Readonly<{ volume_usd: number; price_change: number; txns: number; buy_ratio: number }>;

export type TokenPerformance = Readonly<{
  tokenId: string;
  name: string;
  symbol: string;
  chain: string;
  fdv: number;
  priceUsd: number;
  liquidityUsd: number;
  poolsCount: number;
  avgLiquidityPerPool: number;
  fdvToLiquidity: number;
  volume24h: number;
  priceChange24h: number;
  transactions24h: number;
  volumeToLiquidity: number;
  intervals: Readonly<Partial<Record<Interval, IntervalPerformance>>>;
}>;

export type TransactionPatterns = Readonly<{
  totalTransactions: number;
  totalValueUsd: number;
  avgValuePerTx: number;
  hourly: Readonly<Record<number, number>>;
  peakHour: number | null;
  peakHourCount: number;
  pairs: Readonly<Record<string, number>>;
  uniquePairs: number;
}>;

export type PriceUpdate = Readonly<{
  pool: string;
  price_usd: number;
  last_price_change_usd_24h: number;
  volume_usd: number;
  timestamp: string;
}>;
