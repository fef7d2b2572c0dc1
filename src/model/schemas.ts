import { z } from 'zod';

// Wire values arrive as null as often as they are omitted; both decode to absent.
const optNum = z.number().nullish().transform(v => v ?? undefined);
const optStr = z.string().nullish().transform(v => v ?? undefined);
const optInt = optNum;

export const INTERVALS = ['24h', '6h', '1h', '30m', '15m', '5m'] as const;
export type Interval = (typeof INTERVALS)[number];

export const IntervalMetricsSchema = z.object({
  volume: optNum,
  volume_usd: optNum,
  buy_usd: optNum,
  sell_usd: optNum,
  sells: optInt,
  buys: optInt,
  txns: optInt,
  last_price_usd_change: optNum,
});

const optMetrics = IntervalMetricsSchema.nullish().transform(v => v ?? undefined);

const intervalShape = {
  '24h': optMetrics,
  '6h': optMetrics,
  '1h': optMetrics,
  '30m': optMetrics,
  '15m': optMetrics,
  '5m': optMetrics,
};

export const NetworkSchema = z.object({
  id: z.string(),
  display_name: z.string().default(''),
});

export const TokenSummarySchema = z.object({
  price_usd: optNum,
  fdv: optNum,
  liquidity_usd: optNum,
  pools: optInt,
  ...intervalShape,
  '1m': optMetrics,
});

export const TokenSchema = z.object({
  id: z.string(),
  name: optStr,
  symbol: optStr,
  chain: optStr,
  type: optStr,
  status: optStr,
  decimals: optInt,
  total_supply: optNum,
  description: optStr,
  website: optStr,
  explorer: optStr,
  added_at: optStr,
  fdv: optNum,
  last_updated: optStr,
  summary: TokenSummarySchema.nullish().transform(v => v ?? undefined),
});

export const PoolSchema = z.object({
  id: z.string(),
  dex_id: optStr,
  dex_name: optStr,
  chain: optStr,
  volume_usd: optNum,
  created_at: optStr,
  created_at_block_number: optNum,
  transactions: optInt,
  price_usd: optNum,
  last_price_change_usd_5m: optNum,
  last_price_change_usd_1h: optNum,
  last_price_change_usd_24h: optNum,
  fee: optNum,
  tokens: z.array(TokenSchema).nullish().transform(v => v ?? []),
  last_price: optNum,
  last_price_usd: optNum,
  price_time: optStr,
  ...intervalShape,
});

export const DexSchema = z.object({
  id: optStr,
  dex_id: optStr,
  dex_name: optStr,
  chain: optStr,
  protocol: optStr,
  volume_usd_24h: optNum,
  txns_24h: optInt,
  pools_count: optInt,
  created_at: optStr,
});

export const TransactionSchema = z.object({
  id: z.string(),
  pool_id: optStr,
  sender: optStr,
  token_0: optStr,
  token_0_symbol: optStr,
  token_1: optStr,
  token_1_symbol: optStr,
  amount_0: z.union([z.string(), z.number()]).nullish().transform(v => v ?? undefined),
  amount_1: z.union([z.string(), z.number()]).nullish().transform(v => v ?? undefined),
  price_0: optNum,
  price_1: optNum,
  price_0_usd: optNum,
  price_1_usd: optNum,
  created_at_block_number: optNum,
  created_at: optStr,
});

export const OhlcvBarSchema = z.object({
  time_open: z.string(),
  time_close: optStr,
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: optNum,
});

// Offset pages carry limit/page/totals, transaction pages may carry a cursor instead.
export const PageInfoSchema = z.object({
  limit: optInt,
  page: optInt,
  total_items: optInt,
  total_pages: optInt,
  next_cursor: optStr,
});

const optPageInfo = PageInfoSchema.nullish().transform(v => v ?? undefined);

export const NetworksSchema = z.array(NetworkSchema);

export const PoolsPageSchema = z.object({
  pools: z.array(PoolSchema),
  page_info: optPageInfo,
});

export const DexesPageSchema = z.object({
  dexes: z.array(DexSchema),
  page_info: optPageInfo,
});

export const TransactionsPageSchema = z.object({
  transactions: z.array(TransactionSchema),
  page_info: optPageInfo,
});

export const OhlcvSchema = z.array(OhlcvBarSchema);

export const SearchResultSchema = z.object({
  tokens: z.array(TokenSchema).default([]),
  pools: z.array(PoolSchema).default([]),
  dexes: z.array(DexSchema).default([]),
});

export const SystemStatsSchema = z.object({
  chains: z.number().default(0),
  factories: z.number().default(0),
  pools: z.number().default(0),
  tokens: z.number().default(0),
});

export const ApiErrorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});
