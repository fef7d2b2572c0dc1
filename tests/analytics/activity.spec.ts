import { describe, expect, it } from 'vitest';
import { analyzePoolActivity, analyzeTokenPerformance, analyzeTransactionPatterns } from '../../src/analytics/activity.js';
import { PoolSchema, TokenSchema, TransactionSchema } from '../../src/model/schemas.js';

describe('pool activity', () => {
  it('derives per-transaction volume, score and pair', () => {
    const p = PoolSchema.parse({
      id: '0xpool', dex_name: 'Uniswap V3', chain: 'ethereum', volume_usd: 999, transactions: 9, price_usd: 2.5,
      last_price_change_usd_1h: -0.4,
      tokens: [{ id: '0xa', symbol: 'WETH' }, { id: '0xb', symbol: 'USDC' }],
      '24h': { volume_usd: 100, txns: 4, last_price_usd_change: 1.5 },
    });
    const a = analyzePoolActivity(p);
    expect(a.poolId).toBe('0xpool');
    expect(a.volumePerTransaction).toBe(111);
    expect(a.activityScore).toBeCloseTo(3, 10);
    expect(a.priceChange1h).toBe(-0.4);
    expect(a.priceChange24h).toBe(0);
    expect(a.tokenPair).toBe('WETH/USDC');
    expect(a.intervals).toEqual({ '24h': { volume_usd: 100, txns: 4, price_change: 1.5 } });
  });

  it('handles an idle pool with one unnamed token', () => {
    const a = analyzePoolActivity(PoolSchema.parse({ id: 'x', tokens: [{ id: '0xa', symbol: 'WETH' }, { id: '0xb' }] }));
    expect(a.volumePerTransaction).toBe(0);
    expect(a.activityScore).toBe(0);
    expect(a.tokenPair).toBe('WETH/?');
    expect(a.dexName).toBe('');
  });
});

describe('token performance', () => {
  it('derives ratios from the summary', () => {
    const t = TokenSchema.parse({
      id: '0xtok', name: 'Test Token', symbol: 'TT', chain: 'ethereum',
      summary: { price_usd: 2, fdv: 1_000, liquidity_usd: 200, pools: 4, '24h': { volume_usd: 50, buy_usd: 20, txns: 7, last_price_usd_change: -3 } },
    });
    const r = analyzeTokenPerformance(t);
    expect(r.fdv).toBe(1_000);
    expect(r.avgLiquidityPerPool).toBe(50);
    expect(r.fdvToLiquidity).toBe(5);
    expect(r.volumeToLiquidity).toBe(0.25);
    expect(r.volume24h).toBe(50);
    expect(r.priceChange24h).toBe(-3);
    expect(r.transactions24h).toBe(7);
    expect(r.intervals).toEqual({ '24h': { volume_usd: 50, price_change: -3, txns: 7, buy_ratio: 0.4 } });
  });

  it('prefers the top-level fdv and tolerates a missing summary', () => {
    expect(analyzeTokenPerformance(TokenSchema.parse({ id: 't', fdv: 9, summary: { fdv: 1 } })).fdv).toBe(9);
    const bare = analyzeTokenPerformance(TokenSchema.parse({ id: 't' }));
    expect(bare).toEqual(expect.objectContaining({ fdv: 0, liquidityUsd: 0, fdvToLiquidity: 0, avgLiquidityPerPool: 0, intervals: {} }));
  });
});

describe('transaction patterns', () => {
  it('buckets by UTC hour and pair', () => {
    const txs = [
      { id: '1', created_at: '2024-05-01T10:05:00Z', token_0_symbol: 'WETH', token_1_symbol: 'USDC', price_0_usd: 100 },
      { id: '2', created_at: '2024-05-01T10:40:00Z', token_0_symbol: 'WETH', token_1_symbol: 'USDC', price_0_usd: 50, price_1_usd: 50 },
      { id: '3', created_at: '2024-05-01T14:00:00Z', token_0_symbol: 'WETH', token_1_symbol: 'USDC', price_0_usd: 25 },
      { id: '4', token_0_symbol: 'WBTC', token_1_symbol: 'USDC' },
    ].map(t => TransactionSchema.parse(t));
    const r = analyzeTransactionPatterns(txs);
    expect(r.totalTransactions).toBe(4);
    expect(r.totalValueUsd).toBe(225);
    expect(r.avgValuePerTx).toBe(56.25);
    expect(r.hourly).toEqual({ 10: 2, 14: 1 });
    expect(r.peakHour).toBe(10);
    expect(r.peakHourCount).toBe(2);
    expect(r.pairs).toEqual({ 'WETH/USDC': 3, 'WBTC/USDC': 1 });
    expect(r.uniquePairs).toBe(2);
  });

  it('has no peak hour without timestamps', () => {
    const r = analyzeTransactionPatterns([]);
    expect(r.peakHour).toBeNull();
    expect(r.avgValuePerTx).toBe(0);
  });
});
