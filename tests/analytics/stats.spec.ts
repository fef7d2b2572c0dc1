import { describe, expect, it } from 'vitest';
import { correlation, detectAnomalies, gini, mean, populationStdDev, priceChange, volatility, volumeWeightedPrice } from '../../src/analytics/stats.js';
import { readField, toNumber } from '../../src/analytics/fields.js';
import { OhlcvBarSchema, PoolSchema } from '../../src/model/schemas.js';

const bar = (close: number, extra: Record<string, unknown> = {}) =>
  OhlcvBarSchema.parse({ time_open: '2024-01-01T00:00:00Z', open: close, high: close, low: close, close, ...extra });

describe('numeric fields', () => {
  it('reads missing and malformed values as 0', () => {
    expect(toNumber('12.5')).toBe(12.5);
    expect(toNumber('abc')).toBe(0);
    expect(toNumber('')).toBe(0);
    expect(toNumber(Number.NaN)).toBe(0);
    expect(toNumber(Infinity)).toBe(0);
    expect(toNumber(null)).toBe(0);
    expect(toNumber(undefined)).toBe(0);
  });
  it('reads by key or selector', () => {
    const p = PoolSchema.parse({ id: 'a', volume_usd: 7 });
    expect(readField(p, 'volume_usd')).toBe(7);
    expect(readField(p, 'price_usd')).toBe(0);
    expect(readField(p, x => x.id.length)).toBe(1);
  });
});

describe('statistics', () => {
  it('computes mean and population std-dev', () => {
    expect(mean([2, 4, 4, 4, 5, 5, 7, 9])).toBe(5);
    expect(populationStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    expect(mean([])).toBe(0);
  });

  it('flags a value exactly at the threshold', () => {
    const res = detectAnomalies([1, 1, 1, 1, 100], (v: number) => v, 2);
    expect(res).toHaveLength(1);
    expect(res[0].index).toBe(4);
    expect(res[0].value).toBe(100);
    expect(res[0].item).toBe(100);
    expect(res[0].zScore).toBeCloseTo(2, 10);
  });

  it('finds outlying pools by field name', () => {
    const pools = [...Array.from({ length: 9 }, () => 10), 1_000].map((v, i) => PoolSchema.parse({ id: `p${i}`, volume_usd: v }));
    const res = detectAnomalies(pools, 'volume_usd');
    expect(res.map(r => r.item.id)).toEqual(['p9']);
    expect(res[0].zScore).toBeCloseTo(3, 10);
  });

  it('reports nothing for flat or short series', () => {
    expect(detectAnomalies([5, 5, 5], (v: number) => v, 1)).toEqual([]);
    expect(detectAnomalies([1, 100], (v: number) => v, 0.5)).toEqual([]);
  });

  it('computes Pearson correlation', () => {
    expect(correlation([1, 2, 3], [1, 2, 3])).toBe(1);
    expect(correlation([1, 2, 3], [3, 2, 1])).toBe(-1);
    expect(correlation([1, 2, 3], [1, 2])).toBe(0);
    expect(correlation([1], [1])).toBe(0);
    expect(correlation([4, 4, 4], [1, 2, 3])).toBe(0);
  });

  it('computes the Gini coefficient', () => {
    expect(gini([10, 10, 10, 10])).toBe(0);
    expect(gini([0, 0, 0, 100])).toBe(0.75);
    expect(gini([100, 0, 0, 0])).toBe(0.75);
    expect(gini([42])).toBe(0);
    expect(gini([0, 0])).toBe(0);
  });

  it('computes close-to-close volatility', () => {
    expect(volatility([bar(100), bar(100), bar(100)])).toBe(0);
    expect(volatility([bar(100), bar(110), bar(99)])).toBeCloseTo(0.1, 10);
    expect(volatility([bar(0), bar(10), bar(20)])).toBe(0);
    expect(volatility([])).toBe(0);
  });

  it('computes percent change and VWAP', () => {
    expect(priceChange(110, 100)).toBeCloseTo(10, 10);
    expect(priceChange(5, 0)).toBe(0);
    const bars = [
      bar(10, { high: 12, low: 8, volume: 1 }),
      bar(20, { high: 21, low: 19, volume: 3 }),
      bar(50),
    ];
    expect(volumeWeightedPrice(bars)).toBeCloseTo(17.5, 10);
    expect(volumeWeightedPrice([bar(50)])).toBe(0);
  });
});
