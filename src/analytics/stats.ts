import type { AnomalyResult, OhlcvBar } from '../model/types.js';
import { readField, toNumber, type FieldSelector } from './fields.js';

export function mean(xs: readonly number[]): number {
  if (xs.length === 0) return 0;
  let s = 0;
  for (const x of xs) s += x;
  return s / xs.length;
}

export function populationStdDev(xs: readonly number[]): number {
  if (xs.length === 0) return 0;
  const m = mean(xs);
  let ss = 0;
  for (const x of xs) { const d = x - m; ss += d * d; }
  return Math.sqrt(ss / xs.length);
}

/**
 * Flags items whose population z-score reaches the threshold.
 * Fewer than three values, or zero spread, yields no anomalies.
 */
export function detectAnomalies<T>(items: readonly T[], field: FieldSelector<T>, threshold = 2.0): AnomalyResult<T>[] {
  if (items.length < 3) return [];
  const values = items.map(i => readField(i, field));
  const mu = mean(values);
  const sigma = populationStdDev(values);
  if (sigma === 0) return [];
  const out: AnomalyResult<T>[] = [];
  values.forEach((value, index) => {
    const zScore = Math.abs(value - mu) / sigma;
    if (zScore >= threshold) out.push({ index, value, zScore, item: items[index] });
  });
  return out;
}

/** Pearson correlation; 0 for mismatched or short series, and when either series is flat. */
export function correlation(a: readonly number[], b: readonly number[]): number {
  const n = a.length;
  if (n !== b.length || n < 2) return 0;
  const xs = a.map(toNumber);
  const ys = b.map(toNumber);
  const ma = mean(xs);
  const mb = mean(ys);
  let num = 0, va = 0, vb = 0;
  for (let i = 0; i < n; i++) {
    const da = xs[i] - ma;
    const db = ys[i] - mb;
    num += da * db;
    va += da * da;
    vb += db * db;
  }
  const den = Math.sqrt(va * vb);
  return den === 0 ? 0 : num / den;
}

export function gini(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const s = values.map(toNumber).sort((x, y) => x - y);
  const m = mean(s);
  if (m === 0) return 0;
  let acc = 0;
  for (let i = 0; i < n; i++) acc += s[i] * (2 * i + 1 - n);
  return acc / (n * n * m);
}

/** Population std-dev of simple close-to-close returns; pairs with a non-positive prior close are skipped. */
export function volatility(bars: readonly Pick<OhlcvBar, 'close'>[]): number {
  const returns: number[] = [];
  for (let i = 1; i < bars.length; i++) {
    const prev = toNumber(bars[i - 1].close);
    if (prev <= 0) continue;
    returns.push((toNumber(bars[i].close) - prev) / prev);
  }
  if (returns.length < 2) return 0;
  return populationStdDev(returns);
}

export function priceChange(current: number, previous: number): number {
  return previous !== 0 ? ((current - previous) / previous) * 100 : 0;
}

/** Volume-weighted typical price, typical = (high + low + close) / 3. */
export function volumeWeightedPrice(bars: readonly OhlcvBar[]): number {
  let value = 0, volume = 0;
  for (const b of bars) {
    const v = toNumber(b.volume);
    value += ((toNumber(b.high) + toNumber(b.low) + toNumber(b.close)) / 3) * v;
    volume += v;
  }
  return volume === 0 ? 0 : value / volume;
}
