import type { OhlcvBar, Pool, Token, Transaction } from '../model/types.js';
import { readField, toNumber, type FieldSelector } from './fields.js';

export function filterByPriceChange(pools: readonly Pool[], minAbsChange: number): Pool[] {
  return pools.filter(p => Math.abs(toNumber(p.last_price_change_usd_24h)) >= minAbsChange);
}

export function filterByVolume(pools: readonly Pool[], minVolume: number): Pool[] {
  return pools.filter(p => toNumber(p.volume_usd) >= minVolume);
}

export function filterByNetwork<T extends { readonly chain?: string }>(items: readonly T[], network: string): T[] {
  const n = network.toLowerCase();
  return items.filter(i => (i.chain ?? '').toLowerCase() === n);
}

export function filterByDex(pools: readonly Pool[], dexName: string): Pool[] {
  const needle = dexName.toLowerCase();
  return pools.filter(p => (p.dex_name ?? '').toLowerCase().includes(needle));
}

export function filterByTokenSymbol(pools: readonly Pool[], symbol: string): Pool[] {
  const s = symbol.toUpperCase();
  return pools.filter(p => p.tokens.some((t: Token) => (t.symbol ?? '').toUpperCase() === s));
}

export function filterByTokenAddress(pools: readonly Pool[], address: string): Pool[] {
  const a = address.toLowerCase();
  return pools.filter(p => p.tokens.some((t: Token) => t.id.toLowerCase() === a));
}

/** Returns a new array; equal keys keep their input order. */
export function sortByField<T>(items: readonly T[], field: FieldSelector<T>, descending = true): T[] {
  const keyed = items.map((item, i) => ({ item, i, k: readField(item, field) }));
  keyed.sort((a, b) => (descending ? b.k - a.k : a.k - b.k) || a.i - b.i);
  return keyed.map(e => e.item);
}

export function topN<T>(items: readonly T[], field: FieldSelector<T>, n = 10): T[] {
  return sortByField(items, field, true).slice(0, Math.max(0, n));
}

export function bottomN<T>(items: readonly T[], field: FieldSelector<T>, n = 10): T[] {
  return sortByField(items, field, false).slice(0, Math.max(0, n));
}

function parseTime(s: string | undefined): number {
  if (!s) return NaN;
  return Date.parse(s);
}

export function filterRecentTransactions(txs: readonly Transaction[], hours = 24, now = Date.now()): Transaction[] {
  const cutoff = now - hours * 3_600_000;
  return txs.filter(tx => parseTime(tx.created_at) > cutoff);
}

export function filterLargeTransactions(txs: readonly Transaction[], minUsd: number): Transaction[] {
  return txs.filter(tx => Math.max(toNumber(tx.price_0_usd), toNumber(tx.price_1_usd)) >= minUsd);
}

/** Bars whose time_open falls within [start, end]; end defaults to now. */
export function filterByTimeframe(bars: readonly OhlcvBar[], start: string, end?: string, now = Date.now()): OhlcvBar[] {
  const from = parseTime(start);
  const to = end ? parseTime(end) : now;
  return bars.filter(b => {
    const t = parseTime(b.time_open);
    return t >= from && t <= to;
  });
}
