import type { BatchOptions } from './batch.js';
import type { QueryParams } from './cache.js';
import type { CallOptions, RequestGateway } from './gateway.js';
import {
  DexesPageSchema, NetworksSchema, OhlcvSchema, PoolSchema, PoolsPageSchema, SearchResultSchema, SystemStatsSchema,
  TokenSchema, TransactionsPageSchema,
} from './model/schemas.js';
import type {
  DexesPage, Network, OhlcvBar, Pool, PoolsPage, SearchResult, SystemStats, Token, TransactionsPage,
} from './model/types.js';

export type PageOptions = CallOptions & { page?: number; limit?: number };
export type PoolListOptions = PageOptions & { sort?: 'asc' | 'desc'; orderBy?: 'volume_usd' | 'price_usd' | 'transactions' | 'last_price_change_usd_24h' | 'created_at' };
export type OhlcvOptions = CallOptions & { end?: string; limit?: number; interval?: string; inversed?: boolean };
export type TransactionOptions = PageOptions & { cursor?: string };

const seg = (s: string) => encodeURIComponent(s);

function pageParams(o: PoolListOptions): QueryParams {
  return { page: o.page, limit: o.limit, sort: o.sort, order_by: o.orderBy };
}

/** Typed access to each remote endpoint; every call goes through the gateway (and its cache). */
export class PaprikaClient {
  constructor(readonly gateway: RequestGateway, readonly batchDefaults: BatchOptions = {}) {}

  getNetworks(o: CallOptions = {}): Promise<readonly Network[]> {
    return this.gateway.fetch('/networks', {}, NetworksSchema, o);
  }

  getNetworkPools(network: string, o: PoolListOptions = {}): Promise<PoolsPage> {
    return this.gateway.fetch(`/networks/${seg(network)}/pools`, pageParams(o), PoolsPageSchema, o);
  }

  getDexPools(network: string, dex: string, o: PoolListOptions = {}): Promise<PoolsPage> {
    return this.gateway.fetch(`/networks/${seg(network)}/dexes/${seg(dex)}/pools`, pageParams(o), PoolsPageSchema, o);
  }

  getNetworkDexes(network: string, o: PageOptions = {}): Promise<DexesPage> {
    return this.gateway.fetch(`/networks/${seg(network)}/dexes`, { page: o.page, limit: o.limit }, DexesPageSchema, o);
  }

  getPoolDetails(network: string, pool: string, inversed = false, o: CallOptions = {}): Promise<Pool> {
    return this.gateway.fetch(`/networks/${seg(network)}/pools/${seg(pool)}`, { inversed }, PoolSchema, o);
  }

  getPoolOhlcv(network: string, pool: string, start: string, o: OhlcvOptions = {}): Promise<readonly OhlcvBar[]> {
    const params: QueryParams = { start, end: o.end, limit: o.limit, interval: o.interval, inversed: o.inversed };
    return this.gateway.fetch(`/networks/${seg(network)}/pools/${seg(pool)}/ohlcv`, params, OhlcvSchema, o);
  }

  getPoolTransactions(network: string, pool: string, o: TransactionOptions = {}): Promise<TransactionsPage> {
    const params: QueryParams = { page: o.page, limit: o.limit, cursor: o.cursor };
    return this.gateway.fetch(`/networks/${seg(network)}/pools/${seg(pool)}/transactions`, params, TransactionsPageSchema, o);
  }

  getTokenDetails(network: string, token: string, o: CallOptions = {}): Promise<Token> {
    return this.gateway.fetch(`/networks/${seg(network)}/tokens/${seg(token)}`, {}, TokenSchema, o);
  }

  getTokenPools(network: string, token: string, o: PoolListOptions = {}): Promise<PoolsPage> {
    return this.gateway.fetch(`/networks/${seg(network)}/tokens/${seg(token)}/pools`, pageParams(o), PoolsPageSchema, o);
  }

  search(query: string, o: CallOptions = {}): Promise<SearchResult> {
    return this.gateway.fetch('/search', { query }, SearchResultSchema, o);
  }

  getStats(o: CallOptions = {}): Promise<SystemStats> {
    return this.gateway.fetch('/stats', {}, SystemStatsSchema, o);
  }

  async validateNetwork(id: string, o: CallOptions = {}): Promise<boolean> {
    const networks = await this.getNetworks(o);
    return networks.some(n => n.id === id);
  }
}
