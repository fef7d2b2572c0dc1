type EndpointStat = {
  success: number;
  fail: number;
  lastLatencyMs: number;
  totalLatencyMs: number;
  count: number;
  lastError?: string;
  ring?: { lat: Float64Array; i: number; n: number };
};

export type EndpointSnapshot = {
  success: number;
  fail: number;
  lastLatencyMs: number;
  avgLatencyMs: number;
  lastError?: string;
  p50: number | null;
  p90: number | null;
  errorPct: number;
};

const stats: Record<string, EndpointStat> = Object.create(null);
const cacheCounters = { hits: 0, misses: 0, deduped: 0 };

// "/networks/ethereum/pools/0xabc" -> "/networks/:id/pools/:id", keeps the table bounded
export function routeOf(endpoint: string): string {
  const parts = endpoint.split('/');
  return parts.map((p, i) => (i > 0 && i % 2 === 0 && p ? ':id' : p)).join('/');
}

function ensure(route: string): EndpointStat {
  if (!stats[route]) {
    stats[route] = { success: 0, fail: 0, lastLatencyMs: 0, totalLatencyMs: 0, count: 0 };
  }
  return stats[route];
}

function observe(s: EndpointStat, latencyMs: number) {
  s.count += 1;
  s.lastLatencyMs = Math.max(0, Math.round(latencyMs));
  s.totalLatencyMs += latencyMs;
  if (!s.ring) s.ring = { lat: new Float64Array(64), i: 0, n: 0 };
  s.ring.lat[s.ring.i] = latencyMs;
  s.ring.i = (s.ring.i + 1) & 63;
  s.ring.n = Math.min(s.ring.n + 1, 64);
}

export function recordRequestSuccess(endpoint: string, latencyMs: number) {
  const s = ensure(routeOf(endpoint));
  s.success += 1;
  observe(s, latencyMs);
}

export function recordRequestFailure(endpoint: string, latencyMs: number, error?: unknown) {
  const s = ensure(routeOf(endpoint));
  s.fail += 1;
  s.lastError = error instanceof Error ? error.message : String(error ?? 'error');
  observe(s, latencyMs);
}

export function recordCacheHit() { cacheCounters.hits += 1; }
export function recordCacheMiss() { cacheCounters.misses += 1; }
export function recordDeduped() { cacheCounters.deduped += 1; }

export function getGatewayMetrics(): { endpoints: Record<string, EndpointSnapshot>; cache: { hits: number; misses: number; deduped: number } } {
  const out: Record<string, EndpointSnapshot> = {};
  for (const [k, v] of Object.entries(stats)) {
    const avg = v.count > 0 ? Math.round(v.totalLatencyMs / v.count) : 0;
    let p50: number | null = null, p90: number | null = null;
    if (v.ring && v.ring.n > 0) {
      const arr: number[] = [];
      for (let k2 = 0; k2 < v.ring.n; k2++) arr.push(v.ring.lat[(v.ring.i - v.ring.n + k2 + 64) & 63]);
      arr.sort((a, b) => a - b);
      const q = (p: number) => arr[Math.floor((p / 100) * (arr.length - 1))];
      p50 = q(50); p90 = q(90);
    }
    const total = v.success + v.fail;
    const errorPct = total ? +(100 * v.fail / total).toFixed(2) : 0;
    out[k] = { success: v.success, fail: v.fail, lastLatencyMs: v.lastLatencyMs, avgLatencyMs: avg, lastError: v.lastError, p50, p90, errorPct };
  }
  return { endpoints: out, cache: { ...cacheCounters } };
}

export function resetGatewayMetrics() {
  for (const k of Object.keys(stats)) delete stats[k];
  cacheCounters.hits = 0;
  cacheCounters.misses = 0;
  cacheCounters.deduped = 0;
}
