import 'dotenv/config';
import { createCache, type CacheLike } from './cache.js';
import { PaprikaClient } from './client.js';
import { readClientConfig, type ClientConfig } from './config/client.js';
import { RequestGateway } from './gateway.js';
import { createLogger, type Logger } from './observability/log.js';
import { withChaos } from './testing/chaos.js';
import { undiciTransport, type Transport } from './transport.js';

export * from './errors.js';
export * from './cache.js';
export * from './transport.js';
export * from './gateway.js';
export * from './client.js';
export * from './batch.js';
export * from './batch_ops.js';
export * from './overview.js';
export * from './analytics/index.js';
export * from './model/schemas.js';
export * from './model/types.js';
export { readClientConfig, DEFAULT_BASE_URL, type ClientConfig, type LogLevel } from './config/client.js';
export { createLogger, silentLogger, type Logger, type LogFields } from './observability/log.js';
export { getGatewayMetrics, resetGatewayMetrics } from './metrics.js';

export type Poolscope = {
  config: ClientConfig;
  cache: CacheLike;
  gateway: RequestGateway;
  client: PaprikaClient;
  logger: Logger;
};

export function createPoolscope(overrides: Partial<ClientConfig> & { transport?: Transport; cache?: CacheLike; logger?: Logger } = {}): Poolscope {
  const { transport, cache, logger, ...cfg } = overrides;
  const config = readClientConfig(cfg);
  const log = logger ?? createLogger({ json: config.jsonLogs, level: config.logLevel, mask: config.piiMask });
  const store = cache ?? createCache(config, log);
  const gateway = new RequestGateway({
    transport: transport ?? withChaos(undiciTransport),
    cache: store,
    baseUrl: config.baseUrl,
    timeoutMs: config.requestTimeoutMs,
    logger: log,
  });
  return { config, cache: store, gateway, client: new PaprikaClient(gateway, { maxConcurrency: config.maxConcurrency, logger: log }), logger: log };
}
