import { config } from '@config/env.config.js';
import { RedisUsageStatsStore } from '@services/cache/usage-stats.cache.js';
import { RequestPipeline } from '@services/pipeline/request-pipeline.service.js';
import { TemplateRegistry } from '@services/templates/template-registry.js';
import { InMemoryUsageStatsStore, type UsageStatsStore } from '@services/templates/usage-stats.store.js';
import { logger } from '@utils/logger.js';

import { createApp } from './app.js';
import { connectRedis, disconnectRedis } from './infrastructure/redis/redis.client.js';

async function usageStore(): Promise<UsageStatsStore> {
  if (config.USAGE_STATS_BACKEND !== 'redis') return new InMemoryUsageStatsStore();
  await connectRedis();
  return new RedisUsageStatsStore();
}

function registerShutdownSignals(close: () => Promise<void>) {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, '[server] shutting down');
      close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, '[server] shutdown failed');
          process.exit(1);
        });
    });
  }
}

async function bootstrap() {
  const registry = await TemplateRegistry.load(config.TEMPLATES_DIR, { store: await usageStore() });
  const pipeline = new RequestPipeline({ catalog: registry });
  const app = createApp({ pipeline, registry });

  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, templates: registry.listTemplateIds().length }, '[server] listening');
  });

  registerShutdownSignals(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await disconnectRedis();
  });
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ err }, '[server] fatal bootstrap error');
  process.exit(1);
});
