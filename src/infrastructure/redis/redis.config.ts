import { config } from '../../config/env.config.js';

export const redisConfig = {
  ttlSeconds: Number(config.USAGE_STATS_TTL),
  prefixes: {
    usageStats: 'tplstats',
  },
} as const;
