import type { TemplateUsageStats } from '@core/interfaces/index.js';
import { redis } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';
import type { UsageRecord, UsageStatsStore } from '@services/templates/usage-stats.store.js';

const ERROR_FIELD_PREFIX = 'err:';

function keyForTemplate(templateId: string): string {
  return `${redisConfig.prefixes.usageStats}:${templateId}`;
}

function toCount(raw: string | undefined): number {
  const n = Number(raw);
  return Number.isFinite(n) ? n : 0;
}

function fromHash(hash: Record<string, string>): TemplateUsageStats | null {
  const totalUses = toCount(hash.totalUses);
  if (totalUses <= 0) return null;
  const timedUses = toCount(hash.timedUses);
  const errorPatterns: Record<string, number> = {};
  for (const [field, value] of Object.entries(hash)) {
    if (field.startsWith(ERROR_FIELD_PREFIX)) {
      errorPatterns[field.slice(ERROR_FIELD_PREFIX.length)] = toCount(value);
    }
  }
  return {
    totalUses,
    successfulUses: toCount(hash.successfulUses),
    failedUses: toCount(hash.failedUses),
    averageGenerationTimeMs: timedUses > 0 ? toCount(hash.totalTimeMs) / timedUses : 0,
    lastUsedAt: hash.lastUsedAt || undefined,
    errorPatterns,
  };
}

/** One hash per template; counters move with HINCRBY so concurrent writers never lose updates. */
export class RedisUsageStatsStore implements UsageStatsStore {
  private readonly ttlSeconds = redisConfig.ttlSeconds;

  async record(templateId: string, usage: UsageRecord): Promise<void> {
    const key = keyForTemplate(templateId);
    const tx = redis
      .multi()
      .hIncrBy(key, 'totalUses', 1)
      .hIncrBy(key, usage.success ? 'successfulUses' : 'failedUses', 1)
      .hSet(key, 'lastUsedAt', usage.at);
    if (usage.generationTimeMs > 0) {
      tx.hIncrBy(key, 'timedUses', 1).hIncrByFloat(key, 'totalTimeMs', usage.generationTimeMs);
    }
    if (!usage.success && usage.errorType) {
      tx.hIncrBy(key, `${ERROR_FIELD_PREFIX}${usage.errorType}`, 1);
    }
    await tx.expire(key, this.ttlSeconds).exec();
  }

  async loadAll(templateIds: readonly string[]): Promise<Map<string, TemplateUsageStats>> {
    const out = new Map<string, TemplateUsageStats>();
    for (const id of templateIds) {
      const stats = fromHash(await redis.hGetAll(keyForTemplate(id)));
      if (stats) out.set(id, stats);
    }
    return out;
  }
}
