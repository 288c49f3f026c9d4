import type { TemplateUsageStats } from '@core/interfaces/index.js';

export interface UsageRecord {
  success: boolean;
  generationTimeMs: number;
  errorType?: string;
  /** ISO timestamp of the use. */
  at: string;
}

/** Durable mirror of per-template usage counters. */
export interface UsageStatsStore {
  record(templateId: string, usage: UsageRecord): Promise<void>;
  loadAll(templateIds: readonly string[]): Promise<Map<string, TemplateUsageStats>>;
}

export const emptyUsageStats = (): TemplateUsageStats => ({
  totalUses: 0,
  successfulUses: 0,
  failedUses: 0,
  averageGenerationTimeMs: 0,
  errorPatterns: {},
});

/** Running average over uses that reported a positive generation time. */
export function applyUsage(stats: TemplateUsageStats, usage: UsageRecord): TemplateUsageStats {
  const totalUses = stats.totalUses + 1;
  const errorPatterns = { ...stats.errorPatterns };
  if (!usage.success && usage.errorType) {
    errorPatterns[usage.errorType] = (errorPatterns[usage.errorType] ?? 0) + 1;
  }
  const averageGenerationTimeMs =
    usage.generationTimeMs > 0
      ? (stats.averageGenerationTimeMs * (totalUses - 1) + usage.generationTimeMs) / totalUses
      : stats.averageGenerationTimeMs;

  return {
    totalUses,
    successfulUses: stats.successfulUses + (usage.success ? 1 : 0),
    failedUses: stats.failedUses + (usage.success ? 0 : 1),
    averageGenerationTimeMs,
    lastUsedAt: usage.at,
    errorPatterns,
  };
}

export class InMemoryUsageStatsStore implements UsageStatsStore {
  private readonly stats = new Map<string, TemplateUsageStats>();

  async record(templateId: string, usage: UsageRecord): Promise<void> {
    this.stats.set(templateId, applyUsage(this.stats.get(templateId) ?? emptyUsageStats(), usage));
  }

  async loadAll(templateIds: readonly string[]): Promise<Map<string, TemplateUsageStats>> {
    const out = new Map<string, TemplateUsageStats>();
    for (const id of templateIds) {
      const found = this.stats.get(id);
      if (found) out.set(id, found);
    }
    return out;
  }
}
