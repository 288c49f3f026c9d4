import { createHash } from 'node:crypto';

import { config } from '@config/env.config.js';
import type {
  JsonValue,
  TemplateCatalog,
  TemplateDefinition,
  TemplateMetadata,
  TemplateUsageStats,
} from '@core/interfaces/index.js';
import {
  loadTemplateFiles,
  type LoadedTemplateFile,
} from '@infra/catalog/template-file.loader.js';
import { logger } from '@utils/logger.js';
import { systemClock, type Clock } from '@utils/time.js';

import { collectPlaceholders, parseTemplate } from './template.parser.js';
import {
  applyUsage,
  emptyUsageStats,
  InMemoryUsageStatsStore,
  type UsageStatsStore,
} from './usage-stats.store.js';

export interface TemplateSearchQuery {
  query?: string;
  category?: string;
  requiredEntities?: readonly string[];
  tags?: readonly string[];
}

export interface RegistrySummary {
  totalTemplates: number;
  totalCategories: number;
  categories: string[];
  totalUsage: number;
  successRate: number;
  mostUsedTemplates: string[];
  bestPerformingTemplates: string[];
  lastReload: string | null;
  templatesDirectory: string | null;
}

export interface TemplateStructureReport {
  templateId: string;
  valid: boolean;
  errors: string[];
  warnings: string[];
  recommendations: string[];
}

export interface CatalogExport {
  exportedAt: string;
  templatesDirectory: string | null;
  summary: RegistrySummary;
  templates: Record<
    string,
    {
      metadata: TemplateMetadata;
      usageStats: TemplateUsageStats & { successRate: number };
    }
  >;
}

export interface TemplateRegistryOptions {
  store?: UsageStatsStore;
  clock?: Clock;
  directory?: string;
}

/** Minimum uses before a template counts towards "best performing". */
const BEST_PERFORMING_MIN_USES = 5;
const SUMMARY_TOP = 5;

export function templateIdOf(category: string, name: string, version: string): string {
  return `${category}.${name}.${version}`;
}

/** Numeric per dot segment: "1.10" is newer than "1.9". */
export function compareVersions(a: string, b: string): number {
  const pa = a.split('.').map(Number);
  const pb = b.split('.').map(Number);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function buildDefinition(loaded: LoadedTemplateFile): TemplateDefinition {
  const meta = loaded.file.template_metadata;
  const name = meta.name ?? loaded.stem;
  const id = templateIdOf(meta.category, name, meta.version);
  const ast = parseTemplate(loaded.file.template);
  return {
    id,
    metadata: {
      id,
      name,
      version: meta.version,
      category: meta.category,
      description: meta.description,
      requiredEntities: meta.required_entities,
      optionalEntities: meta.optional_entities,
      apiEndpoint: meta.api_endpoint,
      httpMethod: meta.http_method,
      tags: meta.tags,
      dependencies: meta.dependencies,
      contentHash: createHash('sha256').update(loaded.raw).digest('hex'),
      sourcePath: loaded.sourcePath,
    },
    content: loaded.file.template,
    ast,
    placeholders: collectPlaceholders(ast),
    validationRules: loaded.file.validation_rules,
  };
}

/** In-memory template catalog with category/name indexes and usage statistics. */
export class TemplateRegistry implements TemplateCatalog {
  private templates = new Map<string, TemplateDefinition>();
  private byCategory = new Map<string, string[]>();
  private byName = new Map<string, string[]>();
  private readonly stats = new Map<string, TemplateUsageStats>();
  private readonly store: UsageStatsStore;
  private readonly clock: Clock;
  private readonly directory: string | null;
  private lastReload: Date | null = null;

  constructor(definitions: readonly TemplateDefinition[] = [], options: TemplateRegistryOptions = {}) {
    this.store = options.store ?? new InMemoryUsageStatsStore();
    this.clock = options.clock ?? systemClock;
    this.directory = options.directory ?? null;
    this.index(definitions);
  }

  static async load(
    directory: string = config.TEMPLATES_DIR,
    options: Omit<TemplateRegistryOptions, 'directory'> = {},
  ): Promise<TemplateRegistry> {
    const registry = new TemplateRegistry([], { ...options, directory });
    await registry.reload();
    return registry;
  }

  /** Re-reads the directory and re-seeds usage stats from the store. */
  async reload(): Promise<number> {
    if (this.directory === null) return this.templates.size;
    const report = await loadTemplateFiles(this.directory);
    this.index(report.loaded.map(buildDefinition));
    const stored = await this.store.loadAll(this.listTemplateIds());
    for (const [id, stats] of stored) this.stats.set(id, stats);
    this.lastReload = this.clock();
    logger.info(
      {
        directory: this.directory,
        templates: this.templates.size,
        rejected: report.rejected.length,
        categories: this.byCategory.size,
      },
      '[catalog] templates loaded',
    );
    return this.templates.size;
  }

  getTemplate(id: string): TemplateDefinition | undefined {
    return this.templates.get(id);
  }

  getTemplateMetadata(id: string): TemplateMetadata | undefined {
    return this.templates.get(id)?.metadata;
  }

  findTemplatesByCategory(category: string): string[] {
    return [...(this.byCategory.get(category) ?? [])];
  }

  findTemplatesByName(name: string, category?: string): string[] {
    const ids = this.byName.get(name) ?? [];
    if (category === undefined) return [...ids];
    return ids.filter((id) => this.templates.get(id)?.metadata.category === category);
  }

  getLatestTemplate(name: string, category: string): TemplateDefinition | undefined {
    const [latest] = this.findTemplatesByName(name, category);
    return latest === undefined ? undefined : this.templates.get(latest);
  }

  listTemplateIds(): string[] {
    return [...this.templates.keys()];
  }

  listCategories(): string[] {
    return [...this.byCategory.keys()];
  }

  /** Matching ids, most successful first. */
  searchTemplates(search: TemplateSearchQuery): string[] {
    const query = search.query?.toLowerCase();
    const matches: TemplateMetadata[] = [];
    for (const { metadata } of this.templates.values()) {
      if (search.category && metadata.category !== search.category) continue;
      if (query) {
        const haystack = `${metadata.name} ${metadata.description} ${metadata.tags.join(' ')}`.toLowerCase();
        if (!haystack.includes(query)) continue;
      }
      if (search.requiredEntities?.length) {
        const offered = new Set([...metadata.requiredEntities, ...metadata.optionalEntities]);
        if (!search.requiredEntities.every((e) => offered.has(e))) continue;
      }
      if (search.tags?.length && !search.tags.some((t) => metadata.tags.includes(t))) continue;
      matches.push(metadata);
    }

    return matches
      .sort((a, b) => {
        const sa = this.statsFor(a.id);
        const sb = this.statsFor(b.id);
        return (
          sb.successfulUses - sa.successfulUses ||
          sa.failedUses - sb.failedUses ||
          a.name.localeCompare(b.name)
        );
      })
      .map((m) => m.id);
  }

  getTemplateStats(id: string): TemplateUsageStats | undefined {
    return this.stats.get(id);
  }

  /**
   * Updates the in-memory counters used for scoring, then mirrors the use to the
   * store. A failed mirror write is logged; the counters stay advisory.
   */
  async recordTemplateUsage(
    id: string,
    success: boolean,
    generationTimeMs: number,
    errorType?: string,
  ): Promise<void> {
    const usage = { success, generationTimeMs, errorType, at: this.clock().toISOString() };
    this.stats.set(id, applyUsage(this.statsFor(id), usage));
    try {
      await this.store.record(id, usage);
    } catch (err) {
      logger.warn(
        { templateId: id, err: err instanceof Error ? err.message : String(err) },
        '[catalog] usage stats write-back failed',
      );
    }
  }

  getRegistrySummary(): RegistrySummary {
    const entries = [...this.stats.entries()];
    const totalUsage = entries.reduce((acc, [, s]) => acc + s.totalUses, 0);
    const totalSuccesses = entries.reduce((acc, [, s]) => acc + s.successfulUses, 0);

    const mostUsed = [...entries]
      .sort((a, b) => b[1].totalUses - a[1].totalUses)
      .slice(0, SUMMARY_TOP)
      .map(([id]) => id);
    const bestPerforming = entries
      .filter(([, s]) => s.totalUses >= BEST_PERFORMING_MIN_USES)
      .sort((a, b) => b[1].successfulUses / b[1].totalUses - a[1].successfulUses / a[1].totalUses)
      .slice(0, SUMMARY_TOP)
      .map(([id]) => id);

    return {
      totalTemplates: this.templates.size,
      totalCategories: this.byCategory.size,
      categories: this.listCategories(),
      totalUsage,
      successRate: totalSuccesses / Math.max(1, totalUsage),
      mostUsedTemplates: mostUsed,
      bestPerformingTemplates: bestPerforming,
      lastReload: this.lastReload ? this.lastReload.toISOString() : null,
      templatesDirectory: this.directory,
    };
  }

  validateTemplateStructure(id: string): TemplateStructureReport {
    const template = this.templates.get(id);
    if (!template) {
      return { templateId: id, valid: false, errors: ['Template not found'], warnings: [], recommendations: [] };
    }
    const { metadata, placeholders, validationRules } = template;
    const used = new Set(placeholders);
    const errors: string[] = [];
    const warnings: string[] = [];
    const recommendations: string[] = [];

    for (const entity of metadata.requiredEntities) {
      if (!used.has(entity)) errors.push(`Required entity '${entity}' not found in template`);
    }
    for (const entity of [...metadata.requiredEntities, ...metadata.optionalEntities]) {
      if (!(entity in validationRules)) warnings.push(`No validation rule found for entity '${entity}'`);
    }
    const keys = new Set(objectKeys(template.content));
    for (const field of Object.keys(validationRules)) {
      if (!used.has(field) && !keys.has(field)) {
        warnings.push(`Validation rule for '${field}' but field not used in template`);
      }
    }

    if (!metadata.description) recommendations.push('Add description to template metadata');
    if (!metadata.apiEndpoint) recommendations.push('Add API endpoint to template metadata');
    if (metadata.tags.length === 0) recommendations.push('Add tags to improve template discoverability');

    return { templateId: id, valid: errors.length === 0, errors, warnings, recommendations };
  }

  exportCatalog(): CatalogExport {
    const templates: CatalogExport['templates'] = {};
    for (const [id, template] of this.templates) {
      const stats = this.statsFor(id);
      templates[id] = {
        metadata: template.metadata,
        usageStats: { ...stats, successRate: stats.successfulUses / Math.max(1, stats.totalUses) },
      };
    }
    return {
      exportedAt: this.clock().toISOString(),
      templatesDirectory: this.directory,
      summary: this.getRegistrySummary(),
      templates,
    };
  }

  private statsFor(id: string): TemplateUsageStats {
    return this.stats.get(id) ?? emptyUsageStats();
  }

  private index(definitions: readonly TemplateDefinition[]): void {
    const templates = new Map<string, TemplateDefinition>();
    const byCategory = new Map<string, string[]>();
    const byName = new Map<string, string[]>();

    for (const def of definitions) {
      if (templates.has(def.id)) {
        logger.warn({ templateId: def.id, sourcePath: def.metadata.sourcePath }, '[catalog] duplicate template id ignored');
        continue;
      }
      templates.set(def.id, def);
      const category = byCategory.get(def.metadata.category) ?? [];
      category.push(def.id);
      byCategory.set(def.metadata.category, category);
      const named = byName.get(def.metadata.name) ?? [];
      named.push(def.id);
      byName.set(def.metadata.name, named);
    }

    const newestFirst = (a: string, b: string) => {
      const ma = templates.get(a)?.metadata;
      const mb = templates.get(b)?.metadata;
      if (!ma || !mb) return 0;
      return ma.name.localeCompare(mb.name) || compareVersions(mb.version, ma.version);
    };
    for (const ids of byCategory.values()) ids.sort(newestFirst);
    for (const ids of byName.values()) ids.sort(newestFirst);

    this.templates = templates;
    this.byCategory = byCategory;
    this.byName = byName;
  }
}

function objectKeys(value: JsonValue, into: string[] = []): string[] {
  if (Array.isArray(value)) {
    for (const item of value) objectKeys(item, into);
  } else if (value !== null && typeof value === 'object') {
    for (const [key, child] of Object.entries(value)) {
      into.push(key);
      objectKeys(child, into);
    }
  }
  return into;
}
