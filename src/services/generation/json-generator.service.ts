import { DateTime } from 'luxon';

import { TemplateNotFoundError } from '@core/errors/index.js';
import type {
  ClassificationResult,
  EntityType,
  ExtractedEntity,
  ExtractionResult,
  GenerationOptions,
  GenerationResult,
  JsonValue,
  TemplateCatalog,
  TemplateDefinition,
  TemplateNode,
  TemplateSegment,
} from '@core/interfaces/index.js';
import { fieldTokens, leafName, typesForField } from '@services/templates/field-aliases.js';
import { logger } from '@utils/logger.js';
import { clamp, mean } from '@utils/score.js';
import { systemClock, toIsoSeconds, type Clock } from '@utils/time.js';

import { applyTransform, transformFor } from './value-transforms.js';

export const DEFAULT_GENERATION_OPTIONS: GenerationOptions = {
  useFallbackValues: true,
  transformValues: true,
  generateMissingIds: true,
  formatTimestamps: true,
  strictValidation: false,
};

const ERROR_PENALTY_STEP = 0.1;
const MAX_ERROR_PENALTY = 0.5;
const MISSING_REQUIRED_PENALTY = 0.2;
const ENTITY_BONUS_SCALE = 0.2;
const ENTITY_BONUS_PIVOT = 0.5;

const BOOLEAN_FLAG_TOKENS = ['required', 'enabled', 'verified', 'approved'];
const COUNT_TOKENS = ['count', 'amount', 'quantity', 'total'];
const TIMESTAMP_TOKENS = ['timestamp', 'at'];
const START_TOKENS = ['start', 'from', 'pickup'];
const END_TOKENS = ['end', 'until', 'return', 'to', 'destination'];

/** Next value of a per-field counter. */
export type IdSequence = (field: string) => number;

export function createCounterSequence(): IdSequence {
  const counters = new Map<string, number>();
  return (field) => {
    const next = (counters.get(field) ?? 0) + 1;
    counters.set(field, next);
    return next;
  };
}

export interface JsonGeneratorOptions {
  clock?: Clock;
  sequence?: IdSequence;
  defaults?: Partial<GenerationOptions>;
}

export interface GenerationSummary {
  totalTemplates: number;
  successfulGenerations: number;
  successRate: number;
  totalProcessingTimeMs: number;
  averageConfidence: number;
  totalPopulatedFields: number;
  totalMissingFields: number;
  totalErrors: number;
  templatesProcessed: string[];
}

type Side = 'start' | 'end' | 'any';

interface Resolved {
  value: JsonValue;
}

/** Mutable bookkeeping for one generation run. */
class GenerationRun {
  readonly populated = new Set<string>();
  readonly missing = new Set<string>();
  readonly fallbacks: Record<string, JsonValue> = {};
  readonly errors: string[] = [];
  readonly warnings: string[] = [];
  private readonly memo = new Map<string, Resolved>();

  constructor(
    readonly template: TemplateDefinition,
    readonly byType: ReadonlyMap<EntityType, readonly ExtractedEntity[]>,
    readonly options: GenerationOptions,
  ) {}

  /** Repeated placeholders resolve once, so auto-generated values stay consistent. */
  memoized(key: string, resolve: () => Resolved): Resolved {
    const hit = this.memo.get(key);
    if (hit) return hit;
    const resolved = resolve();
    this.memo.set(key, resolved);
    return resolved;
  }

  isRequired(field: string): boolean {
    return (
      this.template.metadata.requiredEntities.includes(field) ||
      this.template.validationRules[leafName(field)]?.required === true
    );
  }
}

function sideOf(field: string): Side {
  const tokens = fieldTokens(field);
  if (END_TOKENS.some((t) => tokens.includes(t))) return 'end';
  if (START_TOKENS.some((t) => tokens.includes(t))) return 'start';
  return 'any';
}

function byPosition(entities: readonly ExtractedEntity[]): ExtractedEntity[] {
  return [...entities].sort((a, b) => a.start - b.start);
}

function pick(entities: readonly ExtractedEntity[], side: Side): ExtractedEntity | undefined {
  if (entities.length === 0) return undefined;
  if (side === 'start') return byPosition(entities)[0];
  if (side === 'end') return byPosition(entities)[entities.length - 1];
  return [...entities].sort((a, b) => b.confidence - a.confidence)[0];
}

/** "17:00-09:00" gives 17:00 for start-like fields and 09:00 for end-like ones. */
function timeHalf(value: string, side: Side): string {
  const parts = value.split('-');
  if (parts.length !== 2) return value;
  return side === 'end' ? parts[1] : parts[0];
}

function autoIncrement(field: string, sequence: IdSequence): string {
  const prefix = leafName(field).toUpperCase().replace(/_/g, '').slice(0, 3);
  return `${prefix}${String(sequence(field)).padStart(4, '0')}`;
}

function stringify(value: JsonValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

/** True when some key named `key` anywhere under `node` holds a non-null value. */
function hasValue(node: JsonValue, key: string): boolean {
  if (Array.isArray(node)) return node.some((item) => hasValue(item, key));
  if (typeof node !== 'object' || node === null) return false;
  return Object.entries(node).some(([k, v]) => (k === key && v !== null) || hasValue(v, key));
}

export class JSONGenerator {
  private readonly clock: Clock;
  private readonly sequence: IdSequence;
  private readonly defaults: GenerationOptions;

  constructor(options: JsonGeneratorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.sequence = options.sequence ?? createCounterSequence();
    this.defaults = { ...DEFAULT_GENERATION_OPTIONS, ...options.defaults };
  }

  generate(
    template: TemplateDefinition,
    classification: ClassificationResult,
    extraction: ExtractionResult,
    options: Partial<GenerationOptions> = {},
  ): GenerationResult {
    const started = performance.now();
    const byType = new Map<EntityType, ExtractedEntity[]>();
    for (const entity of extraction.entities) {
      const list = byType.get(entity.type) ?? [];
      list.push(entity);
      byType.set(entity.type, list);
    }
    const run = new GenerationRun(template, byType, { ...this.defaults, ...options });

    let generatedJson: JsonValue = null;
    try {
      generatedJson = this.render(template.ast, run);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ templateId: template.id, err: message }, '[generation] template walk failed');
      run.errors.push(`Generation failed: ${message}`);
    }
    if (run.options.strictValidation) {
      for (const name of template.metadata.requiredEntities) {
        if (!hasValue(generatedJson, name)) run.errors.push(`Required entity '${name}' is missing or null`);
      }
    }

    const generationConfidence = this.confidence(run, extraction);
    const result: GenerationResult = {
      templateId: template.id,
      generatedJson,
      populatedFields: [...run.populated],
      missingFields: [...run.missing],
      fallbackValuesUsed: run.fallbacks,
      generationConfidence,
      errors: run.errors,
      warnings: run.warnings,
      processingTimeMs: performance.now() - started,
    };

    logger.debug(
      {
        templateId: template.id,
        intent: classification.primaryIntent.intent,
        populated: result.populatedFields.length,
        missing: result.missingFields.length,
        confidence: generationConfidence,
      },
      '[generation] complete',
    );
    return result;
  }

  generateById(
    catalog: TemplateCatalog,
    templateId: string,
    classification: ClassificationResult,
    extraction: ExtractionResult,
    options: Partial<GenerationOptions> = {},
  ): GenerationResult {
    const template = catalog.getTemplate(templateId);
    if (!template) throw new TemplateNotFoundError(templateId);
    return this.generate(template, classification, extraction, options);
  }

  summarize(results: readonly GenerationResult[]): GenerationSummary {
    const successful = results.filter((r) => r.errors.length === 0).length;
    const totalProcessingTimeMs = results.reduce((acc, r) => acc + r.processingTimeMs, 0);
    return {
      totalTemplates: results.length,
      successfulGenerations: successful,
      successRate: results.length ? successful / results.length : 0,
      totalProcessingTimeMs,
      averageConfidence: mean(results.map((r) => r.generationConfidence)),
      totalPopulatedFields: results.reduce((acc, r) => acc + r.populatedFields.length, 0),
      totalMissingFields: results.reduce((acc, r) => acc + r.missingFields.length, 0),
      totalErrors: results.reduce((acc, r) => acc + r.errors.length, 0),
      templatesProcessed: results.map((r) => r.templateId),
    };
  }

  private render(node: TemplateNode, run: GenerationRun): JsonValue {
    switch (node.kind) {
      case 'object': {
        const out: { [key: string]: JsonValue } = {};
        for (const { key, value } of node.entries) out[key] = this.render(value, run);
        return out;
      }
      case 'array':
        return node.items.map((item) => this.render(item, run));
      case 'value':
        return node.value;
      case 'text': {
        const [only] = node.segments;
        if (node.segments.length === 1 && only.kind === 'placeholder') {
          return this.placeholder(only, run).value;
        }
        return node.segments
          .map((seg) => (seg.kind === 'literal' ? seg.text : stringify(this.placeholder(seg, run).value)))
          .join('');
      }
    }
  }

  private placeholder(
    seg: Extract<TemplateSegment, { kind: 'placeholder' }>,
    run: GenerationRun,
  ): Resolved {
    return run.memoized(`${seg.field}|${seg.defaultValue ?? ''}`, () => {
      const fromEntity = this.fromEntities(seg.field, run);
      if (fromEntity !== undefined) {
        run.populated.add(seg.field);
        return { value: fromEntity };
      }
      run.missing.add(seg.field);
      return { value: this.missingValue(seg.field, seg.defaultValue, run) };
    });
  }

  private fromEntities(field: string, run: GenerationRun): string | undefined {
    const tokens = fieldTokens(field);
    const side = sideOf(field);

    if (tokens.includes('date') && tokens.includes('time')) {
      return this.composeDateTime(field, side, run);
    }

    const available = new Set(run.byType.keys());
    const [match] = typesForField(field, available);
    if (!match) return undefined;
    const entity = pick(run.byType.get(match.type) ?? [], side);
    if (!entity) return undefined;
    if (!match.exact) {
      run.warnings.push(`Field '${field}' filled from ${match.type} by partial name match`);
    }

    if (!run.options.transformValues) return entity.value;
    const value = match.type === 'TIME' ? timeHalf(entity.normalizedValue, side) : entity.normalizedValue;
    return applyTransform(transformFor(field), value);
  }

  /** `*datetime*` fields join a DATE entity with a TIME entity (midnight when no time was given). */
  private composeDateTime(field: string, side: Side, run: GenerationRun): string | undefined {
    const date = pick(run.byType.get('DATE') ?? [], side);
    if (!date) return undefined;
    if (!run.options.transformValues) return date.value;
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date.normalizedValue)) {
      run.warnings.push(`Field '${field}' has an unresolved date '${date.value}'`);
      return date.normalizedValue;
    }
    const times = run.byType.get('TIME') ?? [];
    const ranged = times.find((t) => t.normalizedValue.includes('-'));
    const time = ranged ? timeHalf(ranged.normalizedValue, side) : pick(times, side)?.normalizedValue;
    return `${date.normalizedValue}T${time && /^\d{2}:\d{2}$/.test(time) ? time : '00:00'}:00`;
  }

  private missingValue(field: string, defaultValue: string | undefined, run: GenerationRun): JsonValue {
    if (!run.options.useFallbackValues) {
      if (run.isRequired(field)) run.errors.push(`Required field '${field}' has no value`);
      return null;
    }

    if (defaultValue !== undefined) {
      const value = this.defaultValue(field, defaultValue);
      run.fallbacks[field] = value;
      return value;
    }

    const fallback = this.fallbackFor(field, run);
    if (fallback !== undefined) {
      run.fallbacks[field] = fallback;
      return fallback;
    }

    if (run.isRequired(field)) run.errors.push(`Required field '${field}' has no value`);
    return null;
  }

  private defaultValue(field: string, raw: string): JsonValue {
    switch (raw) {
      case 'null':
        return null;
      case 'current_timestamp':
        return this.timestamp();
      case 'auto_generate':
        return autoIncrement(field, this.sequence);
      case '[]':
        return [];
      case '{}':
        return {};
      default:
        return raw;
    }
  }

  private fallbackFor(field: string, run: GenerationRun): JsonValue | undefined {
    const tokens = fieldTokens(field);
    const last = tokens[tokens.length - 1];
    if (last === 'id' && run.options.generateMissingIds) return autoIncrement(field, this.sequence);
    if (TIMESTAMP_TOKENS.some((t) => tokens.includes(t)) && run.options.formatTimestamps) {
      return this.timestamp();
    }
    if (tokens.includes('status')) return 'pending';
    if (BOOLEAN_FLAG_TOKENS.some((t) => tokens.includes(t))) return false;
    if (COUNT_TOKENS.some((t) => tokens.includes(t))) return 0;
    return undefined;
  }

  private timestamp(): string {
    return toIsoSeconds(DateTime.fromJSDate(this.clock()).toUTC());
  }

  private confidence(run: GenerationRun, extraction: ExtractionResult): number {
    const total = run.populated.size + run.missing.size;
    if (total === 0) return 0;
    const coverage = run.populated.size / total;
    const errorPenalty = Math.min(MAX_ERROR_PENALTY, run.errors.length * ERROR_PENALTY_STEP);
    const missingRequired = run.template.metadata.requiredEntities.filter((f) => run.missing.has(f)).length;
    const entityConfidence = mean(extraction.entities.map((e) => e.confidence));
    const bonus = (entityConfidence - ENTITY_BONUS_PIVOT) * ENTITY_BONUS_SCALE;
    return clamp(coverage - errorPenalty - missingRequired * MISSING_REQUIRED_PENALTY + bonus);
  }
}
