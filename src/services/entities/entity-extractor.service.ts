import {
  ENTITY_TYPES,
  type EntityGroups,
  type EntityType,
  type ExtractedEntity,
  type ExtractionResult,
} from '@core/interfaces/index.js';

import { config } from '@config/env.config.js';
import { logger } from '@utils/logger.js';
import { clamp } from '@utils/score.js';
import { systemClock, zonedNow, type Clock } from '@utils/time.js';

import { NORMALIZERS, VALIDATORS } from './entity.normalizers.js';
import {
  CONTEXT_PATTERNS,
  ENTITY_IMPORTANCE,
  ENTITY_PATTERNS,
  UNRECOGNIZED_PATTERNS,
  type EntityPattern,
} from './entity.patterns.js';

const MIN_CONFIDENCE = 0.3;
const CONTEXT_WINDOW = 20;
const BOOST_RADIUS = 50;
const VALIDATION_FAILURE_FACTOR = 0.7;

export interface EntityExtractorOptions {
  clock?: Clock;
  timezone?: string;
  maxInputLength?: number;
  minConfidence?: number;
  patterns?: readonly EntityPattern[];
}

export interface EntityExport {
  extractionConfidence: number;
  totalEntities: number;
  entities: {
    type: EntityType;
    value: string;
    normalizedValue: string;
    confidence: number;
    position: { start: number; end: number };
    validationStatus: string;
    extractionMethod: string;
  }[];
  entityCounts: Partial<Record<EntityType, number>>;
  notes: readonly string[];
  unrecognized: readonly string[];
}

interface Candidate {
  type: EntityType;
  value: string;
  originalText: string;
  start: number;
  end: number;
  confidence: number;
  method: string;
  clues: string[];
}

function preprocess(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/[–—]/g, '-')
    .replace(/[‘’‚]/g, "'")
    .replace(/[“”„]/g, '"')
    .trim();
}

function withIndices(re: RegExp): RegExp {
  return re.flags.includes('d') ? re : new RegExp(re.source, `${re.flags}d`);
}

export class EntityExtractor {
  private readonly clock: Clock;
  private readonly timezone: string;
  private readonly maxInputLength: number;
  private readonly minConfidence: number;
  private readonly patterns: readonly EntityPattern[];

  constructor(options: EntityExtractorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.timezone = options.timezone ?? config.TIMEZONE;
    this.maxInputLength = options.maxInputLength ?? config.MAX_INPUT_LENGTH;
    this.minConfidence = options.minConfidence ?? MIN_CONFIDENCE;
    this.patterns = (options.patterns ?? ENTITY_PATTERNS).map((p) => ({ ...p, re: withIndices(p.re) }));
  }

  extract(text: string): ExtractionResult {
    const notes: string[] = [];
    let input = text;
    if (input.length > this.maxInputLength) {
      input = input.slice(0, this.maxInputLength);
      notes.push(`Input truncated to ${this.maxInputLength} characters`);
    }
    const processed = preprocess(input);
    const now = zonedNow(this.clock, this.timezone);

    const candidates = this.boostFromContext(processed, this.match(processed));

    const entities: ExtractedEntity[] = [];
    for (const c of candidates) {
      const normalizedValue = NORMALIZERS[c.type](c.value, { now });
      const validation = VALIDATORS[c.type](normalizedValue);
      const confidence = clamp(
        validation.state === 'failed' ? c.confidence * VALIDATION_FAILURE_FACTOR : c.confidence,
      );
      if (confidence < this.minConfidence) continue;
      entities.push(
        Object.freeze({
          type: c.type,
          value: c.value,
          normalizedValue,
          originalText: c.originalText,
          start: c.start,
          end: c.end,
          confidence,
          validation,
          method: c.method,
          contextClues: Object.freeze(c.clues),
        }),
      );
    }

    const kept = dropContained(entities).sort((a, b) => a.start - b.start || b.confidence - a.confidence);
    const groups = groupByType(kept);
    const extractionConfidence = weightedConfidence(kept);

    notes.push(...processingNotes(processed, kept));
    const unrecognized = findUnrecognized(processed, kept);

    logger.debug(
      { entities: kept.length, confidence: extractionConfidence },
      '[entities] extraction complete',
    );

    return Object.freeze({
      entities: Object.freeze(kept),
      groups,
      extractionConfidence,
      processedText: processed,
      notes: Object.freeze(notes),
      unrecognized: Object.freeze(unrecognized),
    });
  }

  extractByType(text: string, type: EntityType): readonly ExtractedEntity[] {
    return this.extract(text).groups[type] ?? [];
  }

  bestEntities(result: ExtractionResult, limit = 5): ExtractedEntity[] {
    return [...result.entities].sort((a, b) => b.confidence - a.confidence).slice(0, limit);
  }

  toExport(result: ExtractionResult): EntityExport {
    const entityCounts: Partial<Record<EntityType, number>> = {};
    for (const [type, list] of Object.entries(result.groups)) {
      if (list && isEntityType(type)) entityCounts[type] = list.length;
    }
    return {
      extractionConfidence: result.extractionConfidence,
      totalEntities: result.entities.length,
      entities: result.entities.map((e) => ({
        type: e.type,
        value: e.value,
        normalizedValue: e.normalizedValue,
        confidence: e.confidence,
        position: { start: e.start, end: e.end },
        validationStatus: `${e.validation.state}: ${e.validation.reason}`,
        extractionMethod: e.method,
      })),
      entityCounts,
      notes: result.notes,
      unrecognized: result.unrecognized,
    };
  }

  private match(text: string): Candidate[] {
    const out: Candidate[] = [];
    for (const pattern of this.patterns) {
      for (const m of text.matchAll(pattern.re)) {
        const group = pattern.group ?? 0;
        const raw = m[group];
        const span = m.indices?.[group];
        if (!raw || !span) continue;
        const value = raw.trim();
        if (!value) continue;
        const start = span[0] + (raw.length - raw.trimStart().length);
        const end = start + value.length;
        const context = text
          .slice(Math.max(0, start - CONTEXT_WINDOW), Math.min(text.length, end + CONTEXT_WINDOW))
          .trim();
        out.push({
          type: pattern.type,
          value,
          originalText: m[0],
          start,
          end,
          confidence: pattern.confidence,
          method: `pattern: ${pattern.description}`,
          clues: [context],
        });
      }
    }
    return out;
  }

  private boostFromContext(text: string, candidates: Candidate[]): Candidate[] {
    return candidates.map((c) => {
      const nearby = text.slice(
        Math.max(0, c.start - BOOST_RADIUS),
        Math.min(text.length, c.end + BOOST_RADIUS),
      );
      let confidence = c.confidence;
      const clues = [...c.clues];
      for (const ctx of CONTEXT_PATTERNS) {
        if (!ctx.boosts.includes(c.type) || !ctx.re.test(nearby)) continue;
        confidence = Math.min(1, confidence + ctx.boost);
        clues.push(`Context boost: ${ctx.name}`);
      }
      return { ...c, confidence, clues };
    });
  }
}

const ENTITY_TYPE_SET: ReadonlySet<string> = new Set(ENTITY_TYPES);

function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPE_SET.has(value);
}

/** Within a type, a span inside a stronger (or equally strong, longer) span is a duplicate. */
function dropContained(entities: ExtractedEntity[]): ExtractedEntity[] {
  const ranked = [...entities].sort(
    (a, b) => b.confidence - a.confidence || b.end - b.start - (a.end - a.start) || a.start - b.start,
  );
  const kept: ExtractedEntity[] = [];
  for (const e of ranked) {
    const covered = kept.some((k) => k.type === e.type && k.start <= e.start && e.end <= k.end);
    if (!covered) kept.push(e);
  }
  return kept;
}

function groupByType(entities: readonly ExtractedEntity[]): EntityGroups {
  const groups: Partial<Record<EntityType, ExtractedEntity[]>> = {};
  for (const e of entities) {
    (groups[e.type] ??= []).push(e);
  }
  for (const list of Object.values(groups)) {
    if (!list) continue;
    list.sort((a, b) => b.confidence - a.confidence);
    Object.freeze(list);
  }
  return Object.freeze(groups);
}

function weightedConfidence(entities: readonly ExtractedEntity[]): number {
  let total = 0;
  let weights = 0;
  for (const e of entities) {
    const w = ENTITY_IMPORTANCE[e.type];
    total += e.confidence * w;
    weights += w;
  }
  return weights > 0 ? clamp(total / weights) : 0;
}

function processingNotes(text: string, entities: readonly ExtractedEntity[]): string[] {
  const notes: string[] = [];
  const words = text ? text.split(' ').length : 0;
  if (words < 5) notes.push('Short input text - limited extraction possible');
  else if (words > 100) notes.push('Long input text - may contain multiple entities');

  const types = [...new Set(entities.map((e) => e.type))];
  if (types.length === 0) {
    notes.push('No entities extracted - input may not contain fleet-relevant information');
  } else if (types.length === 1) {
    notes.push(`Single entity type detected: ${types[0]}`);
  } else {
    notes.push(`Multiple entity types detected: ${types.join(', ')}`);
  }

  if (entities.length > 0) {
    const avg = entities.reduce((acc, e) => acc + e.confidence, 0) / entities.length;
    if (avg < 0.5) notes.push('Low average confidence - extraction may be unreliable');
    else if (avg > 0.9) notes.push('High average confidence - reliable extraction');
  }

  const failures = entities.filter((e) => e.validation.state === 'failed').length;
  if (failures > 0) notes.push(`${failures} entities failed validation`);
  return notes;
}

function findUnrecognized(text: string, entities: readonly ExtractedEntity[]): string[] {
  const found = new Set<string>();
  for (const re of UNRECOGNIZED_PATTERNS) {
    for (const m of text.matchAll(re)) {
      const start = m.index ?? 0;
      const end = start + m[0].length;
      const overlaps = entities.some((e) => start < e.end && end > e.start);
      if (!overlaps) found.add(m[0]);
    }
  }
  return [...found];
}
