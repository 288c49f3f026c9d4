import type {
  ClassificationResult,
  EntityType,
  ExtractedEntity,
  ExtractionResult,
  IntentName,
  TemplateDefinition,
} from '@core/interfaces/index.js';
import { parseTemplateFile } from '@infra/catalog/template-file.loader.js';
import { buildDefinition } from '@services/templates/template-registry.js';

type EntityInput = Pick<ExtractedEntity, 'type' | 'value'> & Partial<ExtractedEntity>;

export function entity(input: EntityInput): ExtractedEntity {
  const start = input.start ?? 0;
  return {
    normalizedValue: input.value,
    originalText: input.value,
    start,
    end: start + input.value.length,
    confidence: 0.9,
    validation: { state: 'passed', reason: 'test' },
    method: 'pattern: test',
    contextClues: [],
    ...input,
  };
}

export function extractionOf(entities: readonly ExtractedEntity[]): ExtractionResult {
  const groups: Partial<Record<EntityType, ExtractedEntity[]>> = {};
  for (const e of entities) (groups[e.type] ??= []).push(e);
  return {
    entities,
    groups,
    extractionConfidence: entities.length ? 0.9 : 0,
    processedText: entities.map((e) => e.originalText).join(' '),
    notes: [],
    unrecognized: [],
  };
}

export function classificationOf(intent: IntentName, confidence = 0.9): ClassificationResult {
  return {
    primaryIntent: {
      intent,
      confidence,
      evidence: [],
      keywordsMatched: [],
      patternsMatched: [],
      contextClues: [],
    },
    secondaryIntents: [],
    overallConfidence: confidence,
    isMultiIntent: false,
    processedText: '',
    notes: [],
  };
}

/** Builds a catalog entry from an in-memory template file body. */
export function templateFrom(body: unknown, stem = 'inline'): TemplateDefinition {
  const raw = JSON.stringify(body);
  return buildDefinition({ sourcePath: `/tmp/${stem}.json`, stem, raw, file: parseTemplateFile(raw) });
}
