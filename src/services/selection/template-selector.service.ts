import {
  ENTITY_TYPES,
  MATCHING_CRITERIA,
  type ClassificationResult,
  type EntityType,
  type ExtractionResult,
  type IntentName,
  type MatchingCriterion,
  type PlanStep,
  type SelectionCriteria,
  type SelectionResult,
  type SelectionStrategy,
  type TemplateCatalog,
  type TemplateMetadata,
  type TemplateScore,
  type TemplateUsageStats,
} from '@core/interfaces/index.js';

import { config } from '@config/env.config.js';
import { typesForField } from '@services/templates/field-aliases.js';
import { logger } from '@utils/logger.js';
import { clamp, mean } from '@utils/score.js';

import {
  CATEGORY_PRIORITY,
  CRITERIA_WEIGHTS,
  EXACT_MATCH_MIN_SCORE,
  INTENT_ALIGNMENT_KEYWORDS,
  INTENT_CATEGORIES,
  LOW_CONFIDENCE_STRATEGY_THRESHOLD,
  MAX_TEMPLATES,
  PARTIAL_MATCH_PENALTY,
  POPULARITY_SATURATION,
  PRIMARY_ALIGNMENT,
  SECONDARY_ALIGNMENT,
  SECONDARY_INTENTS_CONSIDERED,
  UNLISTED_CATEGORY_PRIORITY,
  UNUSED_POPULARITY,
  UNUSED_SUCCESS_RATE,
} from './selection.tables.js';

export interface TemplateSelectorOptions {
  minConfidence?: number;
}

export interface SelectionExplanation {
  strategyUsed: SelectionStrategy;
  selectionConfidence: number;
  totalCandidatesEvaluated: number;
  templatesSelected: number;
  selectionNotes: readonly string[];
  templateDetails: {
    rank: number;
    templateId: string;
    templateName: string;
    category: string;
    totalScore: number;
    confidence: number;
    criteriaScores: Readonly<Record<MatchingCriterion, number>>;
    matchingEntities: readonly string[];
    missingEntities: readonly string[];
    reasoning: readonly string[];
    warnings: readonly string[];
  }[];
  multiStepPlan?: { stepsCount: number; steps: readonly PlanStep[] };
}

interface Outcome {
  selected: TemplateScore[];
  fallback: TemplateScore[];
  notes: string[];
  strategyUsed: SelectionStrategy;
  confidence?: number;
  /** Selected templates form one multi-step operation. */
  planned?: boolean;
}

const unique = <T>(items: Iterable<T>): T[] => [...new Set(items)];

export class TemplateSelector {
  private readonly minConfidence: number;

  constructor(options: TemplateSelectorOptions = {}) {
    this.minConfidence = options.minConfidence ?? config.SELECTION_MIN_CONFIDENCE;
  }

  /** Default criteria: categories from the intents, strategy from the classification signal. */
  buildCriteria(
    classification: ClassificationResult,
    extraction: ExtractionResult,
    overrides: Partial<SelectionCriteria> = {},
  ): SelectionCriteria {
    const availableEntities: Partial<Record<EntityType, string[]>> = {};
    for (const entity of extraction.entities) {
      (availableEntities[entity.type] ??= []).push(entity.value);
    }

    const primaryIntent = classification.primaryIntent.intent;
    const secondaryIntents = classification.secondaryIntents.map((m) => m.intent);
    const preferredCategories = unique(
      [primaryIntent, ...secondaryIntents].flatMap((intent) => INTENT_CATEGORIES[intent]),
    );

    let strategy: SelectionStrategy = 'best_fit';
    if (classification.isMultiIntent) strategy = 'multi_template';
    else if (classification.overallConfidence < LOW_CONFIDENCE_STRATEGY_THRESHOLD) strategy = 'fallback';

    return {
      primaryIntent,
      secondaryIntents,
      multiIntent: classification.isMultiIntent,
      availableEntities,
      preferredCategories,
      excludedTemplates: [],
      strategy,
      minConfidenceThreshold: this.minConfidence,
      maxTemplates: classification.isMultiIntent ? MAX_TEMPLATES.multi : MAX_TEMPLATES.single,
      allowPartialMatches: true,
      ...overrides,
    };
  }

  select(catalog: TemplateCatalog, criteria: SelectionCriteria): SelectionResult {
    const candidates = this.candidates(catalog, criteria);
    if (candidates.length === 0) {
      logger.warn({ categories: criteria.preferredCategories }, '[selection] no candidate templates');
      return emptyResult(criteria.strategy, ['No templates found matching criteria']);
    }

    const scored: TemplateScore[] = [];
    for (const id of candidates) {
      const metadata = catalog.getTemplateMetadata(id);
      if (!metadata) continue;
      scored.push(scoreTemplate(metadata, catalog.getTemplateStats(id), criteria));
    }
    scored.sort((a, b) => b.totalScore - a.totalScore || a.templateId.localeCompare(b.templateId));

    const eligible = scored.filter((s) => s.totalScore >= criteria.minConfidenceThreshold);
    const outcome = this.applyStrategy(catalog, criteria, eligible);

    if (outcome.selected.length === 0) {
      outcome.notes.push(
        `No template scored at or above ${criteria.minConfidenceThreshold} (best ${
          scored[0]?.totalScore.toFixed(2) ?? 'n/a'
        })`,
      );
      logger.warn(
        { strategy: outcome.strategyUsed, candidates: scored.length },
        '[selection] no template selected',
      );
    }

    const primaryTemplate = outcome.selected[0];
    const multiStepPlan =
      outcome.planned && outcome.selected.length > 1 ? buildPlan(catalog, outcome.selected) : [];

    const result: SelectionResult = {
      selectedTemplates: outcome.selected,
      primaryTemplate,
      fallbackTemplates: outcome.fallback,
      selectionConfidence: clamp(outcome.confidence ?? primaryTemplate?.confidence ?? 0),
      strategyUsed: outcome.strategyUsed,
      selectionNotes: outcome.notes,
      multiStepPlan,
    };

    logger.debug(
      {
        strategy: result.strategyUsed,
        selected: result.selectedTemplates.map((s) => s.templateId),
        confidence: result.selectionConfidence,
      },
      '[selection] complete',
    );
    return result;
  }

  /** Latest version unless `version` pins one. */
  selectByName(
    catalog: TemplateCatalog,
    name: string,
    category?: string,
    version?: string,
  ): string | undefined {
    const ids = catalog.findTemplatesByName(name, category);
    if (version === undefined) return ids[0];
    return ids.find((id) => catalog.getTemplateMetadata(id)?.version === version);
  }

  explain(catalog: TemplateCatalog, result: SelectionResult): SelectionExplanation {
    return {
      strategyUsed: result.strategyUsed,
      selectionConfidence: result.selectionConfidence,
      totalCandidatesEvaluated: result.selectedTemplates.length + result.fallbackTemplates.length,
      templatesSelected: result.selectedTemplates.length,
      selectionNotes: result.selectionNotes,
      templateDetails: result.selectedTemplates.map((score, i) => {
        const metadata = catalog.getTemplateMetadata(score.templateId);
        return {
          rank: i + 1,
          templateId: score.templateId,
          templateName: metadata?.name ?? 'Unknown',
          category: metadata?.category ?? 'Unknown',
          totalScore: score.totalScore,
          confidence: score.confidence,
          criteriaScores: score.criteriaScores,
          matchingEntities: score.matchingEntities,
          missingEntities: score.missingEntities,
          reasoning: score.reasoning,
          warnings: score.warnings,
        };
      }),
      ...(result.multiStepPlan.length > 0
        ? { multiStepPlan: { stepsCount: result.multiStepPlan.length, steps: result.multiStepPlan } }
        : {}),
    };
  }

  private candidates(catalog: TemplateCatalog, criteria: SelectionCriteria): string[] {
    let ids = unique(criteria.preferredCategories.flatMap((c) => catalog.findTemplatesByCategory(c)));
    if (ids.length === 0) ids = catalog.listTemplateIds();
    const excluded = new Set(criteria.excludedTemplates);
    return ids.filter((id) => !excluded.has(id)).sort();
  }

  private applyStrategy(
    catalog: TemplateCatalog,
    criteria: SelectionCriteria,
    eligible: TemplateScore[],
  ): Outcome {
    switch (criteria.strategy) {
      case 'exact_match': {
        const exact = exactMatch(eligible);
        if (exact) return { ...single([exact], eligible, criteria), strategyUsed: 'exact_match' };
        const outcome = bestFit(eligible, criteria);
        outcome.notes.unshift('No exact match found, falling back to best fit');
        return outcome;
      }
      case 'best_fit':
        return bestFit(eligible, criteria);
      case 'multi_template':
        return multiTemplate(catalog, eligible, criteria);
      case 'fallback':
        return fallback(eligible, criteria);
      case 'hybrid': {
        const exact = exactMatch(eligible);
        if (exact) {
          const outcome = single([exact], eligible, criteria);
          outcome.notes.push('Used exact match within hybrid strategy');
          return { ...outcome, strategyUsed: 'hybrid' };
        }
        if (criteria.multiIntent) {
          const outcome = multiTemplate(catalog, eligible, criteria);
          outcome.notes.push('Used multi-template within hybrid strategy');
          return { ...outcome, strategyUsed: 'hybrid' };
        }
        const outcome = bestFit(eligible, criteria);
        outcome.notes.push('Used best fit within hybrid strategy');
        return { ...outcome, strategyUsed: 'hybrid' };
      }
    }
  }
}

function emptyResult(strategy: SelectionStrategy, notes: string[]): SelectionResult {
  return {
    selectedTemplates: [],
    fallbackTemplates: [],
    selectionConfidence: 0,
    strategyUsed: strategy,
    selectionNotes: notes,
    multiStepPlan: [],
  };
}

function single(selected: TemplateScore[], eligible: TemplateScore[], criteria: SelectionCriteria): Outcome {
  return {
    selected,
    fallback: eligible.filter((s) => !selected.includes(s)).slice(0, criteria.maxTemplates),
    notes: [],
    strategyUsed: 'best_fit',
  };
}

function exactMatch(eligible: TemplateScore[]): TemplateScore | undefined {
  return eligible.find((s) => s.totalScore >= EXACT_MATCH_MIN_SCORE && s.missingEntities.length === 0);
}

function bestFit(eligible: TemplateScore[], criteria: SelectionCriteria): Outcome {
  return single(eligible.slice(0, criteria.maxTemplates), eligible, criteria);
}

function multiTemplate(
  catalog: TemplateCatalog,
  eligible: TemplateScore[],
  criteria: SelectionCriteria,
): Outcome {
  const bestByCategory = new Map<string, TemplateScore>();
  for (const score of eligible) {
    const category = catalog.getTemplateMetadata(score.templateId)?.category;
    if (category !== undefined && !bestByCategory.has(category)) bestByCategory.set(category, score);
  }

  const order =
    criteria.preferredCategories.length > 0 ? criteria.preferredCategories : [...bestByCategory.keys()];
  const selected: TemplateScore[] = [];
  for (const category of order) {
    const best = bestByCategory.get(category);
    if (best && !selected.includes(best)) selected.push(best);
  }
  const limited = selected.slice(0, criteria.maxTemplates);

  return {
    selected: limited,
    fallback: eligible.filter((s) => !limited.includes(s)).slice(0, criteria.maxTemplates),
    notes: limited.length > 1 ? [`Selected ${limited.length} templates across categories`] : [],
    strategyUsed: 'multi_template',
    confidence: limited.length > 0 ? mean(limited.map((s) => s.confidence)) : 0,
    planned: true,
  };
}

/** Best available among candidates that cleared the threshold, with a wider fallback list. */
function fallback(eligible: TemplateScore[], criteria: SelectionCriteria): Outcome {
  const selected = eligible.slice(0, criteria.maxTemplates);
  return {
    selected,
    fallback: eligible.slice(selected.length, selected.length + criteria.maxTemplates * 2),
    notes: selected.length > 0 ? ['Using best available templates despite low classification confidence'] : [],
    strategyUsed: 'fallback',
  };
}

function buildPlan(catalog: TemplateCatalog, selected: readonly TemplateScore[]): PlanStep[] {
  const withMeta = selected.flatMap((score) => {
    const metadata = catalog.getTemplateMetadata(score.templateId);
    return metadata ? [{ score, metadata }] : [];
  });
  const priority = (m: TemplateMetadata) => CATEGORY_PRIORITY[m.category] ?? UNLISTED_CATEGORY_PRIORITY;
  withMeta.sort((a, b) => priority(a.metadata) - priority(b.metadata));

  return withMeta.map(({ score, metadata }, i) => ({
    stepNumber: i + 1,
    templateId: score.templateId,
    category: metadata.category,
    operation: metadata.name,
    dependencies: metadata.dependencies,
    confidence: score.confidence,
    requiredEntities: metadata.requiredEntities,
    apiEndpoint: metadata.apiEndpoint,
    httpMethod: metadata.httpMethod,
  }));
}

function intentAlignment(
  metadata: TemplateMetadata,
  primary: IntentName,
  secondary: readonly IntentName[],
): number {
  const text = `${metadata.name} ${metadata.description} ${metadata.category}`.toLowerCase();
  const hits = (intent: IntentName) => INTENT_ALIGNMENT_KEYWORDS[intent].some((k) => text.includes(k));
  let score = hits(primary) ? PRIMARY_ALIGNMENT : 0;
  for (const intent of secondary.slice(0, SECONDARY_INTENTS_CONSIDERED)) {
    if (hits(intent)) score += SECONDARY_ALIGNMENT;
  }
  return clamp(score);
}

function popularity(stats: TemplateUsageStats | undefined): number {
  if (!stats || stats.totalUses === 0) return UNUSED_POPULARITY;
  return Math.min(1, Math.log(stats.totalUses + 1) / Math.log(POPULARITY_SATURATION));
}

function successRate(stats: TemplateUsageStats | undefined): number {
  if (!stats || stats.totalUses === 0) return UNUSED_SUCCESS_RATE;
  return stats.successfulUses / stats.totalUses;
}

function apiCompatibility(metadata: TemplateMetadata): number {
  return metadata.apiEndpoint ? 1 : 0.5;
}

export function scoreTemplate(
  metadata: TemplateMetadata,
  stats: TemplateUsageStats | undefined,
  criteria: SelectionCriteria,
): TemplateScore {
  const availableTypes = new Set<EntityType>(
    ENTITY_TYPES.filter((type) => (criteria.availableEntities[type]?.length ?? 0) > 0),
  );

  const wanted = unique([...metadata.requiredEntities, ...metadata.optionalEntities]);
  const matchingEntities = wanted.filter((name) => typesForField(name, availableTypes).length > 0);
  const missingEntities = wanted.filter((name) => !matchingEntities.includes(name));
  const matchingRequired = metadata.requiredEntities.filter((name) => matchingEntities.includes(name));

  const criteriaScores: Record<MatchingCriterion, number> = {
    intent_alignment: intentAlignment(metadata, criteria.primaryIntent, criteria.secondaryIntents),
    entity_coverage: wanted.length > 0 ? matchingEntities.length / wanted.length : 1,
    required_entities:
      metadata.requiredEntities.length > 0 ? matchingRequired.length / metadata.requiredEntities.length : 1,
    template_popularity: popularity(stats),
    success_rate: successRate(stats),
    api_compatibility: apiCompatibility(metadata),
  };

  let totalScore = MATCHING_CRITERIA.reduce((acc, c) => acc + criteriaScores[c] * CRITERIA_WEIGHTS[c], 0);
  if (missingEntities.length > 0 && !criteria.allowPartialMatches) {
    totalScore *= 1 - PARTIAL_MATCH_PENALTY;
  }
  totalScore = clamp(totalScore);

  const missingRequired = metadata.requiredEntities.filter((name) => missingEntities.includes(name));
  return {
    templateId: metadata.id,
    totalScore,
    confidence: totalScore,
    criteriaScores,
    matchingEntities,
    missingEntities,
    reasoning: reasoningFor(metadata, criteriaScores, matchingEntities, missingEntities),
    warnings: [
      ...(missingRequired.length > 0
        ? [`Missing required entities: ${[...missingRequired].sort().join(', ')}`]
        : []),
      ...(totalScore < 0.5 ? ['Low overall confidence for this template match'] : []),
      ...(metadata.apiEndpoint ? [] : ['Template has no defined API endpoint']),
    ],
  };
}

function reasoningFor(
  metadata: TemplateMetadata,
  scores: Record<MatchingCriterion, number>,
  matching: readonly string[],
  missing: readonly string[],
): string[] {
  const reasoning: string[] = [];
  const alignment = scores.intent_alignment;
  const strength = alignment > 0.7 ? 'Strong' : alignment > 0.4 ? 'Moderate' : 'Weak';
  reasoning.push(`${strength} intent alignment with template '${metadata.name}'`);
  if (matching.length > 0) {
    reasoning.push(`Covers ${matching.length} entities: ${[...matching].sort().join(', ')}`);
  }
  if (missing.length > 0) {
    reasoning.push(`Missing ${missing.length} entities: ${[...missing].sort().join(', ')}`);
  }
  if (scores.success_rate > 0.9) reasoning.push('High historical success rate');
  else if (scores.success_rate < 0.5) reasoning.push('Lower historical success rate');
  return reasoning;
}
