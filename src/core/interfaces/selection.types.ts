import type { EntityType } from './entity.types.js';
import type { IntentName } from './intent.types.js';
import type { HttpMethod } from './template.types.js';

export type SelectionStrategy = 'exact_match' | 'best_fit' | 'multi_template' | 'fallback' | 'hybrid';

export const MATCHING_CRITERIA = [
  'intent_alignment',
  'entity_coverage',
  'required_entities',
  'template_popularity',
  'success_rate',
  'api_compatibility',
] as const;

export type MatchingCriterion = (typeof MATCHING_CRITERIA)[number];

export interface SelectionCriteria {
  readonly primaryIntent: IntentName;
  readonly secondaryIntents: readonly IntentName[];
  readonly multiIntent: boolean;
  readonly availableEntities: Readonly<Partial<Record<EntityType, readonly string[]>>>;
  readonly preferredCategories: readonly string[];
  readonly excludedTemplates: readonly string[];
  readonly strategy: SelectionStrategy;
  readonly minConfidenceThreshold: number;
  readonly maxTemplates: number;
  readonly allowPartialMatches: boolean;
}

export interface TemplateScore {
  readonly templateId: string;
  readonly totalScore: number;
  readonly confidence: number;
  readonly criteriaScores: Readonly<Record<MatchingCriterion, number>>;
  readonly matchingEntities: readonly string[];
  readonly missingEntities: readonly string[];
  readonly reasoning: readonly string[];
  readonly warnings: readonly string[];
}

export interface PlanStep {
  readonly stepNumber: number;
  readonly templateId: string;
  readonly category: string;
  readonly operation: string;
  readonly dependencies: readonly string[];
  readonly confidence: number;
  readonly requiredEntities: readonly string[];
  readonly apiEndpoint?: string;
  readonly httpMethod: HttpMethod;
}

export interface SelectionResult {
  readonly selectedTemplates: readonly TemplateScore[];
  readonly primaryTemplate?: TemplateScore;
  readonly fallbackTemplates: readonly TemplateScore[];
  readonly selectionConfidence: number;
  readonly strategyUsed: SelectionStrategy;
  readonly selectionNotes: readonly string[];
  readonly multiStepPlan: readonly PlanStep[];
}
