export const SCORED_INTENTS = [
  'CREATE_VEHICLE',
  'SCHEDULE_MAINTENANCE',
  'MAKE_RESERVATION',
  'ASSIGN_PARKING',
  'UPDATE_STATUS',
  'QUERY_INFORMATION',
  'TRANSFER_VEHICLE',
  'CANCEL_OPERATION',
] as const;

export const INTENTS = [...SCORED_INTENTS, 'UNKNOWN'] as const;

export type IntentName = (typeof INTENTS)[number];

/** Intents that carry their own patterns; UNKNOWN is derived from the others. */
export type ScoredIntent = (typeof SCORED_INTENTS)[number];

export interface IntentMatch {
  readonly intent: IntentName;
  readonly confidence: number;
  readonly evidence: readonly string[];
  readonly keywordsMatched: readonly string[];
  readonly patternsMatched: readonly string[];
  readonly contextClues: readonly string[];
}

export interface ClassificationResult {
  readonly primaryIntent: IntentMatch;
  /** Other intents above the multi-intent threshold, strongest first. */
  readonly secondaryIntents: readonly IntentMatch[];
  readonly overallConfidence: number;
  readonly isMultiIntent: boolean;
  readonly processedText: string;
  readonly notes: readonly string[];
}
