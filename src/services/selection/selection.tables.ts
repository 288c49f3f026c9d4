import type { IntentName, MatchingCriterion } from '@core/interfaces/index.js';

export const CRITERIA_WEIGHTS = {
  intent_alignment: 0.3,
  entity_coverage: 0.25,
  required_entities: 0.2,
  template_popularity: 0.1,
  success_rate: 0.1,
  api_compatibility: 0.05,
} as const satisfies Record<MatchingCriterion, number>;

/** Multiplier applied to the total when entities are missing and partial matches are off. */
export const PARTIAL_MATCH_PENALTY = 0.3;
export const EXACT_MATCH_MIN_SCORE = 0.9;
/** Below this classification confidence the default strategy is fallback. */
export const LOW_CONFIDENCE_STRATEGY_THRESHOLD = 0.6;

export const PRIMARY_ALIGNMENT = 0.8;
export const SECONDARY_ALIGNMENT = 0.2;
export const SECONDARY_INTENTS_CONSIDERED = 2;

/** Uses at which popularity saturates (log scale). */
export const POPULARITY_SATURATION = 100;
export const UNUSED_POPULARITY = 0.5;
export const UNUSED_SUCCESS_RATE = 1.0;

export const MAX_TEMPLATES = { single: 3, multi: 5 } as const;

export const INTENT_CATEGORIES: Record<IntentName, readonly string[]> = {
  CREATE_VEHICLE: ['vehicle_operations'],
  SCHEDULE_MAINTENANCE: ['maintenance'],
  MAKE_RESERVATION: ['reservations'],
  ASSIGN_PARKING: ['parking'],
  UPDATE_STATUS: ['vehicle_operations', 'maintenance'],
  QUERY_INFORMATION: ['vehicle_operations', 'reservations', 'maintenance'],
  TRANSFER_VEHICLE: ['vehicle_operations', 'parking'],
  CANCEL_OPERATION: ['reservations', 'maintenance'],
  UNKNOWN: [],
};

/** Substrings looked for in a template's name, description and category. */
export const INTENT_ALIGNMENT_KEYWORDS: Record<IntentName, readonly string[]> = {
  CREATE_VEHICLE: ['create', 'new', 'add', 'register'],
  SCHEDULE_MAINTENANCE: ['schedule', 'service', 'inspection'],
  MAKE_RESERVATION: ['reserve', 'book'],
  ASSIGN_PARKING: ['assign', 'park'],
  UPDATE_STATUS: ['update', 'modify', 'change', 'status'],
  QUERY_INFORMATION: ['query', 'search', 'find', 'lookup'],
  TRANSFER_VEHICLE: ['transfer', 'move', 'relocate'],
  CANCEL_OPERATION: ['cancel', 'remove', 'delete'],
  UNKNOWN: [],
};

/** Multi-step plans run categories in this order; unlisted categories go last. */
export const CATEGORY_PRIORITY: Readonly<Record<string, number>> = {
  vehicle_operations: 1,
  maintenance: 2,
  reservations: 3,
  parking: 4,
};

export const UNLISTED_CATEGORY_PRIORITY = 999;
