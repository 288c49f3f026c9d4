import type { ConfidenceFactor, EntityType, IntentName, RiskFactor } from '@core/interfaces/index.js';

export const FACTOR_WEIGHTS = {
  intent_clarity: 0.25,
  entity_completeness: 0.2,
  entity_validation: 0.15,
  context_consistency: 0.15,
  text_quality: 0.1,
  pattern_strength: 0.1,
  cross_validation: 0.03,
  temporal_consistency: 0.02,
} as const satisfies Record<ConfidenceFactor, number>;

export const RISK_PENALTIES = {
  ambiguous_intent: 0.2,
  validation_failures: 0.1,
  low_text_quality: 0.1,
  weak_patterns: 0.15,
} as const satisfies Record<RiskFactor, number>;

/** validation_failures applies per failed entity up to this cap. */
export const VALIDATION_FAILURE_CAP = 0.3;

export const RISK_DESCRIPTIONS: Record<RiskFactor, string> = {
  ambiguous_intent: 'Multiple competing intents with similar confidence',
  validation_failures: 'Key entities failed format validation',
  low_text_quality: 'Poor text quality or very short input',
  weak_patterns: 'Extraction based on weak or uncertain patterns',
};

export const LEVEL_THRESHOLDS = [
  ['very_high', 0.9],
  ['high', 0.75],
  ['medium', 0.5],
  ['low', 0.25],
] as const;

export const ENTITY_IMPORTANCE = {
  VIN: 1.0,
  VEHICLE_ID: 0.95,
  LICENSE_PLATE: 0.8,
  DATE: 0.75,
  TIME: 0.7,
  EMAIL: 0.65,
  PERSON_NAME: 0.6,
  LOCATION: 0.5,
  DURATION: 0.5,
  BUILDING: 0.4,
  PARKING_SPOT: 0.4,
  PHONE: 0.3,
  DEPARTMENT: 0.2,
  ROLE: 0.2,
} as const satisfies Record<EntityType, number>;

export const REQUIRED_ENTITY_TYPES: Record<IntentName, readonly EntityType[]> = {
  CREATE_VEHICLE: ['VIN', 'VEHICLE_ID'],
  SCHEDULE_MAINTENANCE: ['VEHICLE_ID', 'DATE'],
  MAKE_RESERVATION: ['VEHICLE_ID', 'DATE', 'PERSON_NAME'],
  ASSIGN_PARKING: ['VEHICLE_ID', 'PARKING_SPOT'],
  UPDATE_STATUS: ['VEHICLE_ID'],
  QUERY_INFORMATION: ['VEHICLE_ID'],
  TRANSFER_VEHICLE: ['VEHICLE_ID', 'LOCATION'],
  CANCEL_OPERATION: ['VEHICLE_ID'],
  UNKNOWN: [],
};

export const EXPECTED_ENTITY_TYPES: Record<IntentName, readonly EntityType[]> = {
  CREATE_VEHICLE: ['VIN', 'VEHICLE_ID', 'LICENSE_PLATE'],
  SCHEDULE_MAINTENANCE: ['VEHICLE_ID', 'DATE', 'TIME'],
  MAKE_RESERVATION: ['VEHICLE_ID', 'DATE', 'PERSON_NAME'],
  ASSIGN_PARKING: ['VEHICLE_ID', 'LOCATION', 'PARKING_SPOT'],
  UPDATE_STATUS: ['VEHICLE_ID'],
  QUERY_INFORMATION: [],
  TRANSFER_VEHICLE: ['VEHICLE_ID', 'LOCATION'],
  CANCEL_OPERATION: [],
  UNKNOWN: [],
};

/** Words in the request that make an entity of this type expected. */
export const SUPPORTING_KEYWORDS: Partial<Record<EntityType, readonly string[]>> = {
  DATE: ['schedule', 'book', 'appointment', 'meeting', 'date', 'reserve'],
  TIME: ['at', 'from', 'until', 'schedule', 'appointment'],
  VEHICLE_ID: ['vehicle', 'car', 'truck', 'van', 'unit'],
  VIN: ['vin', 'vehicle', 'register'],
  LOCATION: ['building', 'parking', 'lot', 'move', 'location', 'transfer'],
  PARKING_SPOT: ['parking', 'spot', 'space', 'lot'],
  PERSON_NAME: ['for', 'contact', 'driver', 'manager', 'client'],
};
