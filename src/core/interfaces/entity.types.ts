export const ENTITY_TYPES = [
  'VEHICLE_ID',
  'VIN',
  'LICENSE_PLATE',
  'PERSON_NAME',
  'LOCATION',
  'BUILDING',
  'PARKING_SPOT',
  'DATE',
  'TIME',
  'DURATION',
  'EMAIL',
  'PHONE',
  'DEPARTMENT',
  'ROLE',
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export interface EntityValidation {
  readonly state: 'passed' | 'failed';
  readonly reason: string;
}

export interface ExtractedEntity {
  readonly type: EntityType;
  /** Captured value as it appears in the text. */
  readonly value: string;
  readonly normalizedValue: string;
  /** Whole pattern match, label included. */
  readonly originalText: string;
  readonly start: number;
  readonly end: number;
  readonly confidence: number;
  readonly validation: EntityValidation;
  readonly method: string;
  readonly contextClues: readonly string[];
}

export type EntityGroups = Readonly<Partial<Record<EntityType, readonly ExtractedEntity[]>>>;

export interface ExtractionResult {
  readonly entities: readonly ExtractedEntity[];
  readonly groups: EntityGroups;
  readonly extractionConfidence: number;
  readonly processedText: string;
  readonly notes: readonly string[];
  /** Entity-shaped substrings that no pattern claimed. */
  readonly unrecognized: readonly string[];
}
