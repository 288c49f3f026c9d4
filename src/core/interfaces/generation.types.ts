import type { JsonValue } from './template.types.js';

export interface GenerationOptions {
  /** Apply template defaults and field-name fallbacks to unresolved placeholders. */
  readonly useFallbackValues: boolean;
  readonly transformValues: boolean;
  readonly generateMissingIds: boolean;
  readonly formatTimestamps: boolean;
  /** Report required entities that end up absent or null in the output. */
  readonly strictValidation: boolean;
}

export interface GenerationResult {
  readonly templateId: string;
  readonly generatedJson: JsonValue;
  readonly populatedFields: readonly string[];
  readonly missingFields: readonly string[];
  readonly fallbackValuesUsed: Readonly<Record<string, JsonValue>>;
  readonly generationConfidence: number;
  /** Non-fatal problems, e.g. required fields left unresolved. */
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly processingTimeMs: number;
}
