export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export const RULE_TYPES = ['string', 'number', 'integer', 'boolean', 'array', 'object', 'null'] as const;
export type RuleType = (typeof RULE_TYPES)[number];

export const RULE_FORMATS = ['date', 'datetime', 'time', 'email', 'phone', 'uuid', 'url', 'vin'] as const;
export type RuleFormat = (typeof RULE_FORMATS)[number];

export interface FieldRule {
  readonly type?: RuleType;
  readonly format?: RuleFormat;
  readonly pattern?: string;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly min?: number;
  readonly max?: number;
  readonly allowedValues?: readonly JsonPrimitive[];
  readonly required?: boolean;
}

export type ValidationRules = Readonly<Record<string, FieldRule>>;

export interface TemplateMetadata {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly category: string;
  readonly description: string;
  readonly requiredEntities: readonly string[];
  readonly optionalEntities: readonly string[];
  readonly apiEndpoint?: string;
  readonly httpMethod: HttpMethod;
  readonly tags: readonly string[];
  readonly dependencies: readonly string[];
  readonly contentHash: string;
  readonly sourcePath?: string;
}

export type TemplateSegment =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'placeholder'; readonly field: string; readonly defaultValue?: string };

/** Template content parsed once at load; generation walks this tree. */
export type TemplateNode =
  | { readonly kind: 'object'; readonly entries: readonly { readonly key: string; readonly value: TemplateNode }[] }
  | { readonly kind: 'array'; readonly items: readonly TemplateNode[] }
  | { readonly kind: 'text'; readonly segments: readonly TemplateSegment[] }
  | { readonly kind: 'value'; readonly value: JsonPrimitive };

export interface TemplateDefinition {
  readonly id: string;
  readonly metadata: TemplateMetadata;
  readonly content: JsonValue;
  readonly ast: TemplateNode;
  readonly placeholders: readonly string[];
  readonly validationRules: ValidationRules;
}

export interface TemplateUsageStats {
  readonly totalUses: number;
  readonly successfulUses: number;
  readonly failedUses: number;
  readonly averageGenerationTimeMs: number;
  readonly lastUsedAt?: string;
  readonly errorPatterns: Readonly<Record<string, number>>;
}

/** Read side used by selection and generation, plus the usage write-back. */
export interface TemplateCatalog {
  getTemplate(id: string): TemplateDefinition | undefined;
  getTemplateMetadata(id: string): TemplateMetadata | undefined;
  findTemplatesByCategory(category: string): string[];
  /** Versions newest first. */
  findTemplatesByName(name: string, category?: string): string[];
  listTemplateIds(): string[];
  getTemplateStats(id: string): TemplateUsageStats | undefined;
  recordTemplateUsage(
    id: string,
    success: boolean,
    generationTimeMs: number,
    errorType?: string,
  ): Promise<void>;
}
