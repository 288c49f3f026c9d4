import type { JsonValue } from './template.types.js';

export type IssueKind =
  | 'schema'
  | 'format'
  | 'constraint'
  | 'business_rule'
  | 'data_consistency'
  | 'security';

export type Severity = 'info' | 'warning' | 'error' | 'critical';

export interface ValidationIssue {
  readonly fieldPath: string;
  readonly kind: IssueKind;
  readonly severity: Severity;
  readonly message: string;
  readonly expected?: JsonValue;
  readonly actual?: JsonValue;
  readonly suggestion?: string;
  readonly ruleName?: string;
}

export interface ValidationOptions {
  readonly strictMode: boolean;
  readonly failOnWarnings: boolean;
  readonly validateSchema: boolean;
  readonly validateBusinessRules: boolean;
  readonly validateDataConsistency: boolean;
  readonly validateSecurity: boolean;
  /** 0 disables the cap. */
  readonly maxIssuesPerField: number;
}

export interface ValidationResult {
  readonly templateId: string;
  readonly isValid: boolean;
  readonly issues: readonly ValidationIssue[];
  readonly infoCount: number;
  readonly warningsCount: number;
  readonly errorsCount: number;
  readonly criticalCount: number;
  readonly validatedFields: readonly string[];
  readonly businessRulesApplied: readonly string[];
  readonly processingTimeMs: number;
}
