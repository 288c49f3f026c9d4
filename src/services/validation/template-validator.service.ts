import { config } from '@config/env.config.js';
import type {
  FieldRule,
  GenerationResult,
  IssueKind,
  JsonValue,
  TemplateCatalog,
  TemplateMetadata,
  ValidationIssue,
  ValidationOptions,
  ValidationResult,
  ValidationRules,
} from '@core/interfaces/index.js';
import { fieldTokens } from '@services/templates/field-aliases.js';
import { logger } from '@utils/logger.js';
import { parseDateTime, systemClock, zonedNow, type Clock } from '@utils/time.js';

import { collectFields, defaultBusinessRules, isJsonObject, type BusinessRule, type RuleContext } from './business-rules.js';
import { checkConstraints, checkFormat, checkType, toIssue } from './format-checks.js';
import { scanPayload } from './security-scan.js';

const SANITY_WINDOW_YEARS = { past: 10, future: 5 } as const;
const MAX_ID_LENGTH = 100;
const DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

export function defaultValidationOptions(): ValidationOptions {
  return {
    strictMode: config.VALIDATION_STRICT_MODE,
    failOnWarnings: config.VALIDATION_FAIL_ON_WARNINGS,
    validateSchema: true,
    validateBusinessRules: true,
    validateDataConsistency: true,
    validateSecurity: true,
    maxIssuesPerField: 5,
  };
}

export interface TemplateValidatorOptions {
  rules?: BusinessRule[];
  clock?: Clock;
}

export interface ValidationSummary {
  totalValidations: number;
  validCount: number;
  invalidCount: number;
  successRate: number;
  totalIssues: number;
  totalWarnings: number;
  totalErrors: number;
  totalCritical: number;
  totalProcessingTimeMs: number;
  averageProcessingTimeMs: number;
  templatesValidated: string[];
}

interface Counts {
  infoCount: number;
  warningsCount: number;
  errorsCount: number;
  criticalCount: number;
}

function countIssues(issues: readonly ValidationIssue[]): Counts {
  const counts: Counts = { infoCount: 0, warningsCount: 0, errorsCount: 0, criticalCount: 0 };
  for (const issue of issues) {
    if (issue.severity === 'info') counts.infoCount += 1;
    else if (issue.severity === 'warning') counts.warningsCount += 1;
    else if (issue.severity === 'error') counts.errorsCount += 1;
    else counts.criticalCount += 1;
  }
  return counts;
}

export function isValidFor(counts: Counts, options: Pick<ValidationOptions, 'strictMode' | 'failOnWarnings'>): boolean {
  if (counts.criticalCount > 0) return false;
  if (counts.errorsCount > 0 && options.strictMode) return false;
  if (counts.warningsCount > 0 && options.failOnWarnings) return false;
  return true;
}

export class TemplateValidator {
  private readonly rules: BusinessRule[];
  private readonly clock: Clock;

  constructor(options: TemplateValidatorOptions = {}) {
    this.rules = options.rules ?? defaultBusinessRules();
    this.clock = options.clock ?? systemClock;
  }

  get businessRules(): readonly BusinessRule[] {
    return this.rules;
  }

  validate(
    generation: GenerationResult,
    rules: ValidationRules,
    metadata: TemplateMetadata,
    overrides: Partial<ValidationOptions> = {},
  ): ValidationResult {
    const started = performance.now();
    const options = { ...defaultValidationOptions(), ...overrides };
    const data = generation.generatedJson;
    const issues: ValidationIssue[] = [];
    const validatedFields: string[] = [];
    const businessRulesApplied: string[] = [];

    const stages: [IssueKind, boolean, () => void][] = [
      ['schema', options.validateSchema, () => this.checkSchema(data, rules, '', options, issues, validatedFields)],
      ['business_rule', options.validateBusinessRules, () => this.checkBusinessRules(data, metadata, issues, businessRulesApplied)],
      ['data_consistency', options.validateDataConsistency, () => this.checkConsistency(data, issues)],
      ['security', options.validateSecurity, () => issues.push(...scanPayload(data))],
    ];
    // a failing stage becomes a critical issue; later stages still run
    for (const [kind, enabled, run] of stages) {
      if (!enabled) continue;
      try {
        run();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ templateId: generation.templateId, stage: kind, err: message }, '[validation] stage failed');
        issues.push({
          fieldPath: 'validation',
          kind,
          severity: 'critical',
          message: `Validation stage '${kind}' failed: ${message}`,
        });
      }
    }

    const counts = countIssues(issues);
    const result: ValidationResult = {
      templateId: generation.templateId,
      isValid: isValidFor(counts, options),
      issues,
      ...counts,
      validatedFields,
      businessRulesApplied,
      processingTimeMs: performance.now() - started,
    };

    logger.debug(
      { templateId: result.templateId, valid: result.isValid, issues: issues.length },
      '[validation] complete',
    );
    return result;
  }

  /** Looks the template up first; an unknown id is a critical issue, not an exception. */
  validateFromCatalog(
    catalog: TemplateCatalog,
    generation: GenerationResult,
    overrides: Partial<ValidationOptions> = {},
  ): ValidationResult {
    const template = catalog.getTemplate(generation.templateId);
    if (template) return this.validate(generation, template.validationRules, template.metadata, overrides);
    return {
      templateId: generation.templateId,
      isValid: false,
      issues: [
        { fieldPath: 'template', kind: 'schema', severity: 'critical', message: 'Template metadata or data not found' },
      ],
      infoCount: 0,
      warningsCount: 0,
      errorsCount: 0,
      criticalCount: 1,
      validatedFields: [],
      businessRulesApplied: [],
      processingTimeMs: 0,
    };
  }

  summarize(results: readonly ValidationResult[]): ValidationSummary {
    const valid = results.filter((r) => r.isValid).length;
    const totalProcessingTimeMs = results.reduce((acc, r) => acc + r.processingTimeMs, 0);
    const sum = (pick: (r: ValidationResult) => number) => results.reduce((acc, r) => acc + pick(r), 0);
    return {
      totalValidations: results.length,
      validCount: valid,
      invalidCount: results.length - valid,
      successRate: results.length ? valid / results.length : 0,
      totalIssues: sum((r) => r.issues.length),
      totalWarnings: sum((r) => r.warningsCount),
      totalErrors: sum((r) => r.errorsCount),
      totalCritical: sum((r) => r.criticalCount),
      totalProcessingTimeMs,
      averageProcessingTimeMs: results.length ? totalProcessingTimeMs / results.length : 0,
      templatesValidated: results.map((r) => r.templateId),
    };
  }

  private checkSchema(
    data: JsonValue,
    rules: ValidationRules,
    prefix: string,
    options: ValidationOptions,
    issues: ValidationIssue[],
    validatedFields: string[],
  ): void {
    if (Array.isArray(data)) {
      data.forEach((item, i) => this.checkSchema(item, rules, `${prefix}[${i}]`, options, issues, validatedFields));
      return;
    }
    if (!isJsonObject(data)) return;
    for (const [key, value] of Object.entries(data)) {
      const path = prefix ? `${prefix}.${key}` : key;
      validatedFields.push(path);
      const rule = rules[key];
      if (rule) issues.push(...this.checkField(path, value, rule, options));
      if (typeof value === 'object' && value !== null) {
        this.checkSchema(value, rules, path, options, issues, validatedFields);
      }
    }
  }

  private checkField(path: string, value: JsonValue, rule: FieldRule, options: ValidationOptions): ValidationIssue[] {
    const found: ValidationIssue[] = [];
    const required = rule.required === true;

    if (required && (value === null || value === '')) {
      found.push({
        fieldPath: path,
        kind: 'schema',
        severity: 'error',
        message: `Required field '${path}' is missing or empty`,
        actual: value,
      });
    }
    if (value === null && !required) return found;

    if (rule.type) {
      const failure = checkType(rule.type, value);
      if (failure) found.push(toIssue(path, 'format', 'error', failure));
    }
    if (rule.format) {
      const failure = checkFormat(rule.format, value);
      if (failure) found.push(toIssue(path, 'format', 'error', failure));
    }
    for (const failure of checkConstraints(rule, value)) found.push(toIssue(path, 'constraint', 'error', failure));

    return options.maxIssuesPerField > 0 ? found.slice(0, options.maxIssuesPerField) : found;
  }

  private checkBusinessRules(
    data: JsonValue,
    metadata: TemplateMetadata,
    issues: ValidationIssue[],
    applied: string[],
  ): void {
    const context: RuleContext = {
      templateId: metadata.id,
      category: metadata.category,
      apiEndpoint: metadata.apiEndpoint,
      httpMethod: metadata.httpMethod,
      now: zonedNow(this.clock),
    };
    for (const rule of this.rules) {
      try {
        issues.push(...rule.validate(data, context));
        applied.push(rule.name);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ rule: rule.name, err: message }, '[validation] business rule failed');
        issues.push({
          fieldPath: 'business_rule',
          kind: 'business_rule',
          severity: 'warning',
          message: `Business rule '${rule.name}' validation failed: ${message}`,
          ruleName: rule.name,
        });
      }
    }
  }

  private checkConsistency(data: JsonValue, issues: ValidationIssue[]): void {
    const now = zonedNow(this.clock);
    const earliest = now.minus({ years: SANITY_WINDOW_YEARS.past });
    const latest = now.plus({ years: SANITY_WINDOW_YEARS.future });

    const dated = collectFields(data, (key, value) => {
      const k = key.toLowerCase();
      return typeof value === 'string' && (k.includes('time') || k.includes('date')) && DATE_PREFIX.test(value);
    });
    for (const [path, value] of dated) {
      const dt = typeof value === 'string' ? parseDateTime(value) : null;
      if (!dt) continue;
      if (dt.toMillis() < earliest.toMillis()) {
        issues.push({ fieldPath: path, kind: 'data_consistency', severity: 'warning', message: 'Date is unusually far in the past', actual: value });
      } else if (dt.toMillis() > latest.toMillis()) {
        issues.push({ fieldPath: path, kind: 'data_consistency', severity: 'warning', message: 'Date is unusually far in the future', actual: value });
      }
    }

    for (const [path, value] of collectFields(data, (key) => fieldTokens(key).includes('id'))) {
      if (typeof value !== 'string') continue;
      if (value.trim() === '') {
        issues.push({ fieldPath: path, kind: 'data_consistency', severity: 'error', message: 'ID field is empty', actual: value });
      } else if (value.length > MAX_ID_LENGTH) {
        issues.push({
          fieldPath: path,
          kind: 'data_consistency',
          severity: 'warning',
          message: 'ID field is unusually long',
          actual: `Length: ${value.length}`,
        });
      }
    }

    // whole tokens only: `start_time`, `rentalEnd`, never `calendar` or `pending`
    const starts = collectFields(data, (key) => fieldTokens(key).includes('start'));
    const ends = collectFields(data, (key) => fieldTokens(key).includes('end'));
    for (const [startPath, startValue] of starts) {
      for (const [endPath, endValue] of ends) {
        if (startPath === endPath || typeof startValue !== 'string' || typeof endValue !== 'string') continue;
        const start = parseDateTime(startValue);
        const end = parseDateTime(endValue);
        if (!start || !end || start.toMillis() < end.toMillis()) continue;
        issues.push({
          fieldPath: `${startPath}, ${endPath}`,
          kind: 'data_consistency',
          severity: 'error',
          message: 'Start time must be before end time',
          actual: `Start: ${startValue}, End: ${endValue}`,
        });
      }
    }
  }
}
