import { DateTime } from 'luxon';
import { z } from 'zod';

import type { FieldRule, JsonValue, RuleFormat, RuleType, ValidationIssue } from '@core/interfaces/index.js';

/** A failed check: message plus optional suggestion; path and kind are added by the caller. */
export interface CheckFailure {
  message: string;
  expected?: JsonValue;
  actual?: JsonValue;
  suggestion?: string;
}

export const VIN_PATTERN = /^[A-HJ-NPR-Z0-9]{17}$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([0-1]?[0-9]|2[0-3]):[0-5][0-9]$/;
const URL_PATTERN = /^https?:\/\/[^\s/$.?#].[^\s]*$/i;
const emailSchema = z.string().email();
const uuidSchema = z.string().uuid();

export function jsonTypeOf(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  return typeof value;
}

const isObject = (value: JsonValue): boolean =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const TYPE_CHECKS: Record<RuleType, (value: JsonValue) => boolean> = {
  string: (v) => typeof v === 'string',
  number: (v) => typeof v === 'number',
  integer: (v) => typeof v === 'number' && Number.isInteger(v),
  boolean: (v) => typeof v === 'boolean',
  array: (v) => Array.isArray(v),
  object: isObject,
  null: (v) => v === null,
};

export function checkType(type: RuleType, value: JsonValue): CheckFailure | undefined {
  if (TYPE_CHECKS[type](value)) return undefined;
  const actual = jsonTypeOf(value);
  return { message: `Expected ${type}, got ${actual}`, expected: type, actual };
}

const isIsoDateTime = (value: string) => DateTime.fromISO(value, { setZone: true }).isValid;

/** Formats only apply to strings; other types are the type check's concern. */
const FORMAT_CHECKS: Record<RuleFormat, (value: string) => CheckFailure | undefined> = {
  date: (v) =>
    DATE_PATTERN.test(v) && isIsoDateTime(v)
      ? undefined
      : { message: 'Invalid date format', suggestion: 'Use ISO date format (YYYY-MM-DD)' },
  datetime: (v) =>
    isIsoDateTime(v)
      ? undefined
      : { message: 'Invalid datetime format', suggestion: 'Use ISO datetime format (YYYY-MM-DDTHH:MM:SS)' },
  time: (v) => (TIME_PATTERN.test(v) ? undefined : { message: 'Invalid time format', suggestion: 'Use HH:MM format' }),
  email: (v) => (emailSchema.safeParse(v).success ? undefined : { message: 'Invalid email format' }),
  phone: (v) => {
    const digits = v.replace(/\D/g, '').length;
    return digits >= 10 && digits <= 15 ? undefined : { message: 'Invalid phone number format' };
  },
  uuid: (v) => (uuidSchema.safeParse(v).success ? undefined : { message: 'Invalid UUID format' }),
  url: (v) => (URL_PATTERN.test(v) ? undefined : { message: 'Invalid URL format' }),
  vin: (v) =>
    VIN_PATTERN.test(v)
      ? undefined
      : { message: 'Invalid VIN format', suggestion: 'VIN must be 17 characters, excluding I, O, Q' },
};

export function checkFormat(format: RuleFormat, value: JsonValue): CheckFailure | undefined {
  return typeof value === 'string' ? FORMAT_CHECKS[format](value) : undefined;
}

function lengthOf(value: JsonValue): number | undefined {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (typeof value === 'object' && value !== null) return Object.keys(value).length;
  return undefined;
}

/** minLength, maxLength, min, max, pattern and allowedValues, in that order. */
export function checkConstraints(rule: FieldRule, value: JsonValue): CheckFailure[] {
  const failures: CheckFailure[] = [];
  const length = lengthOf(value);

  if (rule.minLength !== undefined && length !== undefined && length < rule.minLength) {
    failures.push({
      message: `Length ${length} is below minimum ${rule.minLength}`,
      expected: `>= ${rule.minLength}`,
      actual: length,
    });
  }
  if (rule.maxLength !== undefined && length !== undefined && length > rule.maxLength) {
    failures.push({
      message: `Length ${length} exceeds maximum ${rule.maxLength}`,
      expected: `<= ${rule.maxLength}`,
      actual: length,
    });
  }
  if (typeof value === 'number') {
    if (rule.min !== undefined && value < rule.min) {
      failures.push({ message: `Value ${value} is below minimum ${rule.min}`, expected: `>= ${rule.min}`, actual: value });
    }
    if (rule.max !== undefined && value > rule.max) {
      failures.push({ message: `Value ${value} exceeds maximum ${rule.max}`, expected: `<= ${rule.max}`, actual: value });
    }
  }
  if (rule.pattern !== undefined && typeof value === 'string' && !new RegExp(rule.pattern).test(value)) {
    failures.push({ message: `Value does not match pattern ${rule.pattern}`, expected: rule.pattern, actual: value });
  }
  if (rule.allowedValues !== undefined && !isObject(value) && !Array.isArray(value)) {
    const allowed = rule.allowedValues;
    if (!allowed.some((candidate) => candidate === value)) {
      failures.push({
        message: `Value is not one of the allowed values`,
        expected: [...allowed],
        actual: value,
        suggestion: `Use one of: ${allowed.map(String).join(', ')}`,
      });
    }
  }
  return failures;
}

export function toIssue(
  fieldPath: string,
  kind: ValidationIssue['kind'],
  severity: ValidationIssue['severity'],
  failure: CheckFailure,
  ruleName?: string,
): ValidationIssue {
  return { fieldPath, kind, severity, ...failure, ...(ruleName ? { ruleName } : {}) };
}
