import type { JsonValue, ValidationIssue } from '@core/interfaces/index.js';

interface Finding {
  pattern: RegExp;
  message: string;
}

const SENSITIVE: readonly Finding[] = [
  { pattern: /password/, message: 'Potential password field detected' },
  { pattern: /secret/, message: 'Potential secret field detected' },
  { pattern: /token/, message: 'Potential token field detected' },
  { pattern: /key.*\s*:\s*["'][^"']{20,}["']/, message: 'Potential API key detected' },
  { pattern: /ssn|social.*security/, message: 'Potential SSN detected' },
  { pattern: /credit.*card|cc.*number/, message: 'Potential credit card information detected' },
];

const INJECTION: readonly Finding[] = [
  { pattern: /<script/, message: 'Potential script injection' },
  { pattern: /javascript:/, message: 'Potential JavaScript injection' },
  { pattern: /on\w+\s*=/, message: 'Potential event handler injection' },
  { pattern: /union.*select/, message: 'Potential SQL injection' },
  { pattern: /drop.*table/, message: 'Potential SQL injection' },
];

/** Scans the serialized payload, keys and values alike, lower-cased. */
export function scanPayload(data: JsonValue): ValidationIssue[] {
  const text = JSON.stringify(data).toLowerCase();
  const issues: ValidationIssue[] = [];
  for (const { pattern, message } of SENSITIVE) {
    if (pattern.test(text)) {
      issues.push({
        fieldPath: 'security',
        kind: 'security',
        severity: 'warning',
        message,
        suggestion: 'Ensure sensitive data is properly handled',
      });
    }
  }
  for (const { pattern, message } of INJECTION) {
    if (pattern.test(text)) {
      issues.push({ fieldPath: 'security', kind: 'security', severity: 'error', message, suggestion: 'Sanitize input data' });
    }
  }
  return issues;
}
