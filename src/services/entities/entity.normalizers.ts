import { DateTime, Duration } from 'luxon';

import type { EntityType, EntityValidation } from '@core/interfaces/index.js';

import { resolveMonthDay, resolveNumericDate, resolveRelativeDate } from './relative-date.js';

export interface NormalizeContext {
  now: DateTime;
}

type Normalizer = (value: string, ctx: NormalizeContext) => string;
type Validator = (normalized: string) => EntityValidation;

const pad2 = (n: number) => String(n).padStart(2, '0');

const passed = (reason: string): EntityValidation => ({ state: 'passed', reason });
const failed = (reason: string): EntityValidation => ({ state: 'failed', reason });

const byPattern =
  (re: RegExp, description: string): Validator =>
  (normalized) =>
    re.test(normalized) ? passed(description) : failed(`format validation: ${description}`);

const noFormatRule: Validator = () => passed('no format rule');

/** "10am" -> "10:00", "5:30 pm" -> "17:30"; out-of-range hours are kept so validation can reject them. */
export function toClock(piece: string): string {
  const named = piece.trim().toLowerCase();
  if (named === 'noon') return '12:00';
  if (named === 'midnight') return '00:00';

  const m = /^(\d{1,2})(?::(\d{2}))?\s*(am|pm)?$/i.exec(piece.trim());
  if (!m) return piece.trim();
  let hour = Number(m[1]);
  const minute = m[2] === undefined ? 0 : Number(m[2]);
  const suffix = m[3] === undefined ? '' : m[3].toLowerCase();
  if (suffix) {
    if (hour < 1 || hour > 12) return piece.trim();
    hour = (hour % 12) + (suffix === 'pm' ? 12 : 0);
  }
  return `${pad2(hour)}:${pad2(minute)}`;
}

function normalizeTime(value: string): string {
  const parts = value.split(/\s*(?:-|\bto\b|\buntil\b|\btill\b)\s*/i).filter(Boolean);
  if (parts.length === 2) return `${toClock(parts[0])}-${toClock(parts[1])}`;
  return toClock(value);
}

function normalizeDate(value: string, ctx: NormalizeContext): string {
  const dt =
    resolveNumericDate(value, ctx.now.zone) ??
    resolveRelativeDate(value, ctx.now) ??
    resolveMonthDay(value, ctx.now);
  return dt ? dt.toFormat('yyyy-LL-dd') : value;
}

const DURATION_UNITS: Record<string, 'minutes' | 'hours' | 'days' | 'weeks'> = {
  min: 'minutes',
  mins: 'minutes',
  minute: 'minutes',
  minutes: 'minutes',
  hr: 'hours',
  hrs: 'hours',
  hour: 'hours',
  hours: 'hours',
  day: 'days',
  days: 'days',
  week: 'weeks',
  weeks: 'weeks',
};

function durationOf(unit: 'minutes' | 'hours' | 'days' | 'weeks', amount: number): Duration {
  switch (unit) {
    case 'minutes':
      return Duration.fromObject({ minutes: amount });
    case 'hours':
      return Duration.fromObject({ hours: amount });
    case 'days':
      return Duration.fromObject({ days: amount });
    case 'weeks':
      return Duration.fromObject({ weeks: amount });
  }
}

function normalizeDuration(value: string): string {
  const m = /^(\d+(?:\.\d+)?)\s*([a-z]+)$/i.exec(value.trim());
  if (!m) return value;
  const unit = DURATION_UNITS[m[2].toLowerCase()];
  if (!unit) return value;
  return durationOf(unit, Number(m[1])).toISO() ?? value;
}

function normalizePhone(value: string): string {
  let digits = value.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('1')) digits = digits.slice(1);
  if (digits.length !== 10) return value;
  return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
}

const titleCase = (value: string) =>
  value
    .toLowerCase()
    .split(/\s+/)
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1) : w))
    .join(' ');

const collapse = (value: string) => value.replace(/\s+/g, ' ').trim();

export const NORMALIZERS: Record<EntityType, Normalizer> = {
  VIN: (v) => v.toUpperCase().replace(/\s+/g, ''),
  VEHICLE_ID: (v) => v.toUpperCase(),
  LICENSE_PLATE: (v) => collapse(v.toUpperCase()),
  PERSON_NAME: (v) => titleCase(collapse(v)),
  LOCATION: collapse,
  BUILDING: (v) => v.toUpperCase(),
  PARKING_SPOT: (v) => v.toUpperCase(),
  DATE: normalizeDate,
  TIME: normalizeTime,
  DURATION: normalizeDuration,
  EMAIL: (v) => v.trim().toLowerCase(),
  PHONE: normalizePhone,
  DEPARTMENT: collapse,
  ROLE: (v) => v.toLowerCase(),
};

const CLOCK = '(?:[01]\\d|2[0-3]):[0-5]\\d';

export const VALIDATORS: Record<EntityType, Validator> = {
  VIN: byPattern(/^[A-HJ-NPR-Z0-9]{17}$/, '17-character VIN without I, O, Q'),
  VEHICLE_ID: (v) =>
    /^[A-Z0-9-]{3,15}$/.test(v) && /\d/.test(v)
      ? passed('fleet identifier shape')
      : failed('format validation: fleet identifier shape'),
  LICENSE_PLATE: byPattern(/^(?=.*\d)[A-Z0-9][A-Z0-9 -]{1,9}$/, 'plate characters'),
  PERSON_NAME: byPattern(/^[A-Z][a-z]+(?: [A-Z][a-z]+)*$/, 'capitalized name'),
  LOCATION: (v) =>
    v.length >= 2 && v.length <= 100 ? passed('location length') : failed('location length'),
  BUILDING: noFormatRule,
  PARKING_SPOT: noFormatRule,
  DATE: (v) =>
    /^\d{4}-\d{2}-\d{2}$/.test(v) && DateTime.fromISO(v).isValid
      ? passed('calendar date')
      : failed('format validation: calendar date'),
  TIME: byPattern(new RegExp(`^${CLOCK}(?:-${CLOCK})?$`), 'clock time'),
  DURATION: (v) =>
    Duration.fromISO(v).isValid && Duration.fromISO(v).toMillis() > 0
      ? passed('ISO-8601 duration')
      : failed('format validation: ISO-8601 duration'),
  EMAIL: byPattern(/^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/, 'Valid email format'),
  PHONE: byPattern(/^\(\d{3}\) \d{3}-\d{4}$/, 'Valid US phone number format'),
  DEPARTMENT: noFormatRule,
  ROLE: noFormatRule,
};
