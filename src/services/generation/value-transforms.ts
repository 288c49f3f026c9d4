import { DateTime } from 'luxon';

import { fieldTokens } from '@services/templates/field-aliases.js';

export type ValueTransform = 'normalize_email' | 'format_phone' | 'format_date' | 'format_time' | 'uppercase' | 'none';

const DATE_FORMATS = [
  'yyyy-MM-dd',
  'M/d/yyyy',
  'd/M/yyyy',
  'yyyy/M/d',
  'M-d-yyyy',
  'd-M-yyyy',
  'MMMM d, yyyy',
  'd MMMM yyyy',
];

export function formatDate(value: string): string {
  const trimmed = value.trim();
  for (const fmt of DATE_FORMATS) {
    const dt = DateTime.fromFormat(trimmed, fmt, { locale: 'en-US' });
    if (dt.isValid) return dt.toFormat('yyyy-LL-dd');
  }
  return value;
}

export function formatTime(value: string): string {
  const cleaned = value.replace(/[^\d:]/g, '');
  const pad = (n: number) => String(n).padStart(2, '0');
  if (cleaned.includes(':')) {
    const [h, m] = cleaned.split(':');
    const hour = Number(h);
    const minute = Number(m);
    if (h === '' || m === undefined || m === '' || !Number.isFinite(hour) || !Number.isFinite(minute)) {
      return value;
    }
    return `${pad(hour % 24)}:${pad(minute % 60)}`;
  }
  if (/^\d+$/.test(cleaned)) return `${pad(Number(cleaned) % 24)}:00`;
  return value;
}

export function formatPhone(value: string): string {
  const digits = value.replace(/\D/g, '');
  if (digits.length === 10) return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
  if (digits.length === 11 && digits.startsWith('1')) {
    return `1-(${digits.slice(1, 4)}) ${digits.slice(4, 7)}-${digits.slice(7)}`;
  }
  return value;
}

/** Picks the transform from the field name alone. */
export function transformFor(field: string): ValueTransform {
  const tokens = fieldTokens(field);
  const has = (t: string) => tokens.includes(t);
  if (has('email')) return 'normalize_email';
  if (has('phone') || has('telephone')) return 'format_phone';
  if (has('date')) return 'format_date';
  if (has('time') && !has('timestamp')) return 'format_time';
  if (has('vin') || has('license') || has('plate')) return 'uppercase';
  return 'none';
}

export function applyTransform(transform: ValueTransform, value: string): string {
  switch (transform) {
    case 'normalize_email':
      return value.trim().toLowerCase();
    case 'format_phone':
      return formatPhone(value);
    case 'format_date':
      return formatDate(value);
    case 'format_time':
      return formatTime(value);
    case 'uppercase':
      return value.toUpperCase();
    case 'none':
      return value;
  }
}
