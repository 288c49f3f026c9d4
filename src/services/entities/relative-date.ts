import { DateTime } from 'luxon';

const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

/**
 * Resolves expressions like "tomorrow", "next friday" or "next week" against `now`.
 * A bare weekday means its next occurrence, today included; "next <weekday>" skips today.
 */
export function resolveRelativeDate(expression: string, now: DateTime): DateTime | null {
  const expr = expression.toLowerCase().replace(/\s+/g, ' ').trim();
  const today = now.startOf('day');

  if (expr === 'today') return today;
  if (expr === 'tomorrow') return today.plus({ days: 1 });
  if (expr === 'day after tomorrow') return today.plus({ days: 2 });
  if (expr === 'next week') return today.startOf('week').plus({ weeks: 1 });

  const match = /^(?:(this|next)\s+)?(monday|tuesday|wednesday|thursday|friday|saturday|sunday)$/.exec(expr);
  if (!match) return null;

  const target = WEEKDAYS.indexOf(match[2]) + 1;
  let delta = (target - today.weekday + 7) % 7;
  if (match[1] === 'next' && delta === 0) delta = 7;
  return today.plus({ days: delta });
}

/** "March 5, 2025" / "mar 5" style; a missing year resolves to the next occurrence. */
export function resolveMonthDay(expression: string, now: DateTime): DateTime | null {
  const match = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?(?:\s+(\d{4}))?$/i.exec(expression.trim());
  if (!match) return null;
  const month = MONTHS[match[1].slice(0, 3).toLowerCase()];
  if (!month) return null;
  const day = Number(match[2]);

  if (match[3]) {
    const dt = DateTime.fromObject({ year: Number(match[3]), month, day }, { zone: now.zone });
    return dt.isValid ? dt : null;
  }

  let dt = DateTime.fromObject({ year: now.year, month, day }, { zone: now.zone });
  if (!dt.isValid) return null;
  if (dt < now.startOf('day')) dt = dt.plus({ years: 1 });
  return dt;
}

/** US ordering: month/day/year; two-digit years land in 2000-2099. */
export function resolveNumericDate(expression: string, zone: DateTime['zone']): DateTime | null {
  const slash = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/.exec(expression.trim());
  if (slash) {
    const year = slash[3].length === 2 ? 2000 + Number(slash[3]) : Number(slash[3]);
    const dt = DateTime.fromObject({ year, month: Number(slash[1]), day: Number(slash[2]) }, { zone });
    return dt.isValid ? dt : null;
  }
  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(expression.trim());
  if (iso) {
    const dt = DateTime.fromObject(
      { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) },
      { zone },
    );
    return dt.isValid ? dt : null;
  }
  return null;
}
