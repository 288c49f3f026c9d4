import { DateTime } from 'luxon';

import { config } from '@config/env.config.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function zonedNow(clock: Clock = systemClock, tz: string = config.TIMEZONE): DateTime {
  return DateTime.fromJSDate(clock()).setZone(tz);
}

/** Accepts ISO dates and datetimes, plus "yyyy-MM-dd HH:mm[:ss]". Naive values are read in `tz`. */
export function parseDateTime(value: string, tz: string = config.TIMEZONE): DateTime | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  const iso = DateTime.fromISO(trimmed, { zone: tz, setZone: true });
  if (iso.isValid) return iso;
  for (const fmt of ['yyyy-MM-dd HH:mm:ss', 'yyyy-MM-dd HH:mm']) {
    const dt = DateTime.fromFormat(trimmed, fmt, { zone: tz });
    if (dt.isValid) return dt;
  }
  return null;
}

export function toIsoSeconds(dt: DateTime): string {
  return dt.toISO({ suppressMilliseconds: true }) ?? dt.toFormat("yyyy-LL-dd'T'HH:mm:ss");
}
