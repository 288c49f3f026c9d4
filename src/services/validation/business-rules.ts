import type { DateTime } from 'luxon';

import type {
  HttpMethod,
  JsonObject,
  JsonValue,
  Severity,
  ValidationIssue,
} from '@core/interfaces/index.js';
import { parseDateTime } from '@utils/time.js';

export interface RuleContext {
  templateId: string;
  category: string;
  apiEndpoint?: string;
  httpMethod: HttpMethod;
  now: DateTime;
}

export interface BusinessRule {
  readonly name: string;
  readonly description: string;
  readonly severity: Severity;
  validate(data: JsonValue, context: RuleContext): ValidationIssue[];
}

export const isJsonObject = (value: JsonValue | undefined): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Every `[path, value]` pair under `data` whose key satisfies `match`, depth first. */
export function collectFields(
  data: JsonValue,
  match: (key: string, value: JsonValue) => boolean,
  prefix = '',
  into: [string, JsonValue][] = [],
): [string, JsonValue][] {
  if (Array.isArray(data)) {
    data.forEach((item, i) => collectFields(item, match, `${prefix}[${i}]`, into));
  } else if (isJsonObject(data)) {
    for (const [key, value] of Object.entries(data)) {
      const path = prefix ? `${prefix}.${key}` : key;
      if (match(key, value)) into.push([path, value]);
      collectFields(value, match, path, into);
    }
  }
  return into;
}

const stringAt = (obj: JsonObject, key: string): string | undefined => {
  const value = obj[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
};

abstract class Rule implements BusinessRule {
  constructor(
    readonly name: string,
    readonly description: string,
    readonly severity: Severity,
  ) {}

  abstract validate(data: JsonValue, context: RuleContext): ValidationIssue[];

  protected issue(fieldPath: string, message: string, severity: Severity = this.severity): ValidationIssue {
    return { fieldPath, kind: 'business_rule', severity, message, ruleName: this.name };
  }
}

const VEHICLE_ID_KEYS = new Set(['vehicle_id', 'vehicleId', 'unit_id', 'asset_id']);
const VEHICLE_ID_SHAPE = /^[A-Z0-9-]{3,15}$/;

export class VehicleIdRule extends Rule {
  constructor() {
    super('vehicle_id_validation', 'Validates vehicle ID format', 'error');
  }

  validate(data: JsonValue): ValidationIssue[] {
    const [found] = collectFields(data, (key, value) => VEHICLE_ID_KEYS.has(key) && typeof value === 'string' && value !== '');
    if (!found) return [];
    const [path, value] = found;
    if (typeof value === 'string' && VEHICLE_ID_SHAPE.test(value)) return [];
    return [this.issue(path, 'Vehicle ID must be 3-15 characters, alphanumeric with hyphens')];
  }
}

const RESERVATION_HORIZON_DAYS = 365;
const RESERVATION_WINDOWS: readonly [string, string][] = [
  ['start_datetime', 'end_datetime'],
  ['start_time', 'end_time'],
];

export class ReservationWindowRule extends Rule {
  constructor() {
    super('datetime_consistency', 'Validates reservation start and end ordering', 'error');
  }

  validate(data: JsonValue, context: RuleContext): ValidationIssue[] {
    if (!isJsonObject(data)) return [];
    const reservation = data.reservation_details;
    if (!isJsonObject(reservation)) return [];

    const issues: ValidationIssue[] = [];
    for (const [startKey, endKey] of RESERVATION_WINDOWS) {
      const startRaw = stringAt(reservation, startKey);
      const endRaw = stringAt(reservation, endKey);
      if (!startRaw || !endRaw) continue;
      const start = parseDateTime(startRaw);
      const end = parseDateTime(endRaw);
      if (!start || !end) continue;

      const path = `reservation_details.${startKey}`;
      if (start.toMillis() >= end.toMillis()) {
        issues.push(this.issue(path, 'Reservation start time must be before end time'));
      }
      if (start.toMillis() > context.now.plus({ days: RESERVATION_HORIZON_DAYS }).toMillis()) {
        issues.push(this.issue(path, 'Reservation is more than 1 year in the future', 'warning'));
      }
    }
    return issues;
  }
}

const BUSINESS_HOURS = { open: 7, close: 18 } as const;

export class MaintenanceWindowRule extends Rule {
  constructor() {
    super('maintenance_scheduling', 'Validates maintenance scheduling constraints', 'warning');
  }

  validate(data: JsonValue, context: RuleContext): ValidationIssue[] {
    if (context.category !== 'maintenance' || !isJsonObject(data)) return [];
    const scheduling = data.scheduling;
    if (!isJsonObject(scheduling)) return [];
    const date = stringAt(scheduling, 'requested_date');
    const time = stringAt(scheduling, 'requested_time');
    if (!date || !time) return [];
    const scheduled = parseDateTime(`${date}T${time}`);
    if (!scheduled) return [];

    const issues: ValidationIssue[] = [];
    if (scheduled.hour < BUSINESS_HOURS.open || scheduled.hour > BUSINESS_HOURS.close) {
      issues.push(this.issue('scheduling.requested_time', 'Maintenance scheduled outside business hours (7 AM - 6 PM)'));
    }
    // luxon weekdays: 6 = Saturday, 7 = Sunday
    if (scheduled.weekday >= 6) {
      issues.push(this.issue('scheduling.requested_date', 'Maintenance scheduled on weekend'));
    }
    return issues;
  }
}

const LOCATION_KEY = /location|address|destination|site/i;
const LOCATION_LENGTH = { min: 2, max: 100 } as const;

export class LocationRule extends Rule {
  constructor() {
    super('location_validation', 'Validates location information', 'warning');
  }

  validate(data: JsonValue): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const [path, value] of collectFields(data, (key) => LOCATION_KEY.test(key))) {
      if (typeof value !== 'string') continue;
      if (value.length < LOCATION_LENGTH.min) issues.push(this.issue(path, 'Location name is too short'));
      else if (value.length > LOCATION_LENGTH.max) issues.push(this.issue(path, 'Location name is unusually long'));
    }
    return issues;
  }
}

/** Placeholder for checks that need a system outside this process; reports nothing. */
export class AdvisoryRule extends Rule {
  validate(): ValidationIssue[] {
    return [];
  }
}

export function defaultBusinessRules(): BusinessRule[] {
  return [
    new VehicleIdRule(),
    new ReservationWindowRule(),
    new MaintenanceWindowRule(),
    new AdvisoryRule('reservation_conflict', 'Validates reservation conflicts', 'warning'),
    new AdvisoryRule('parking_availability', 'Validates parking space availability', 'warning'),
    new AdvisoryRule('user_authorization', 'Validates user authorization for operations', 'warning'),
    new AdvisoryRule('resource_constraint', 'Validates resource availability constraints', 'warning'),
    new LocationRule(),
  ];
}
