import { ENTITY_TYPES, type EntityType } from '@core/interfaces/index.js';

/** Template field names each entity type can fill. */
export const ENTITY_FIELD_ALIASES = {
  VEHICLE_ID: ['vehicle_id', 'unit_id', 'asset_id', 'fleet_id'],
  VIN: ['vin', 'vehicle_vin', 'vin_number', 'vehicle_identification'],
  LICENSE_PLATE: ['license_plate', 'plate', 'plate_number', 'registration'],
  PERSON_NAME: [
    'user',
    'user_name',
    'driver',
    'driver_name',
    'contact_name',
    'requester',
    'requested_by',
    'assigned_to',
    'technician',
    'person',
  ],
  LOCATION: ['location', 'address', 'site', 'destination', 'pickup_location', 'from_location', 'to_location'],
  BUILDING: ['building', 'building_id'],
  PARKING_SPOT: ['parking_spot', 'spot', 'space', 'parking_space', 'bay'],
  DATE: ['date', 'requested_date', 'scheduled_date', 'start_date', 'end_date', 'service_date'],
  TIME: ['time', 'requested_time', 'scheduled_time', 'start_time', 'end_time'],
  DURATION: ['duration', 'estimated_duration'],
  EMAIL: ['email', 'contact_email', 'user_email'],
  PHONE: ['phone', 'contact_phone', 'phone_number', 'telephone'],
  DEPARTMENT: ['department', 'dept', 'cost_center', 'division'],
  ROLE: ['role', 'position', 'user_role', 'title'],
} as const satisfies Record<EntityType, readonly string[]>;

export interface FieldMatch {
  type: EntityType;
  exact: boolean;
  /** Number of shared name tokens. */
  overlap: number;
}

/** Last segment of a dotted placeholder name, lower-cased. */
export const leafName = (field: string): string => (field.split('.').pop() ?? field).toLowerCase();

/** "startDateTime" and "start_datetime" both give [start, date, time]. */
export function fieldTokens(field: string): string[] {
  const leaf = field.split('.').pop() ?? field;
  return leaf
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .split(/[_\-\s]+/)
    .flatMap((t) => (t === 'datetime' ? ['date', 'time'] : [t]))
    .filter(Boolean);
}

const ALIAS_TOKENS = new Map<string, string[]>(
  Object.values(ENTITY_FIELD_ALIASES)
    .flat()
    .map((alias): [string, string[]] => [alias, fieldTokens(alias)]),
);

const isSubset = (small: readonly string[], big: readonly string[]) => small.every((t) => big.includes(t));

/**
 * Entity types that can fill `field`: exact alias hits first, then aliases
 * whose name tokens contain (or are contained in) the field's tokens, by
 * overlap. Ties keep ENTITY_TYPES order.
 */
export function typesForField(field: string, available?: ReadonlySet<EntityType>): FieldMatch[] {
  const name = leafName(field);
  const tokens = fieldTokens(field);
  const matches: FieldMatch[] = [];
  if (tokens.length === 0) return matches;
  for (const type of ENTITY_TYPES) {
    if (available && !available.has(type)) continue;
    const aliases: readonly string[] = ENTITY_FIELD_ALIASES[type];
    if (aliases.includes(name)) {
      matches.push({ type, exact: true, overlap: tokens.length });
      continue;
    }
    let overlap = 0;
    for (const alias of aliases) {
      const aliasTokens = ALIAS_TOKENS.get(alias) ?? [];
      if (isSubset(aliasTokens, tokens) || isSubset(tokens, aliasTokens)) {
        overlap = Math.max(overlap, Math.min(aliasTokens.length, tokens.length));
      }
    }
    if (overlap > 0) matches.push({ type, exact: false, overlap });
  }
  return matches.sort((a, b) => Number(b.exact) - Number(a.exact) || b.overlap - a.overlap);
}
