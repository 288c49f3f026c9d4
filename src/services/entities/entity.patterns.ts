import type { EntityType } from '@core/interfaces/index.js';

export interface EntityPattern {
  readonly type: EntityType;
  readonly re: RegExp;
  readonly confidence: number;
  /** Capture group holding the value; 0 means the whole match. */
  readonly group?: number;
  readonly description: string;
}

export interface ContextPattern {
  readonly name: string;
  readonly re: RegExp;
  readonly boosts: readonly EntityType[];
  readonly boost: number;
}

const LOCATION_SUFFIXES =
  'Office|Depot|Campus|Center|Centre|Garage|Yard|Terminal|Warehouse|Headquarters|HQ|Station|Facility|Site|Plant|Hub';
const WEEKDAY_NAMES = 'Monday|Tuesday|Wednesday|Thursday|Friday|Saturday|Sunday';
const MONTH_NAMES =
  'January|February|March|April|May|June|July|August|September|October|November|December';
const NAME_STOPWORDS = `${LOCATION_SUFFIXES}|${WEEKDAY_NAMES}|${MONTH_NAMES}|Building|Lot|Spot|Floor|Level|Vehicle|Truck|Van|Car`;
const NAME_WORD = `(?!(?:${NAME_STOPWORDS})\\b)[A-Z][a-z]+`;

const TIME_PIECE = '\\d{1,2}(?::\\d{2}(?:\\s*(?:am|pm))?|\\s*(?:am|pm))';

/** Case-sensitive patterns are deliberate: identifiers are written in capitals. */
export const ENTITY_PATTERNS: readonly EntityPattern[] = [
  {
    type: 'VIN',
    re: /\bVIN\s*:?\s*([A-HJ-NPR-Z0-9]{17})\b/gi,
    confidence: 0.95,
    group: 1,
    description: 'VIN with label',
  },
  {
    type: 'VIN',
    re: /\b(?=[A-HJ-NPR-Z0-9]*[A-HJ-NPR-Z])[A-HJ-NPR-Z0-9]{17}\b/g,
    confidence: 0.9,
    description: 'Standard 17-character VIN',
  },
  {
    type: 'VEHICLE_ID',
    re: /\b[A-Z]{2,4}-\d{3,5}\b/g,
    confidence: 0.8,
    description: 'Fleet ID format (ABC-1234)',
  },
  {
    type: 'VEHICLE_ID',
    re: /\b(?:vehicle|car|truck|van)\s+(?:id|#|number|no\.?)\s*:?\s*([a-z0-9-]*\d[a-z0-9-]*)\b/gi,
    confidence: 0.85,
    group: 1,
    description: 'Vehicle ID with label',
  },
  {
    type: 'VEHICLE_ID',
    re: /\b[Uu]nit\s+#?((?=[A-Z0-9-]*\d)[A-Z0-9-]{3,8})\b/g,
    confidence: 0.7,
    group: 1,
    description: 'Unit number format',
  },
  {
    type: 'LICENSE_PLATE',
    re: /\b(?:[Ll]icense\s+)?[Pp]late(?:\s+(?:number|no\.?|#))?\s*:?\s*((?=[A-Z0-9 -]*\d)[A-Z0-9]{1,4}(?:[ -][A-Z0-9]{1,4})?)\b/g,
    confidence: 0.85,
    group: 1,
    description: 'License plate with label',
  },
  {
    type: 'LICENSE_PLATE',
    re: /\b[A-Z]{2,3}\s?\d{2,4}[A-Z]?\b/g,
    confidence: 0.7,
    description: 'Standard license plate format',
  },
  {
    type: 'LICENSE_PLATE',
    re: /\b\d{3}\s?[A-Z]{3}\b/g,
    confidence: 0.75,
    description: 'Numeric-alpha plate format',
  },
  {
    type: 'EMAIL',
    re: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
    confidence: 0.95,
    description: 'Standard email format',
  },
  {
    type: 'PHONE',
    re: /\b\d{3}-\d{3}-\d{4}\b/g,
    confidence: 0.9,
    description: 'Formatted phone number',
  },
  {
    type: 'PHONE',
    re: /(?<![\d-])\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}(?![\d-])/g,
    confidence: 0.8,
    description: 'US phone number format',
  },
  {
    type: 'BUILDING',
    re: /\b[Bb]uilding\s+([A-Z0-9]{1,4})\b/g,
    confidence: 0.85,
    group: 1,
    description: 'Building with identifier',
  },
  {
    type: 'BUILDING',
    re: /\b([A-Z])\s+[Bb]uilding\b/g,
    confidence: 0.8,
    group: 1,
    description: 'Building with prefix identifier',
  },
  {
    type: 'PARKING_SPOT',
    re: /\b(?:[Ss]pot|[Ss]pace)\s+#?([A-Z]?\d+[A-Z]?)\b/g,
    confidence: 0.85,
    group: 1,
    description: 'Parking spot identifier',
  },
  {
    type: 'PARKING_SPOT',
    re: /\b(?:[Ll]ot|[Pp]arking)\s+(\d+|[A-Z]\d*)\b/g,
    confidence: 0.8,
    group: 1,
    description: 'Parking lot number',
  },
  {
    type: 'PARKING_SPOT',
    re: /\b(?:[Ff]loor|[Ll]evel)\s+(\d+)\b/g,
    confidence: 0.7,
    group: 1,
    description: 'Floor number',
  },
  {
    type: 'LOCATION',
    re: /\b(?:location|address|site)\s*:\s*([^,;\n]{2,60}?)\s*(?=[,;\n]|$)/gi,
    confidence: 0.85,
    group: 1,
    description: 'Location with label',
  },
  {
    type: 'LOCATION',
    re: new RegExp(`\\b((?:[A-Z][a-z]+\\s+){1,3}(?:${LOCATION_SUFFIXES}))\\b`, 'g'),
    confidence: 0.8,
    group: 1,
    description: 'Named site (Main Office, North Depot)',
  },
  {
    type: 'PERSON_NAME',
    re: /\b(?:name|driver|contact)\s*:\s*([A-Z][a-z]+(?:\s+[A-Z][a-z]+){0,2})\b/gi,
    confidence: 0.85,
    group: 1,
    description: 'Person name with label',
  },
  {
    type: 'PERSON_NAME',
    re: new RegExp(
      `\\b(?:for|to|by|with|driver|contact|assignee)\\s+(?:(?:Mr|Ms|Mrs|Dr)\\.?\\s+)?(${NAME_WORD}(?:\\s+${NAME_WORD}){1,2})\\b`,
      'g',
    ),
    confidence: 0.75,
    group: 1,
    description: 'Capitalized name after a preposition',
  },
  {
    type: 'DEPARTMENT',
    re: /\b(IT|HR|Finance|Operations|Marketing|Sales|Legal|Maintenance|Security|Logistics)\b/g,
    confidence: 0.8,
    description: 'Common department names',
  },
  {
    type: 'ROLE',
    re: /\b(manager|director|supervisor|technician|driver|operator|admin|analyst)\b/gi,
    confidence: 0.7,
    description: 'Common job roles',
  },
  {
    type: 'DATE',
    re: /\b\d{4}-\d{1,2}-\d{1,2}\b/g,
    confidence: 0.9,
    description: 'ISO date format YYYY-MM-DD',
  },
  {
    type: 'DATE',
    re: /\b\d{1,2}\/\d{1,2}\/(?:\d{4}|\d{2})\b/g,
    confidence: 0.8,
    description: 'MM/DD/YYYY or MM/DD/YY format',
  },
  {
    type: 'DATE',
    re: new RegExp(`\\b(?:${MONTH_NAMES})\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}\\b`, 'gi'),
    confidence: 0.85,
    description: 'Month DD, YYYY format',
  },
  {
    type: 'DATE',
    re: new RegExp(`\\b(?:${MONTH_NAMES})\\s+\\d{1,2}(?:st|nd|rd|th)?\\b`, 'gi'),
    confidence: 0.7,
    description: 'Month DD without year',
  },
  {
    type: 'DATE',
    re: new RegExp(
      `\\b(?:today|day after tomorrow|tomorrow|next\\s+week|(?:(?:this|next)\\s+)?(?:${WEEKDAY_NAMES}))\\b`,
      'gi',
    ),
    confidence: 0.7,
    description: 'Relative date expression',
  },
  {
    type: 'TIME',
    re: new RegExp(`\\b${TIME_PIECE}\\s*(?:-|to|until|till)\\s*${TIME_PIECE}\\b`, 'gi'),
    confidence: 0.85,
    description: 'Time range HH:MM-HH:MM',
  },
  {
    type: 'TIME',
    re: /\b\d{1,2}:\d{2}(?:\s*(?:am|pm))?\b/gi,
    confidence: 0.8,
    description: 'HH:MM format with optional am/pm',
  },
  {
    type: 'TIME',
    re: /\b\d{1,2}\s*(?:am|pm)\b/gi,
    confidence: 0.75,
    description: 'Hour with am/pm',
  },
  {
    type: 'TIME',
    re: /\b(?:noon|midnight)\b/gi,
    confidence: 0.7,
    description: 'Named time of day',
  },
  {
    type: 'DURATION',
    re: /\b\d+(?:\.\d+)?\s*(?:minutes?|mins?|hours?|hrs?|days?|weeks?)\b/gi,
    confidence: 0.75,
    description: 'Quantity with time unit',
  },
];

export const CONTEXT_PATTERNS: readonly ContextPattern[] = [
  {
    name: 'vehicle',
    re: /\b(?:vehicle|car|truck|van|automobile)\b/i,
    boosts: ['VEHICLE_ID', 'VIN', 'LICENSE_PLATE'],
    boost: 0.1,
  },
  {
    name: 'scheduling',
    re: /\b(?:schedule|appointment|meeting|reservation|reserve|book|time|date)\b/i,
    boosts: ['DATE', 'TIME', 'DURATION'],
    boost: 0.1,
  },
  {
    name: 'location',
    re: /\b(?:location|address|building|parking|lot|space|floor|level|site)\b/i,
    boosts: ['LOCATION', 'BUILDING', 'PARKING_SPOT'],
    boost: 0.1,
  },
  {
    name: 'person',
    re: /\b(?:from|to|contact|person|name|driver|manager|client|customer|email|call|phone)\b/i,
    boosts: ['PERSON_NAME', 'EMAIL', 'PHONE'],
    boost: 0.1,
  },
  {
    name: 'maintenance',
    re: /\b(?:maintenance|service|repair|inspection|oil|brake|tire)\b/i,
    boosts: ['VEHICLE_ID', 'VIN', 'DATE', 'TIME'],
    boost: 0.05,
  },
  {
    name: 'organization',
    re: /\b(?:department|dept|team|role|position|staff)\b/i,
    boosts: ['DEPARTMENT', 'ROLE'],
    boost: 0.1,
  },
];

/** Identifier-like types weigh more in the aggregate confidence. */
export const ENTITY_IMPORTANCE = {
  VIN: 1.0,
  VEHICLE_ID: 0.9,
  LICENSE_PLATE: 0.8,
  EMAIL: 0.8,
  DATE: 0.7,
  TIME: 0.7,
  PERSON_NAME: 0.6,
  LOCATION: 0.6,
  DURATION: 0.5,
  PHONE: 0.5,
  BUILDING: 0.4,
  PARKING_SPOT: 0.4,
  DEPARTMENT: 0.3,
  ROLE: 0.3,
} as const satisfies Record<EntityType, number>;

/** Entity-shaped strings worth surfacing when no pattern claimed them. */
export const UNRECOGNIZED_PATTERNS: readonly RegExp[] = [
  /\b[A-Z]{3,6}\d{2,6}\b/g,
  /\b\d{3,6}-\d{3,6}\b/g,
  /\b[A-Z]+\s+\d+[A-Z]?\b/g,
  /(?<!\w)#\d{3,8}\b/g,
];
