import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { EntityExtractor } from '../entity-extractor.service.js';

const MAINTENANCE_REQUEST = 'Schedule oil change for vehicle FL-1234 tomorrow at 10am';

describe('EntityExtractor', () => {
  let extractor: EntityExtractor;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-10T10:00:00.000Z'));
    extractor = new EntityExtractor({ timezone: 'UTC' });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('extracts vehicle, date and time from a maintenance request', () => {
    const result = extractor.extract(MAINTENANCE_REQUEST);

    expect(result.entities.map((e) => [e.type, e.value, e.normalizedValue])).toEqual([
      ['VEHICLE_ID', 'FL-1234', 'FL-1234'],
      ['DATE', 'tomorrow', '2024-05-11'],
      ['TIME', '10am', '10:00'],
    ]);

    const [vehicle, date, time] = result.entities;
    expect(vehicle.start).toBe(32);
    expect(vehicle.end).toBe(39);
    expect(vehicle.confidence).toBeCloseTo(0.95, 6);
    expect(vehicle.contextClues).toContain('Context boost: vehicle');
    expect(vehicle.contextClues).toContain('Context boost: maintenance');
    expect(date.confidence).toBeCloseTo(0.85, 6);
    expect(time.confidence).toBeCloseTo(0.9, 6);
    expect(result.entities.every((e) => e.validation.state === 'passed')).toBe(true);
    expect(result.extractionConfidence).toBeCloseTo(2.08 / 2.3, 6);
    expect(result.notes).toContain('Multiple entity types detected: VEHICLE_ID, DATE, TIME');
    expect(result.unrecognized).toEqual([]);
  });

  it('groups entities by type', () => {
    const result = extractor.extract(MAINTENANCE_REQUEST);
    expect(Object.keys(result.groups).sort()).toEqual(['DATE', 'TIME', 'VEHICLE_ID']);
    expect(result.groups.VEHICLE_ID?.[0].value).toBe('FL-1234');
  });

  it('resolves weekday expressions relative to today', () => {
    expect(extractor.extractByType('Book VAN-204 for Friday', 'DATE')[0].normalizedValue).toBe('2024-05-10');
    expect(extractor.extractByType('Book VAN-204 for next Friday', 'DATE')[0].normalizedValue).toBe(
      '2024-05-17',
    );
    expect(extractor.extractByType('Book VAN-204 for next week', 'DATE')[0].normalizedValue).toBe('2024-05-13');
  });

  it('keeps a time range as one entity and drops the hours inside it', () => {
    const times = extractor.extractByType('Reserve a car from 9am to 5pm', 'TIME');

    expect(times).toHaveLength(1);
    expect(times[0].value).toBe('9am to 5pm');
    expect(times[0].normalizedValue).toBe('09:00-17:00');
    expect(times[0].confidence).toBeCloseTo(0.95, 6);
  });

  it('normalizes contact details', () => {
    const result = extractor.extract('Contact Dana.Reyes@Example.com or 555-201-3344');

    expect(result.entities.map((e) => [e.type, e.normalizedValue])).toEqual([
      ['EMAIL', 'dana.reyes@example.com'],
      ['PHONE', '(555) 201-3344'],
    ]);
  });

  it('down-weights entities that fail validation', () => {
    const [id] = extractor.extractByType('vehicle id 12', 'VEHICLE_ID');

    expect(id.value).toBe('12');
    expect(id.validation).toEqual({ state: 'failed', reason: 'format validation: fleet identifier shape' });
    expect(id.confidence).toBeCloseTo(0.665, 6);
  });

  it('reports entity-shaped text no pattern claimed', () => {
    const result = extractor.extract('Ticket #45821 is still open');
    expect(result.entities).toEqual([]);
    expect(result.unrecognized).toEqual(['#45821']);
  });

  it('handles empty input', () => {
    const result = extractor.extract('');

    expect(result.entities).toEqual([]);
    expect(result.extractionConfidence).toBe(0);
    expect(result.notes).toEqual([
      'Short input text - limited extraction possible',
      'No entities extracted - input may not contain fleet-relevant information',
    ]);
  });

  it('ranks and exports entities', () => {
    const result = extractor.extract(MAINTENANCE_REQUEST);

    expect(extractor.bestEntities(result, 2).map((e) => e.type)).toEqual(['VEHICLE_ID', 'TIME']);

    const exported = extractor.toExport(result);
    expect(exported.totalEntities).toBe(3);
    expect(exported.entityCounts).toEqual({ VEHICLE_ID: 1, DATE: 1, TIME: 1 });
    expect(exported.entities[0]).toMatchObject({
      type: 'VEHICLE_ID',
      position: { start: 32, end: 39 },
      validationStatus: 'passed: fleet identifier shape',
      extractionMethod: 'pattern: Fleet ID format (ABC-1234)',
    });
  });
});
