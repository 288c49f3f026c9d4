import { beforeEach, describe, expect, it } from 'vitest';

import { ConfidenceCalculator } from '@services/confidence/confidence-calculator.service.js';
import { EntityExtractor } from '@services/entities/entity-extractor.service.js';
import { createCounterSequence, JSONGenerator } from '@services/generation/json-generator.service.js';
import { TemplateRegistry } from '@services/templates/template-registry.js';
import { InMemoryUsageStatsStore } from '@services/templates/usage-stats.store.js';
import { TemplateValidator } from '@services/validation/template-validator.service.js';

import { decide, RequestPipeline } from '../request-pipeline.service.js';

const clock = () => new Date('2024-05-10T10:00:00.000Z');
const MAINTENANCE_REQUEST = 'Schedule oil change for vehicle FL-1234 tomorrow at 10am';
const SCHEDULE_ID = 'maintenance.schedule_maintenance.1.0';
const CANCEL_MAINTENANCE_ID = 'maintenance.cancel_maintenance.1.0';

function pipelineOver(catalog: TemplateRegistry): RequestPipeline {
  return new RequestPipeline({
    catalog,
    extractor: new EntityExtractor({ clock, timezone: 'UTC' }),
    calculator: new ConfidenceCalculator({ clock, timezone: 'UTC' }),
    generator: new JSONGenerator({ clock, sequence: createCounterSequence() }),
    validator: new TemplateValidator({ clock }),
  });
}

describe('RequestPipeline', () => {
  let registry: TemplateRegistry;
  let pipeline: RequestPipeline;

  beforeEach(async () => {
    registry = await TemplateRegistry.load('templates', { store: new InMemoryUsageStatsStore(), clock });
    pipeline = pipelineOver(registry);
  });

  it('turns a maintenance request into a validated appointment', async () => {
    const result = await pipeline.process(MAINTENANCE_REQUEST);

    expect(result.classification.primaryIntent.intent).toBe('SCHEDULE_MAINTENANCE');
    expect(result.confidence.level).toBe('very_high');
    expect(result.selection.primaryTemplate?.templateId).toBe(SCHEDULE_ID);
    expect(result.operations).toHaveLength(2);

    const [{ generation, validation }] = result.operations;
    expect(generation.generatedJson).toEqual({
      vehicle_id: 'FL-1234',
      service_type: 'general_service',
      scheduling: { requested_date: '2024-05-11', requested_time: '10:00' },
      location: null,
      priority: 'normal',
      created_at: '2024-05-10T10:00:00Z',
    });
    expect(validation.isValid).toBe(true);
    expect(validation.issues.map((i) => i.message)).toEqual(['Maintenance scheduled on weekend']);
    expect(result.decision).toBe('proceed');

    expect(registry.getTemplateStats(SCHEDULE_ID)).toMatchObject({
      totalUses: 1,
      successfulUses: 1,
      failedUses: 0,
      errorPatterns: {},
    });
  });

  it('generates and validates every selected template', async () => {
    const result = await pipeline.process(MAINTENANCE_REQUEST);

    expect(result.selection.strategyUsed).toBe('best_fit');
    expect(result.selection.multiStepPlan).toEqual([]);
    expect(result.operations.map((op) => op.generation.templateId)).toEqual(
      result.selection.selectedTemplates.map((s) => s.templateId),
    );

    const cancel = result.operations[1];
    expect(cancel.generation.templateId).toBe(CANCEL_MAINTENANCE_ID);
    expect(cancel.generation.generatedJson).toEqual({
      vehicle_id: 'FL-1234',
      appointment: { requested_date: '2024-05-11' },
      reason: 'requested_by_fleet',
      cancelled_at: '2024-05-10T10:00:00Z',
    });
    expect(cancel.validation.issues).toEqual([]);
    expect(registry.getTemplateStats(CANCEL_MAINTENANCE_ID)).toMatchObject({ totalUses: 1, successfulUses: 1 });
  });

  it('carries strict mode into generation', async () => {
    const result = await pipeline.process('Schedule oil change for vehicle FL-1234', {
      strictMode: true,
      generation: { useFallbackValues: false },
    });

    const schedule = result.operations.find((op) => op.generation.templateId === SCHEDULE_ID);
    expect(schedule?.generation.errors).toContain("Required entity 'requested_date' is missing or null");
  });

  it('asks for clarification when validation fails and records the failure', async () => {
    const result = await pipeline.process(MAINTENANCE_REQUEST, { failOnWarnings: true });

    expect(result.operations[0].validation.isValid).toBe(false);
    expect(result.decision).toBe('clarify');
    expect(registry.getTemplateStats(SCHEDULE_ID)).toMatchObject({
      totalUses: 1,
      failedUses: 1,
      errorPatterns: { validation: 1 },
    });
  });

  it('rejects requests no template can serve', async () => {
    const result = await pipelineOver(new TemplateRegistry([])).process('hello there');

    expect(result.selection.selectedTemplates).toEqual([]);
    expect(result.operations).toEqual([]);
    expect(result.decision).toBe('reject');
  });

  it('decides from confidence level and operation health', async () => {
    const { selection, operations } = await pipeline.process(MAINTENANCE_REQUEST);
    const [op] = operations;
    const withError = [{ ...op, generation: { ...op.generation, errors: ["Required field 'x' has no value"] } }];

    expect(decide({ level: 'high' }, selection, operations)).toBe('proceed');
    expect(decide({ level: 'medium' }, selection, operations)).toBe('clarify');
    expect(decide({ level: 'very_low' }, selection, operations)).toBe('reject');
    expect(decide({ level: 'very_high' }, selection, withError)).toBe('clarify');
    expect(decide({ level: 'very_high' }, { selectedTemplates: [] }, operations)).toBe('reject');
    expect(decide({ level: 'very_high' }, selection, [])).toBe('reject');
  });
});
