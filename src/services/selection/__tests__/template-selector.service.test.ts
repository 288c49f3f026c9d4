import { beforeAll, describe, expect, it } from 'vitest';

import type { SelectionCriteria } from '@core/interfaces/index.js';
import { EntityExtractor } from '@services/entities/entity-extractor.service.js';
import { IntentClassifier } from '@services/intent/intent-classifier.service.js';
import { TemplateRegistry } from '@services/templates/template-registry.js';

import { TemplateSelector } from '../template-selector.service.js';

const clock = () => new Date('2024-05-10T10:00:00.000Z');
const MAINTENANCE_REQUEST = 'Schedule oil change for vehicle FL-1234 tomorrow at 10am';

const SCHEDULE_ID = 'maintenance.schedule_maintenance.1.0';
const CANCEL_MAINTENANCE_ID = 'maintenance.cancel_maintenance.1.0';

function criteria(overrides: Partial<SelectionCriteria>): SelectionCriteria {
  return {
    primaryIntent: 'SCHEDULE_MAINTENANCE',
    secondaryIntents: [],
    multiIntent: false,
    availableEntities: {},
    preferredCategories: ['maintenance'],
    excludedTemplates: [],
    strategy: 'best_fit',
    minConfidenceThreshold: 0.5,
    maxTemplates: 3,
    allowPartialMatches: true,
    ...overrides,
  };
}

describe('TemplateSelector', () => {
  let registry: TemplateRegistry;
  const selector = new TemplateSelector({ minConfidence: 0.5 });

  const maintenanceCriteria = (overrides: Partial<SelectionCriteria> = {}) => {
    const classification = new IntentClassifier().classify(MAINTENANCE_REQUEST);
    const extraction = new EntityExtractor({ clock, timezone: 'UTC' }).extract(MAINTENANCE_REQUEST);
    return selector.buildCriteria(classification, extraction, overrides);
  };

  beforeAll(async () => {
    registry = await TemplateRegistry.load('templates', { clock });
  });

  it('derives criteria from the classification and entities', () => {
    expect(maintenanceCriteria()).toEqual({
      primaryIntent: 'SCHEDULE_MAINTENANCE',
      secondaryIntents: [],
      multiIntent: false,
      availableEntities: { VEHICLE_ID: ['FL-1234'], DATE: ['tomorrow'], TIME: ['10am'] },
      preferredCategories: ['maintenance'],
      excludedTemplates: [],
      strategy: 'best_fit',
      minConfidenceThreshold: 0.5,
      maxTemplates: 3,
      allowPartialMatches: true,
    });
  });

  it('ranks maintenance templates for a scheduling request', () => {
    const result = selector.select(registry, maintenanceCriteria());

    expect(result.strategyUsed).toBe('best_fit');
    expect(result.selectedTemplates.map((s) => s.templateId)).toEqual([SCHEDULE_ID, CANCEL_MAINTENANCE_ID]);
    expect(result.primaryTemplate?.templateId).toBe(SCHEDULE_ID);
    expect(result.selectionConfidence).toBeCloseTo(0.8275, 6);
    expect(result.multiStepPlan).toEqual([]);

    const [schedule, cancel] = result.selectedTemplates;
    expect(schedule.criteriaScores).toEqual({
      intent_alignment: 0.8,
      entity_coverage: 0.75,
      required_entities: 1,
      template_popularity: 0.5,
      success_rate: 1,
      api_compatibility: 1,
    });
    expect(schedule.matchingEntities).toEqual(['vehicle_id', 'requested_date', 'requested_time']);
    expect(schedule.missingEntities).toEqual(['location']);
    expect(schedule.reasoning).toEqual([
      "Strong intent alignment with template 'schedule_maintenance'",
      'Covers 3 entities: requested_date, requested_time, vehicle_id',
      'Missing 1 entities: location',
      'High historical success rate',
    ]);
    expect(cancel.totalScore).toBeCloseTo(0.65, 6);
  });

  it('penalizes missing entities when partial matches are not allowed', () => {
    const result = selector.select(registry, maintenanceCriteria({ allowPartialMatches: false }));
    const schedule = result.selectedTemplates.find((s) => s.templateId === SCHEDULE_ID);
    expect(schedule?.totalScore).toBeCloseTo(0.8275 * 0.7, 6);
  });

  it('returns an empty selection with a note when nothing clears the threshold', () => {
    const result = selector.select(registry, criteria({ primaryIntent: 'UNKNOWN' }));

    expect(result.selectedTemplates).toEqual([]);
    expect(result.primaryTemplate).toBeUndefined();
    expect(result.selectionConfidence).toBe(0);
    expect(result.fallbackTemplates).toEqual([]);
    expect(result.selectionNotes).toEqual(['No template scored at or above 0.5 (best 0.20)']);
  });

  it('reports when no candidate templates exist', () => {
    const result = selector.select(registry, criteria({ excludedTemplates: [SCHEDULE_ID, CANCEL_MAINTENANCE_ID] }));
    expect(result.selectedTemplates).toEqual([]);
    expect(result.selectionNotes).toEqual(['No templates found matching criteria']);
  });

  it('selects the best eligible templates under the fallback strategy', () => {
    const result = selector.select(registry, maintenanceCriteria({ strategy: 'fallback' }));

    expect(result.strategyUsed).toBe('fallback');
    expect(result.selectedTemplates.map((s) => s.templateId)).toEqual([SCHEDULE_ID, CANCEL_MAINTENANCE_ID]);
    expect(result.fallbackTemplates).toEqual([]);
    expect(result.selectionNotes).toEqual(['Using best available templates despite low classification confidence']);
    expect(result.selectionConfidence).toBeCloseTo(0.8275, 6);
  });

  it('never selects below the threshold under the fallback strategy', () => {
    const result = selector.select(registry, criteria({ primaryIntent: 'UNKNOWN', strategy: 'fallback' }));

    expect(result.strategyUsed).toBe('fallback');
    expect(result.selectedTemplates).toEqual([]);
    expect(result.fallbackTemplates).toEqual([]);
    expect(result.selectionConfidence).toBe(0);
    expect(result.selectionNotes).toEqual(['No template scored at or above 0.5 (best 0.20)']);
  });

  it('falls back to best fit when no exact match exists', () => {
    const result = selector.select(registry, maintenanceCriteria({ strategy: 'exact_match' }));

    expect(result.strategyUsed).toBe('best_fit');
    expect(result.selectionNotes[0]).toBe('No exact match found, falling back to best fit');
    expect(result.primaryTemplate?.templateId).toBe(SCHEDULE_ID);
  });

  it('plans one step per category for multi-intent requests', () => {
    const result = selector.select(
      registry,
      criteria({
        primaryIntent: 'MAKE_RESERVATION',
        secondaryIntents: ['ASSIGN_PARKING'],
        multiIntent: true,
        preferredCategories: ['reservations', 'parking'],
        availableEntities: {
          VEHICLE_ID: ['VAN-204'],
          PERSON_NAME: ['Dana Reyes'],
          DATE: ['2024-05-13'],
          PARKING_SPOT: ['12'],
        },
        strategy: 'multi_template',
        maxTemplates: 5,
      }),
    );

    expect(result.strategyUsed).toBe('multi_template');
    expect(result.selectedTemplates.map((s) => s.templateId)).toEqual([
      'reservations.make_reservation.1.0',
      'parking.assign_parking.1.0',
    ]);
    expect(result.fallbackTemplates.map((s) => s.templateId)).toEqual(['reservations.cancel_reservation.1.0']);
    expect(result.selectionConfidence).toBeCloseTo((0.24 + (4 / 7) * 0.25 + 0.4 + 0.66) / 2, 6);
    expect(result.selectionNotes).toEqual(['Selected 2 templates across categories']);
    expect(result.multiStepPlan.map((step) => [step.stepNumber, step.operation, step.httpMethod])).toEqual([
      [1, 'make_reservation', 'POST'],
      [2, 'assign_parking', 'POST'],
    ]);
  });

  it('selects templates by name and version', () => {
    expect(selector.selectByName(registry, 'assign_parking')).toBe('parking.assign_parking.1.0');
    expect(selector.selectByName(registry, 'assign_parking', 'parking', '1.0')).toBe('parking.assign_parking.1.0');
    expect(selector.selectByName(registry, 'assign_parking', 'parking', '2.0')).toBeUndefined();
  });

  it('explains a selection', () => {
    const result = selector.select(registry, maintenanceCriteria());
    const explanation = selector.explain(registry, result);

    expect(explanation.totalCandidatesEvaluated).toBe(2);
    expect(explanation.templateDetails.map((d) => [d.rank, d.templateName, d.category])).toEqual([
      [1, 'schedule_maintenance', 'maintenance'],
      [2, 'cancel_maintenance', 'maintenance'],
    ]);
    expect(explanation.multiStepPlan).toBeUndefined();
  });
});
