import { describe, expect, it } from 'vitest';

import { EntityExtractor } from '@services/entities/entity-extractor.service.js';
import { IntentClassifier } from '@services/intent/intent-classifier.service.js';
import { classificationOf, entity, extractionOf } from '@test/utils/fixtures.js';

import { ConfidenceCalculator } from '../confidence-calculator.service.js';

const clock = () => new Date('2024-05-10T10:00:00.000Z');

const factorOf = (calc: ReturnType<ConfidenceCalculator['calculate']>, name: string) =>
  calc.factorScores.find((f) => f.factor === name);

describe('ConfidenceCalculator', () => {
  const calculator = new ConfidenceCalculator({ clock, timezone: 'UTC' });

  it('rates a clear maintenance request as very high', () => {
    const text = 'Schedule oil change for vehicle FL-1234 tomorrow at 10am';
    const classification = new IntentClassifier().classify(text);
    const extraction = new EntityExtractor({ clock, timezone: 'UTC' }).extract(text);

    const calc = calculator.calculate(text, classification, extraction);

    expect(calc.overallConfidence).toBeCloseTo(0.945, 6);
    expect(calc.level).toBe('very_high');
    expect(calc.risks).toEqual([]);
    expect(factorOf(calc, 'intent_clarity')?.score).toBe(1);
    expect(factorOf(calc, 'entity_validation')?.score).toBeCloseTo(0.98, 6);
    expect(factorOf(calc, 'text_quality')?.score).toBeCloseTo(0.8, 6);
    expect(factorOf(calc, 'cross_validation')?.score).toBe(0);
  });

  it('never raises confidence when a failed entity is added', () => {
    const text = 'Schedule service for FL-1234 on 2024-05-14 please';
    const classification = classificationOf('SCHEDULE_MAINTENANCE');
    const sound = [
      entity({ type: 'VEHICLE_ID', value: 'FL-1234', start: 21 }),
      entity({ type: 'DATE', value: '2024-05-14', start: 32 }),
    ];
    const failed = entity({
      type: 'PHONE',
      value: '12345',
      confidence: 0.6,
      validation: { state: 'failed', reason: 'format validation: Valid US phone number format' },
    });

    const base = calculator.calculate(text, classification, extractionOf(sound));
    const worse = calculator.calculate(text, classification, extractionOf([...sound, failed]));

    expect(worse.overallConfidence).toBeLessThan(base.overallConfidence);
    expect(worse.risks).toEqual([
      { factor: 'validation_failures', penalty: 0.1, description: 'Key entities failed format validation' },
    ]);
    expect(factorOf(worse, 'entity_validation')?.notes).toEqual(['Failed validation: PHONE']);
  });

  it('flags very short input', () => {
    const calc = calculator.calculate('FL-1234', classificationOf('UNKNOWN', 0.1), extractionOf([]));

    expect(calc.risks.map((r) => r.factor)).toEqual(['low_text_quality']);
    expect(factorOf(calc, 'intent_clarity')?.score).toBeCloseTo(0.03, 6);
    expect(factorOf(calc, 'entity_completeness')?.score).toBe(0.8);
  });

  it('notes dates that already passed', () => {
    const calc = calculator.calculate(
      'Reserve VAN-204 on 2024-05-01',
      classificationOf('MAKE_RESERVATION'),
      extractionOf([entity({ type: 'DATE', value: '2024-05-01' })]),
    );

    const temporal = factorOf(calc, 'temporal_consistency');
    expect(temporal?.score).toBe(0);
    expect(temporal?.notes).toEqual(['Date in the past: 2024-05-01']);
  });

  it('explains each factor contribution', () => {
    const calc = calculator.calculate(
      'Check status of FL-1234',
      classificationOf('QUERY_INFORMATION', 0.7),
      extractionOf([entity({ type: 'VEHICLE_ID', value: 'FL-1234' })]),
    );
    const explanation = calculator.explain(calc);

    expect(explanation.factors).toHaveLength(8);
    for (const f of explanation.factors) {
      expect(f.contribution).toBeCloseTo(f.score * f.weight, 10);
    }
    expect(explanation.interval.range).toBeCloseTo(calc.interval.upper - calc.interval.lower, 10);
    expect(explanation.level).toBe(calc.level);
  });
});
