import { ConfidenceCalculator } from '@services/confidence/confidence-calculator.service.js';
import { EntityExtractor } from '@services/entities/entity-extractor.service.js';
import { createCounterSequence, JSONGenerator } from '@services/generation/json-generator.service.js';
import { RequestPipeline } from '@services/pipeline/request-pipeline.service.js';
import { TemplateRegistry } from '@services/templates/template-registry.js';
import { InMemoryUsageStatsStore } from '@services/templates/usage-stats.store.js';
import { TemplateValidator } from '@services/validation/template-validator.service.js';

export const testClock = () => new Date('2024-05-10T10:00:00.000Z');

/** Pipeline over the bundled catalog with a pinned clock and in-memory usage stats. */
export async function loadTestPipeline(): Promise<{ registry: TemplateRegistry; pipeline: RequestPipeline }> {
  const registry = await TemplateRegistry.load('templates', { store: new InMemoryUsageStatsStore(), clock: testClock });
  const pipeline = new RequestPipeline({
    catalog: registry,
    extractor: new EntityExtractor({ clock: testClock, timezone: 'UTC' }),
    calculator: new ConfidenceCalculator({ clock: testClock, timezone: 'UTC' }),
    generator: new JSONGenerator({ clock: testClock, sequence: createCounterSequence() }),
    validator: new TemplateValidator({ clock: testClock }),
  });
  return { registry, pipeline };
}
