import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CatalogUnavailableError } from '@core/errors/index.js';
import { loadTemplateFiles } from '@infra/catalog/template-file.loader.js';
import { templateFrom } from '@test/utils/fixtures.js';

import { compareVersions, TemplateRegistry } from '../template-registry.js';
import { InMemoryUsageStatsStore, type UsageStatsStore } from '../usage-stats.store.js';

const clock = () => new Date('2024-05-10T10:00:00.000Z');

const SCHEDULE_ID = 'maintenance.schedule_maintenance.1.0';
const MAKE_RESERVATION_ID = 'reservations.make_reservation.1.0';

const inspectionTemplate = (version: string) =>
  templateFrom({
    template_metadata: {
      name: 'inspection',
      version,
      category: 'maintenance',
      required_entities: ['vin'],
      tags: [],
    },
    template: { vehicle_id: '{vehicle_id}' },
    validation_rules: { odometer: { type: 'integer' } },
  });

describe('TemplateRegistry', () => {
  let registry: TemplateRegistry;
  let store: InMemoryUsageStatsStore;

  beforeEach(async () => {
    store = new InMemoryUsageStatsStore();
    registry = await TemplateRegistry.load('templates', { store, clock });
  });

  it('indexes every template by category and name', () => {
    expect(registry.listTemplateIds()).toHaveLength(10);
    expect(registry.listCategories()).toEqual(['maintenance', 'parking', 'reservations', 'vehicle_operations']);
    expect(registry.findTemplatesByCategory('maintenance')).toEqual([
      'maintenance.cancel_maintenance.1.0',
      SCHEDULE_ID,
    ]);
    expect(registry.findTemplatesByName('make_reservation')).toEqual([MAKE_RESERVATION_ID]);
    expect(registry.findTemplatesByName('make_reservation', 'parking')).toEqual([]);
    expect(registry.findTemplatesByCategory('billing')).toEqual([]);
  });

  it('parses placeholders and metadata', () => {
    const template = registry.getLatestTemplate('schedule_maintenance', 'maintenance');

    expect(template?.id).toBe(SCHEDULE_ID);
    expect(template?.placeholders).toEqual([
      'vehicle_id',
      'service_type',
      'requested_date',
      'requested_time',
      'location',
      'priority',
      'created_at',
    ]);
    expect(registry.getTemplateMetadata(SCHEDULE_ID)).toMatchObject({
      requiredEntities: ['vehicle_id', 'requested_date'],
      apiEndpoint: '/api/v1/maintenance/appointments',
      httpMethod: 'POST',
    });
    expect(registry.getTemplateMetadata(SCHEDULE_ID)?.contentHash).toMatch(/^[0-9a-f]{64}$/);
    expect(registry.getTemplate('maintenance.missing.1.0')).toBeUndefined();
  });

  it('searches by text, entities and tags', async () => {
    expect(registry.searchTemplates({ query: 'reserv' })).toEqual([
      'reservations.cancel_reservation.1.0',
      MAKE_RESERVATION_ID,
    ]);
    expect(registry.searchTemplates({ requiredEntities: ['parking_spot'] })).toEqual(['parking.assign_parking.1.0']);
    expect(registry.searchTemplates({ tags: ['status'] })).toEqual([
      'vehicle_operations.update_vehicle_status.1.0',
    ]);
    expect(registry.searchTemplates({ query: 'reserv', category: 'maintenance' })).toEqual([]);

    await registry.recordTemplateUsage(MAKE_RESERVATION_ID, true, 5);
    expect(registry.searchTemplates({ query: 'reserv' })[0]).toBe(MAKE_RESERVATION_ID);
  });

  it('records usage and mirrors it to the store', async () => {
    await registry.recordTemplateUsage(SCHEDULE_ID, true, 12);
    await registry.recordTemplateUsage(SCHEDULE_ID, false, 8, 'validation');

    const expected = {
      totalUses: 2,
      successfulUses: 1,
      failedUses: 1,
      averageGenerationTimeMs: 10,
      lastUsedAt: '2024-05-10T10:00:00.000Z',
      errorPatterns: { validation: 1 },
    };
    expect(registry.getTemplateStats(SCHEDULE_ID)).toEqual(expected);

    const reloaded = await TemplateRegistry.load('templates', { store, clock });
    expect(reloaded.getTemplateStats(SCHEDULE_ID)).toEqual(expected);
  });

  it('keeps counting when the store write fails', async () => {
    const failing: UsageStatsStore = {
      record: vi.fn().mockRejectedValue(new Error('store offline')),
      loadAll: vi.fn().mockResolvedValue(new Map()),
    };
    const local = await TemplateRegistry.load('templates', { store: failing, clock });

    await expect(local.recordTemplateUsage(SCHEDULE_ID, true, 3)).resolves.toBeUndefined();
    expect(local.getTemplateStats(SCHEDULE_ID)?.totalUses).toBe(1);
  });

  it('summarizes the catalog', async () => {
    await registry.recordTemplateUsage(SCHEDULE_ID, true, 12);
    await registry.recordTemplateUsage(SCHEDULE_ID, false, 8, 'validation');

    expect(registry.getRegistrySummary()).toEqual({
      totalTemplates: 10,
      totalCategories: 4,
      categories: ['maintenance', 'parking', 'reservations', 'vehicle_operations'],
      totalUsage: 2,
      successRate: 0.5,
      mostUsedTemplates: [SCHEDULE_ID],
      bestPerformingTemplates: [],
      lastReload: '2024-05-10T10:00:00.000Z',
      templatesDirectory: 'templates',
    });

    const exported = registry.exportCatalog();
    expect(Object.keys(exported.templates)).toHaveLength(10);
    expect(exported.templates[SCHEDULE_ID].usageStats.successRate).toBe(0.5);
    expect(exported.exportedAt).toBe('2024-05-10T10:00:00.000Z');
  });

  it('reports structural problems', () => {
    expect(registry.validateTemplateStructure('vehicle_operations.transfer_vehicle.1.0')).toEqual({
      templateId: 'vehicle_operations.transfer_vehicle.1.0',
      valid: true,
      errors: [],
      warnings: [
        "No validation rule found for entity 'from_location'",
        "No validation rule found for entity 'requested_by'",
      ],
      recommendations: [],
    });

    const inline = new TemplateRegistry([inspectionTemplate('1.0')]);
    expect(inline.validateTemplateStructure('maintenance.inspection.1.0')).toEqual({
      templateId: 'maintenance.inspection.1.0',
      valid: false,
      errors: ["Required entity 'vin' not found in template"],
      warnings: [
        "No validation rule found for entity 'vin'",
        "Validation rule for 'odometer' but field not used in template",
      ],
      recommendations: [
        'Add description to template metadata',
        'Add API endpoint to template metadata',
        'Add tags to improve template discoverability',
      ],
    });

    expect(registry.validateTemplateStructure('nope').errors).toEqual(['Template not found']);
  });

  it('orders versions numerically and ignores duplicate ids', () => {
    expect(compareVersions('1.10', '1.9')).toBeGreaterThan(0);
    expect(compareVersions('2.0', '2')).toBe(0);

    const inline = new TemplateRegistry([
      inspectionTemplate('1.9'),
      inspectionTemplate('1.10'),
      inspectionTemplate('1.9'),
    ]);
    expect(inline.listTemplateIds()).toEqual(['maintenance.inspection.1.9', 'maintenance.inspection.1.10']);
    expect(inline.getLatestTemplate('inspection', 'maintenance')?.id).toBe('maintenance.inspection.1.10');
  });
});

describe('loadTemplateFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'catalog-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('skips files that fail to parse and applies metadata defaults', async () => {
    await writeFile(path.join(dir, 'broken.json'), '{ "template": ');
    await writeFile(path.join(dir, 'bad_rule.json'), JSON.stringify({ template: {}, validation_rules: { x: { pattern: '(' } } }));
    await writeFile(path.join(dir, 'ping.json'), JSON.stringify({ template: { ok: true } }));
    await writeFile(path.join(dir, '_draft.json'), JSON.stringify({ template: {} }));

    const report = await loadTemplateFiles(dir);

    expect(report.loaded.map((f) => f.stem)).toEqual(['ping']);
    expect(report.loaded[0].file.template_metadata).toMatchObject({
      version: '1.0',
      category: 'general',
      http_method: 'POST',
    });
    expect(report.rejected.map((r) => path.basename(r.sourcePath)).sort()).toEqual(['bad_rule.json', 'broken.json']);
    expect(report.rejected.find((r) => r.sourcePath.endsWith('bad_rule.json'))?.reason).toBe(
      'validation_rules.x.pattern: invalid regular expression',
    );
  });

  it('names templates after their file when metadata omits a name', async () => {
    await writeFile(path.join(dir, 'ping.json'), JSON.stringify({ template: { ok: '{vehicle_id}' } }));
    const registry = await TemplateRegistry.load(dir);
    expect(registry.listTemplateIds()).toEqual(['general.ping.1.0']);
  });

  it('fails when the directory cannot be read', async () => {
    await expect(loadTemplateFiles(path.join(dir, 'missing'))).rejects.toBeInstanceOf(CatalogUnavailableError);
  });
});
