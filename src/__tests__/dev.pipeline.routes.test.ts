import request from 'supertest';
import { beforeAll, describe, expect, it } from 'vitest';

import { devPipelineRoutes } from '@api/routes/dev.pipeline.routes.js';
import { buildTestApp, type TestApp } from '@test/utils/buildTestApp.js';

const MAINTENANCE_REQUEST = 'Schedule oil change for vehicle FL-1234 tomorrow at 10am';

describe('dev pipeline routes', () => {
  let app: TestApp['app'];

  beforeAll(async () => {
    ({ app } = await buildTestApp(({ pipeline }) => devPipelineRoutes(pipeline)));
  });

  it('classifies text', async () => {
    const res = await request(app)
      .post('/v1/dev/intent/classify')
      .send({ text: 'reserve a van and assign parking spot' });

    expect(res.status).toBe(200);
    expect(res.body.primaryIntent.intent).toBe('ASSIGN_PARKING');
    expect(res.body.secondaryIntents.map((m: { intent: string }) => m.intent)).toEqual(['MAKE_RESERVATION']);
  });

  it('extracts entities', async () => {
    const res = await request(app).post('/v1/dev/entities/extract').send({ text: MAINTENANCE_REQUEST });

    expect(res.status).toBe(200);
    expect(res.body.totalEntities).toBe(3);
    expect(res.body.entityCounts).toEqual({ VEHICLE_ID: 1, DATE: 1, TIME: 1 });
  });

  it('generates and validates one template', async () => {
    const res = await request(app)
      .post('/v1/dev/templates/maintenance.schedule_maintenance.1.0/generate')
      .send({ text: MAINTENANCE_REQUEST, useFallbackValues: false });

    expect(res.status).toBe(200);
    expect(res.body.generation.generatedJson).toEqual({
      vehicle_id: 'FL-1234',
      service_type: null,
      scheduling: { requested_date: '2024-05-11', requested_time: '10:00' },
      location: null,
      priority: null,
      created_at: null,
    });
    expect(res.body.generation.errors).toEqual([]);
    expect(res.body.validation.isValid).toBe(true);
  });

  it('answers 404 for an unknown template', async () => {
    const res = await request(app)
      .post('/v1/dev/templates/maintenance.missing.1.0/generate')
      .send({ text: MAINTENANCE_REQUEST });

    expect(res.status).toBe(404);
    expect(res.body.code).toBe('TEMPLATE_NOT_FOUND');
  });

  it('rejects a missing text with 422', async () => {
    const res = await request(app).post('/v1/dev/intent/classify').send({});

    expect(res.status).toBe(422);
    expect(res.body.details).toEqual([{ path: 'text', message: 'Required' }]);
  });
});
