import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { pipelineRoutes } from '@api/routes/pipeline.routes.js';
import type { ApiDeps } from '@api/routes/index.js';
import { buildTestApp } from '@test/utils/buildTestApp.js';
import { loadTestPipeline } from '@test/utils/pipeline.js';

const routes = ({ pipeline }: ApiDeps) => pipelineRoutes(pipeline);

describe('POST /v1/pipeline/process', () => {
  let deps: ApiDeps;

  beforeEach(async () => {
    deps = await loadTestPipeline();
  });

  it('runs the full pipeline for a request', async () => {
    const { app } = await buildTestApp(routes, deps);

    const res = await request(app)
      .post('/v1/pipeline/process')
      .send({ text: 'Schedule oil change for vehicle FL-1234 tomorrow at 10am' });

    expect(res.status).toBe(200);
    expect(res.body.decision).toBe('proceed');
    expect(res.body.classification.primaryIntent.intent).toBe('SCHEDULE_MAINTENANCE');
    expect(res.body.operations[0].generation.generatedJson).toMatchObject({
      vehicle_id: 'FL-1234',
      scheduling: { requested_date: '2024-05-11', requested_time: '10:00' },
    });
    expect(res.body.operations).toHaveLength(res.body.selection.selectedTemplates.length);
  });

  it('passes validation switches through', async () => {
    const process = vi.spyOn(deps.pipeline, 'process');
    const { app } = await buildTestApp(routes, deps);

    const res = await request(app)
      .post('/v1/pipeline/process')
      .send({ text: 'Schedule oil change for vehicle FL-1234 tomorrow at 10am', failOnWarnings: true });

    expect(res.status).toBe(200);
    expect(process).toHaveBeenCalledWith('Schedule oil change for vehicle FL-1234 tomorrow at 10am', {
      strictMode: undefined,
      failOnWarnings: true,
    });
    expect(res.body.decision).toBe('clarify');
  });

  it('rejects a blank text with 422', async () => {
    const { app } = await buildTestApp(routes, deps);

    const res = await request(app).post('/v1/pipeline/process').send({ text: '   ' });

    expect(res.status).toBe(422);
    expect(res.body.code).toBe('VALIDATION_ERROR');
    expect(res.body.message).toBe('Invalid request body');
    expect(res.body.details).toEqual([{ path: 'text', message: 'text required' }]);
  });

  it('maps unexpected failures to 500', async () => {
    vi.spyOn(deps.pipeline, 'process').mockRejectedValue(new Error('catalog exploded'));
    const { app } = await buildTestApp(routes, deps);

    const res = await request(app).post('/v1/pipeline/process').send({ text: 'Check status of FL-1234' });

    expect(res.status).toBe(500);
    expect(res.body.code).toBe('INTERNAL_ERROR');
    expect(res.body.message).toBe('Internal server error');
    expect(typeof res.body.traceId).toBe('string');
  });
});
