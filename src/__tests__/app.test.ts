import request from 'supertest';
import { beforeAll, describe, expect, it } from 'vitest';

import { loadTestPipeline } from '@test/utils/pipeline.js';

import { createApp } from '../app.js';

describe('createApp', () => {
  let app: ReturnType<typeof createApp>;

  beforeAll(async () => {
    app = createApp(await loadTestPipeline());
  });

  it('reports health with the catalog size', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', templates: 10 });
  });

  it('mounts the api under /v1', async () => {
    const res = await request(app).get('/v1/templates/parking.assign_parking.1.0');

    expect(res.status).toBe(200);
    expect(res.body.metadata.category).toBe('parking');
  });
});
