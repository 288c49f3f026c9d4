import { Router } from 'express';

import type { RequestPipeline } from '@services/pipeline/request-pipeline.service.js';
import type { TemplateRegistry } from '@services/templates/template-registry.js';

import { devPipelineRoutes } from './dev.pipeline.routes.js';
import { pipelineRoutes } from './pipeline.routes.js';
import { templatesRoutes } from './templates.routes.js';

export interface ApiDeps {
  pipeline: RequestPipeline;
  registry: TemplateRegistry;
}

export function createApiRouter({ pipeline, registry }: ApiDeps): Router {
  const v1Router = Router();
  v1Router.use(pipelineRoutes(pipeline));
  v1Router.use(templatesRoutes(registry));
  if (process.env.NODE_ENV !== 'production') {
    v1Router.use(devPipelineRoutes(pipeline));
  }

  const router = Router();
  router.use('/v1', v1Router);
  return router;
}
