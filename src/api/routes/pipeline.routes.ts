import { Router, type NextFunction, type Request, type Response } from 'express';

import type { RequestPipeline } from '@services/pipeline/request-pipeline.service.js';

import { parseRequest, ProcessRequestSchema } from './request.schemas.js';

export function pipelineRoutes(pipeline: RequestPipeline): Router {
  const router = Router();

  router.post('/pipeline/process', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { text, strictMode, failOnWarnings } = parseRequest(ProcessRequestSchema, req.body);
      const result = await pipeline.process(text, { strictMode, failOnWarnings });
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
