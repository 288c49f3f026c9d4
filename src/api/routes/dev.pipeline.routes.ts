import { Router, type NextFunction, type Request, type Response } from 'express';

import { TemplateNotFoundError } from '@core/errors/index.js';
import type { RequestPipeline } from '@services/pipeline/request-pipeline.service.js';

import { GenerateRequestSchema, parseRequest, TextRequestSchema } from './request.schemas.js';

/** Single-stage endpoints for poking at the pipeline while developing. */
export function devPipelineRoutes(pipeline: RequestPipeline): Router {
  const router = Router();

  router.post('/dev/intent/classify', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { text } = parseRequest(TextRequestSchema, req.body);
      res.json(pipeline.classifier.classify(text));
    } catch (err) {
      next(err);
    }
  });

  router.post('/dev/entities/extract', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { text } = parseRequest(TextRequestSchema, req.body);
      res.json(pipeline.extractor.toExport(pipeline.extractor.extract(text)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/dev/templates/:id/generate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(GenerateRequestSchema, req.body);
      const template = pipeline.catalog.getTemplate(req.params.id);
      if (!template) throw new TemplateNotFoundError(req.params.id);

      const classification = pipeline.classifier.classify(body.text);
      const extraction = pipeline.extractor.extract(body.text);
      const generation = pipeline.generator.generate(template, classification, extraction, {
        ...(body.useFallbackValues !== undefined ? { useFallbackValues: body.useFallbackValues } : {}),
        ...(body.transformValues !== undefined ? { transformValues: body.transformValues } : {}),
        ...(body.strictMode !== undefined ? { strictValidation: body.strictMode } : {}),
      });
      const validation = pipeline.validator.validate(generation, template.validationRules, template.metadata, {
        ...(body.strictMode !== undefined ? { strictMode: body.strictMode } : {}),
      });
      res.json({ generation, validation });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
