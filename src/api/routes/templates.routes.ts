import { Router, type NextFunction, type Request, type Response } from 'express';

import { TemplateNotFoundError } from '@core/errors/index.js';
import type { TemplateRegistry } from '@services/templates/template-registry.js';

import { parseRequest, TemplateListQuerySchema } from './request.schemas.js';

export function templatesRoutes(registry: TemplateRegistry): Router {
  const router = Router();

  router.get('/templates', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { category, q, tag } = parseRequest(TemplateListQuerySchema, req.query);
      const ids =
        category || q || tag
          ? registry.searchTemplates({ category, query: q, tags: tag ? [tag] : undefined })
          : registry.listTemplateIds();
      const templates = ids.flatMap((id) => {
        const metadata = registry.getTemplateMetadata(id);
        return metadata ? [metadata] : [];
      });
      res.json({ count: templates.length, templates });
    } catch (err) {
      next(err);
    }
  });

  router.get('/templates/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const template = registry.getTemplate(req.params.id);
      if (!template) throw new TemplateNotFoundError(req.params.id);
      res.json({
        metadata: template.metadata,
        template: template.content,
        validationRules: template.validationRules,
        placeholders: template.placeholders,
        stats: registry.getTemplateStats(template.id) ?? null,
        structure: registry.validateTemplateStructure(template.id),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
