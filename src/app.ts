import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { createApiRouter, type ApiDeps } from './api/routes/index.js';
import { errorMiddleware } from './middleware/index.js';

export const JSON_BODY_LIMIT = '256kb';

export function createApp(deps: ApiDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok', templates: deps.registry.listTemplateIds().length });
  });

  app.use('/', createApiRouter(deps));
  app.use(errorMiddleware);
  return app;
}
