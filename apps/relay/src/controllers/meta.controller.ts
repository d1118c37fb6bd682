import { Router } from 'express';
import type { Request, Response } from 'express';
import type { SchemaProvider } from '@trackside/codec';
import { schemaMeta } from '../ws/messages.js';

export function metaRouter(schemas: SchemaProvider): Router {
  const router = Router();

  /** GET /api/meta/sensors: display metadata of enabled sensors by group */
  router.get('/sensors', (_req: Request, res: Response) => {
    res.json(schemaMeta(schemas.current));
  });

  return router;
}
