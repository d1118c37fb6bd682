import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { SchemaRegistry } from '@trackside/codec';
import type { SchemaSource } from '@trackside/domain';

export function schemaRouter(registry: SchemaRegistry, source: SchemaSource): Router {
  const router = Router();

  /** POST /api/schema/reload: re-read the catalog; 422 leaves the active one in place */
  router.post('/reload', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const schema = await registry.reload(source);
      console.log(`[schema] reloaded ${schema.version} from ${source.description}`);
      res.json({
        version: schema.version,
        sensors: schema.all().length,
        enabled: schema.enabled().length,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
