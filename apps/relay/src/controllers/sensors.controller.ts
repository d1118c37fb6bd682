import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { SchemaProvider } from '@trackside/codec';
import type { SensorDefinition } from '@trackside/domain';
import type { TelemetryPipeline } from '../services/pipeline/telemetry-pipeline.js';
import { HttpError } from '../middleware/error-handler.js';

const querySchema = z.object({
  group: z.string().min(1).optional(),
});

export interface LatestValue {
  value: number | null;
  timestamp: number | null;
  valid: boolean;
}

export function sensorsRouter(schemas: SchemaProvider, pipeline: TelemetryPipeline): Router {
  const router = Router();

  const latestOf = (sensor: SensorDefinition): LatestValue => {
    const reading = pipeline.latestReading(sensor.id);
    if (!reading) return { value: null, timestamp: null, valid: false };
    return {
      value: Number.isFinite(reading.value) ? reading.value : null,
      timestamp: reading.timestamp,
      valid: reading.valid,
    };
  };

  /** GET /api/sensors?group= : latest value per enabled sensor, grouped */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { group } = querySchema.parse(req.query);
      const schema = schemas.current;
      const groups = schema.groups();

      if (group !== undefined && !groups.has(group)) {
        throw new HttpError(404, `Unknown sensor group: ${group}`);
      }

      const body: Record<string, Record<string, LatestValue>> = {};
      for (const [name, sensors] of groups) {
        if (group !== undefined && name !== group) continue;
        const values: Record<string, LatestValue> = {};
        for (const sensor of sensors) values[sensor.id] = latestOf(sensor);
        body[name] = values;
      }

      res.json({ version: schema.version, groups: body });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
