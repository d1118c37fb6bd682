import { Router } from 'express';
import type { Request, Response } from 'express';
import type { FrameFramer } from '@trackside/codec';
import type { DistributionHub } from '../services/distribution/distribution-hub.js';
import type { LinkSupervisor } from '../services/link/link-supervisor.js';
import type { TelemetryPipeline } from '../services/pipeline/telemetry-pipeline.js';

export interface LinkRouterDeps {
  supervisor: LinkSupervisor;
  framer: FrameFramer;
  pipeline: TelemetryPipeline;
  hub: DistributionHub;
}

export function linkRouter(deps: LinkRouterDeps): Router {
  const router = Router();

  /** GET /api/link: link state plus pipeline and subscriber counters */
  router.get('/', (_req: Request, res: Response) => {
    res.json({
      link: deps.supervisor.linkStatus,
      framer: {
        discardedBytes: deps.framer.discardedBytes,
        pendingBytes: deps.framer.pendingBytes,
      },
      pipeline: deps.pipeline.stats(),
      hub: deps.hub.stats(),
    });
  });

  return router;
}
