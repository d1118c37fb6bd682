import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { Server } from 'http';

import { metaRouter } from './controllers/meta.controller.js';
import { sensorsRouter } from './controllers/sensors.controller.js';
import { linkRouter } from './controllers/link.controller.js';
import { schemaRouter } from './controllers/schema.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import { WsGateway } from './ws/ws-gateway.js';
import type { RelayRuntime } from './runtime.js';

export interface AppOptions {
  corsOrigin?: string;
  /** Request logging; off in tests. */
  accessLog?: boolean;
}

export function buildApp(runtime: RelayRuntime, options: AppOptions = {}): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  if (options.accessLog ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/meta', metaRouter(runtime.registry));
  app.use('/api/sensors', sensorsRouter(runtime.registry, runtime.pipeline));
  app.use('/api/link', linkRouter(runtime));
  app.use('/api/schema', schemaRouter(runtime.registry, runtime.schemaSource));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      link: runtime.supervisor.state,
      schema: runtime.registry.current.version,
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>, runtime: RelayRuntime): { httpServer: Server; wsGateway: WsGateway } {
  const httpServer = createServer(app);
  const wsGateway = new WsGateway(httpServer, {
    hub: runtime.hub,
    currentSchema: () => runtime.registry.current,
  });

  runtime.registry.onCommit((schema) => wsGateway.announceSchema(schema));
  runtime.supervisor.onStatusChange((status) => wsGateway.announceLink(status));

  return { httpServer, wsGateway };
}
