import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import { cfg } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { TickStore } from '../store/tick-store.js';
import type { RuntimeConfig } from '../state/runtime-config.js';
import type { SnapshotHub } from '../state/snapshot-hub.js';
import type { SseBroadcaster } from '../sse/clients.js';
import { errorHandler } from './middleware/error.js';
import { dashboardRoutes } from './routes/dashboard.routes.js';
import { healthRoutes } from './routes/health.routes.js';
import { opsRoutes } from './routes/ops.routes.js';
import { realtimeRoutes } from './routes/realtime.routes.js';

export type AppDeps = {
  store: TickStore;
  hub: SnapshotHub;
  config: RuntimeConfig;
  sse: SseBroadcaster;
  isReady: () => boolean;
};

export function buildApp(deps: AppDeps) {
  const app = express();
  app.disable('x-powered-by');
  app.use(helmet());
  const corsOrigins =
    cfg.cors.origins === '*'
      ? '*'
      : cfg.cors.origins && cfg.cors.origins.length
        ? cfg.cors.origins
        : true;
  app.use(cors({ origin: corsOrigins, credentials: false }));
  app.use(express.json({ limit: '16kb' }));
  if (cfg.env !== 'test') app.use(pinoHttp({ logger, autoLogging: true }));

  dashboardRoutes(app, deps);
  healthRoutes(app, deps);
  realtimeRoutes(app, deps);
  opsRoutes(app);

  app.use((_req, res) => res.status(404).json({ error: { code: 'NOT_FOUND', message: 'route' } }));
  app.use(errorHandler);

  return app;
}
