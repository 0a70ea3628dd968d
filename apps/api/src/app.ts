import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';

import type { AppContainer } from './container.js';
import { createVisitsRouter } from './controllers/visits.controller.js';
import { createBookingsRouter } from './controllers/bookings.controller.js';
import { createIngestRouter } from './controllers/ingest.controller.js';
import { WsGateway } from './ws/ws-gateway.js';
import { errorHandler } from './middleware/error-handler.js';

export interface BuildAppOptions {
  corsOrigin?: string;
  /** morgan format; false disables access logs. */
  accessLog?: string | false;
}

export function buildApp(container: AppContainer, opts: BuildAppOptions = {}): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: opts.corsOrigin ?? '*' }));
  const accessLog = opts.accessLog ?? 'combined';
  if (accessLog) app.use(morgan(accessLog));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/bookings', createBookingsRouter(container.bookings));
  app.use('/api/visits', createVisitsRouter({ tracking: container.tracking, bookings: container.bookings }));
  app.use('/api/ingest', createIngestRouter(container.tracking));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      store: container.storeKind,
      statusSync: container.synchronizer.isRunning ? 'subscribed' : 'stopped',
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>, container: AppContainer) {
  const httpServer = createServer(app);
  const wsGateway = new WsGateway(httpServer);
  container.publisher.attach(wsGateway);
  return { httpServer, wsGateway };
}
