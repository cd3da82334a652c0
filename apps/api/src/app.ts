import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';

import { AnalyticsEngine } from '@fleet-ledger/domain';
import type { FleetAnalyticsPort, RecordStorePort } from '@fleet-ledger/domain';
import { createAnalyticsRouter } from './controllers/analytics.controller.js';
import { createRosterRouters } from './controllers/roster.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import type { AppConfig } from './config/app-config.js';
import type { StoreKind } from './services/record-store.factory.js';

export interface AppDependencies {
  store: RecordStorePort;
  storeKind: StoreKind;
  /** Defaults to an AnalyticsEngine over `store` */
  analytics?: FleetAnalyticsPort;
}

export type HttpOptions = Pick<AppConfig, 'corsOrigin' | 'logFormat'>;

const DEFAULT_HTTP_OPTIONS: HttpOptions = { corsOrigin: '*', logFormat: 'combined' };

export function buildApp(
  deps: AppDependencies,
  options: HttpOptions = DEFAULT_HTTP_OPTIONS,
): ReturnType<typeof express> {
  const app = express();
  const analytics = deps.analytics ?? new AnalyticsEngine(deps.store);
  const { driversRouter, vehiclesRouter, purposesRouter } = createRosterRouters(deps.store);

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin }));
  if (options.logFormat) app.use(morgan(options.logFormat));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/analytics', createAnalyticsRouter({ analytics, store: deps.store }));
  app.use('/api/drivers', driversRouter);
  app.use('/api/vehicles', vehiclesRouter);
  app.use('/api/purposes', purposesRouter);

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      store: deps.storeKind,
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>) {
  return createServer(app);
}
