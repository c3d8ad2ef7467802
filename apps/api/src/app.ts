import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { SecureDomainPort } from '@traffic-vault/domain';

import { createDatasetsRouter } from './controllers/datasets.controller.js';
import { createRequestsRouter } from './controllers/requests.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppDependencies {
  domain: SecureDomainPort;
  /** Reported by /healthz. */
  store?: string;
}

export function buildApp({ domain, store = 'memory' }: AppDependencies): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: process.env['CORS_ORIGIN'] ?? '*' }));
  app.use(
    morgan(process.env['LOG_FORMAT'] ?? 'combined', {
      skip: () => process.env['NODE_ENV'] === 'test',
    }),
  );
  // Dataset uploads carry every sample.
  app.use(express.json({ limit: '25mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/datasets', createDatasetsRouter(domain));
  app.use('/api/requests', createRequestsRouter(domain));

  app.get('/api/analyses', (_req, res) => {
    res.json({ data: domain.listAnalyses() });
  });

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString(), store });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
