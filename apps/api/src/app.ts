import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { TelemetryExportPort, TelemetryIngestionPort } from '@tc-telemetry/domain';

import { createIngestRouter } from './controllers/ingest.controller.js';
import { createRecordsRouter } from './controllers/records.controller.js';
import { createDashboardRouter } from './controllers/dashboard.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import type { MqttConnectionState } from './mqtt/telemetry-subscriber.js';

export interface AppDependencies {
  ingestion: TelemetryIngestionPort;
  exporter: TelemetryExportPort;
  corsOrigin?: string;
  mqttState?: () => MqttConnectionState;
}

export function buildApp(deps: AppDependencies): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  app.use(morgan('combined', { skip: () => process.env['NODE_ENV'] === 'test' }));
  app.use(express.json({ limit: '64kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use(createIngestRouter(deps.ingestion));
  app.use(createRecordsRouter(deps.exporter));
  app.use(createDashboardRouter(deps.exporter));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      mqtt: deps.mqttState?.() ?? 'disabled',
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
