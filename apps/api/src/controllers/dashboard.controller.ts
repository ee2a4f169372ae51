import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { TelemetryExportPort } from '@tc-telemetry/domain';
import { renderDashboard } from '../views/dashboard.js';

export function createDashboardRouter(exporter: TelemetryExportPort): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.type('html').send(renderDashboard(await exporter.listRecords()));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
