import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { TelemetryIngestionPort } from '@tc-telemetry/domain';

export function createIngestRouter(ingestion: TelemetryIngestionPort): Router {
  const router = Router();

  /** POST /ingest: one telemetry envelope per request */
  router.post('/ingest', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const stored = await ingestion.ingest(req.body, 'http');
      res.json({
        status: 'success',
        device_id: stored.device_id,
        longitude: stored.longitude,
        latitude: stored.latitude,
        battery: stored.battery,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
