import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { TelemetryExportPort } from '@tc-telemetry/domain';

export const RAW_CSV_FILENAME = 'telemetry_data.csv';
export const PROCESSED_CSV_FILENAME = 'processed_telemetry_data.csv';

function sendCsv(res: Response, filename: string, csv: string): void {
  res.setHeader('Content-Disposition', `attachment; filename=${filename}`);
  res.type('text/csv').send(csv);
}

export function createRecordsRouter(exporter: TelemetryExportPort): Router {
  const router = Router();

  /** GET /records: every stored record, newest first */
  router.get('/records', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const items = await exporter.listRecords();
      res.json({ count: items.length, items });
    } catch (err) {
      next(err);
    }
  });

  /** GET /download-csv-raw */
  router.get('/download-csv-raw', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      sendCsv(res, RAW_CSV_FILENAME, await exporter.rawCsv());
    } catch (err) {
      next(err);
    }
  });

  /** GET /download-csv-processed: one record per hour for the latest hours */
  router.get('/download-csv-processed', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      sendCsv(res, PROCESSED_CSV_FILENAME, await exporter.processedCsv());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
