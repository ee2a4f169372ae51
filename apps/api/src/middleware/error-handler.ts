import type { Request, Response, NextFunction } from 'express';
import { StorageFailureError, TelemetryError } from '@tc-telemetry/domain';

const INTERNAL_ERROR = 'Internal server error';

function isJsonParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

function clientErrorStatus(err: Error): number | null {
  if (!('status' in err) || typeof err.status !== 'number') return null;
  return err.status >= 400 && err.status < 500 ? err.status : null;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (isJsonParseError(err)) {
    res.status(400).json({ error: 'Invalid JSON' });
    return;
  }
  if (err instanceof StorageFailureError) {
    console.error('[api] storage failure', err);
    res.status(err.status).json({ error: INTERNAL_ERROR });
    return;
  }
  if (err instanceof TelemetryError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (err instanceof Error) {
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ error: err.message });
      return;
    }
  }
  console.error('[api] unhandled error', err);
  res.status(500).json({ error: INTERNAL_ERROR });
}
