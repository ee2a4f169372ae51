/**
 * Error taxonomy for the ingestion and export pipeline.
 * `status` is the HTTP status the API maps each error to.
 */
export abstract class TelemetryError extends Error {
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedPayloadError extends TelemetryError {
  readonly status = 400;

  constructor(
    readonly payload: string,
    reason: string,
  ) {
    super(`Invalid hex payload: ${payload} (${reason})`);
  }
}

export class MissingFieldError extends TelemetryError {
  readonly status = 400;

  constructor(readonly field: string) {
    super(`Missing required field: ${field}`);
  }
}

export class InvalidEnvelopeError extends TelemetryError {
  readonly status = 400;

  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
  }
}

export class InvalidTimestampError extends TelemetryError {
  readonly status = 422;

  constructor(
    readonly date: string,
    readonly time: string,
    readonly recordId?: number,
  ) {
    const ref = recordId === undefined ? '' : ` (record ${recordId})`;
    super(`Invalid timestamp "${date} ${time}"${ref}`);
  }
}

/** Raised by storage adapters; the message is never sent to HTTP clients. */
export class StorageFailureError extends TelemetryError {
  readonly status = 500;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Storage ${operation} failed: ${detail}`, { cause });
  }
}
