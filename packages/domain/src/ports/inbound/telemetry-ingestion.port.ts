import type { TelemetrySource } from '../../entities/telemetry-envelope.js';
import type { TelemetryRecord } from '../../entities/telemetry-record.js';

export interface TelemetryIngestionPort {
  /**
   * Validate, decode and store one inbound message body.
   * Rejects with the domain error that stopped it.
   */
  ingest(raw: unknown, source: TelemetrySource): Promise<TelemetryRecord>;
}
