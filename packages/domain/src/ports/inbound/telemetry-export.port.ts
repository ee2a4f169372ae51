import type { DownsampledRecord, TelemetryRecord } from '../../entities/telemetry-record.js';

export interface TelemetryExportPort {
  listRecords(): Promise<TelemetryRecord[]>;
  /** Hourly samples of the most recent history; see `downsampleHourly`. */
  listProcessed(): Promise<DownsampledRecord[]>;
  rawCsv(): Promise<string>;
  processedCsv(): Promise<string>;
}
