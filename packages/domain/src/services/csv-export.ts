import type { DownsampledRecord } from '../entities/telemetry-record.js';

export const TELEMETRY_CSV_HEADER = 'Device ID,Longitude,Latitude,Battery,Date,Time,Inserted At';

/**
 * Render records as CSV, one line each, in the order given.
 * Fields are joined as-is: a comma inside `device_id`, `date` or `time` is not quoted.
 */
export function toTelemetryCsv(records: readonly DownsampledRecord[]): string {
  const lines = records.map((r) =>
    [r.device_id, r.longitude, r.latitude, r.battery, r.date, r.time, r.inserted_at].join(','),
  );
  return [TELEMETRY_CSV_HEADER, ...lines].join('\n') + '\n';
}
