import type { TelemetryRecord } from '@tc-telemetry/domain';

/** Column layout shared by the SQLite and PostgreSQL `telemetry` tables. */
export type TelemetryRow = {
  id: number | string;
  device_id: string;
  longitude: number;
  latitude: number;
  battery: number;
  date: string;
  time: string;
  inserted_at: string;
};

export const TELEMETRY_COLUMNS = 'id, device_id, longitude, latitude, battery, "date", "time", inserted_at';

export function mapTelemetryRow(row: TelemetryRow): TelemetryRecord {
  return {
    id: Number(row.id),
    device_id: row.device_id,
    longitude: Number(row.longitude),
    latitude: Number(row.latitude),
    battery: Number(row.battery),
    date: row.date,
    time: row.time,
    inserted_at: row.inserted_at,
  };
}
