/** Readings carried in the 10-digit hex payload. */
export interface DecodedPayload {
  readonly longitude: number;
  readonly latitude: number;
  readonly battery: number;
}

export interface TelemetryRecord extends DecodedPayload {
  readonly id: number;
  readonly device_id: string;
  readonly date: string;
  readonly time: string;
  readonly inserted_at: string;
}

/** A normalized reading before the store has assigned `id` and `inserted_at`. */
export type NewTelemetryRecord = Omit<TelemetryRecord, 'id' | 'inserted_at'>;

export type DownsampledRecord = Omit<TelemetryRecord, 'id'>;
