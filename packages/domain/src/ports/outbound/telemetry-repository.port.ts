import type { NewTelemetryRecord, TelemetryRecord } from '../../entities/telemetry-record.js';

/**
 * Append-only telemetry store.
 * Implementations wrap driver errors in `StorageFailureError`.
 */
export interface TelemetryRepositoryPort {
  /** Assigns the next id and stamps `inserted_at`. */
  insert(record: NewTelemetryRecord): Promise<TelemetryRecord>;
  /** Every record, newest `inserted_at` first (ties: highest id first). */
  list(): Promise<TelemetryRecord[]>;
  close(): Promise<void>;
}
