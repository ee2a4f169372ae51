import type {
  ClockPort,
  NewTelemetryRecord,
  TelemetryRecord,
  TelemetryRepositoryPort,
} from '@tc-telemetry/domain';
import { StorageFailureError } from '@tc-telemetry/domain';
import { systemClock } from '../clock/deterministic-clock.js';
import { mapTelemetryRow, TELEMETRY_COLUMNS } from '../shared/telemetry-row.js';
import type { TelemetryRow } from '../shared/telemetry-row.js';
import type { DbPool } from './pool.js';

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS telemetry (
    id          SERIAL PRIMARY KEY,
    device_id   TEXT             NOT NULL,
    longitude   DOUBLE PRECISION NOT NULL,
    latitude    DOUBLE PRECISION NOT NULL,
    battery     SMALLINT         NOT NULL CHECK (battery BETWEEN 0 AND 255),
    "date"      TEXT             NOT NULL,
    "time"      TEXT             NOT NULL,
    inserted_at TEXT             NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_telemetry_inserted_at ON telemetry (inserted_at);
`;

export class PgTelemetryRepository implements TelemetryRepositoryPort {
  /** Tail of the write queue; inserts run one at a time in call order. */
  private writeTail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly pool: DbPool,
    private readonly clock: ClockPort = systemClock,
  ) {}

  async init(): Promise<void> {
    try {
      await this.pool.query(CREATE_TABLE);
    } catch (err) {
      throw new StorageFailureError('schema setup', err);
    }
  }

  insert(record: NewTelemetryRecord): Promise<TelemetryRecord> {
    const run = this.writeTail.then(() => this.insertNow(record));
    // Failures reach the caller through `run`; the queue itself keeps going.
    this.writeTail = run.catch(() => undefined);
    return run;
  }

  private async insertNow(record: NewTelemetryRecord): Promise<TelemetryRecord> {
    try {
      const { rows } = await this.pool.query<TelemetryRow>(
        `INSERT INTO telemetry (device_id, longitude, latitude, battery, "date", "time", inserted_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${TELEMETRY_COLUMNS}`,
        [
          record.device_id,
          record.longitude,
          record.latitude,
          record.battery,
          record.date,
          record.time,
          this.clock.now().toISOString(),
        ],
      );
      const [row] = rows;
      if (!row) throw new Error('INSERT returned no row');
      return mapTelemetryRow(row);
    } catch (err) {
      throw new StorageFailureError('insert', err);
    }
  }

  async list(): Promise<TelemetryRecord[]> {
    try {
      const { rows } = await this.pool.query<TelemetryRow>(
        `SELECT ${TELEMETRY_COLUMNS} FROM telemetry ORDER BY inserted_at DESC, id DESC`,
      );
      return rows.map(mapTelemetryRow);
    } catch (err) {
      throw new StorageFailureError('list', err);
    }
  }

  async close(): Promise<void> {
    await this.writeTail;
    await this.pool.end();
  }
}
