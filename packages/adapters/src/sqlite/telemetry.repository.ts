import type Database from 'better-sqlite3';
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
import { initSchema, openDatabase } from './database.js';

type InsertParams = NewTelemetryRecord & { inserted_at: string };

/**
 * better-sqlite3 is synchronous, so every insert runs to completion before
 * the next one starts; ids come straight from AUTOINCREMENT.
 */
export class SqliteTelemetryRepository implements TelemetryRepositoryPort {
  private readonly insertStmt: Database.Statement<[InsertParams], unknown>;
  private readonly listStmt: Database.Statement<[], TelemetryRow>;

  constructor(
    private readonly db: Database.Database,
    private readonly clock: ClockPort = systemClock,
  ) {
    initSchema(db);
    this.insertStmt = db.prepare<[InsertParams], unknown>(`
      INSERT INTO telemetry (device_id, longitude, latitude, battery, "date", "time", inserted_at)
      VALUES (@device_id, @longitude, @latitude, @battery, @date, @time, @inserted_at)
    `);
    this.listStmt = db.prepare<[], TelemetryRow>(
      `SELECT ${TELEMETRY_COLUMNS} FROM telemetry ORDER BY inserted_at DESC, id DESC`,
    );
  }

  static open(sqlitePath: string, clock?: ClockPort): SqliteTelemetryRepository {
    return new SqliteTelemetryRepository(openDatabase(sqlitePath), clock);
  }

  async insert(record: NewTelemetryRecord): Promise<TelemetryRecord> {
    const params: InsertParams = {
      device_id: record.device_id,
      longitude: record.longitude,
      latitude: record.latitude,
      battery: record.battery,
      date: record.date,
      time: record.time,
      inserted_at: this.clock.now().toISOString(),
    };
    try {
      const result = this.insertStmt.run(params);
      return { ...params, id: Number(result.lastInsertRowid) };
    } catch (err) {
      throw new StorageFailureError('insert', err);
    }
  }

  async list(): Promise<TelemetryRecord[]> {
    try {
      return this.listStmt.all().map(mapTelemetryRow);
    } catch (err) {
      throw new StorageFailureError('list', err);
    }
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
      console.log('[sqlite] database closed');
    }
  }
}
