import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';

export const IN_MEMORY = ':memory:';

export function openDatabase(sqlitePath: string): Database.Database {
  if (sqlitePath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(sqlitePath), { recursive: true });
  }

  const db = new Database(sqlitePath);

  // Readers (HTTP exports) run alongside the single writer
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');

  return db;
}

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS telemetry (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      device_id   TEXT    NOT NULL,
      longitude   REAL    NOT NULL,
      latitude    REAL    NOT NULL,
      battery     INTEGER NOT NULL CHECK (battery BETWEEN 0 AND 255),
      "date"      TEXT    NOT NULL,
      "time"      TEXT    NOT NULL,
      inserted_at TEXT    NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_telemetry_inserted_at
    ON telemetry (inserted_at);
  `);
}
