// ─── SQLite Adapter ───────────────────────────────────────────────────────────
export { openDatabase, initSchema, IN_MEMORY } from './sqlite/database.js';
export { SqliteTelemetryRepository } from './sqlite/telemetry.repository.js';

// ─── PostgreSQL Adapter ───────────────────────────────────────────────────────
export { createPool } from './postgres/pool.js';
export type { DbPool } from './postgres/pool.js';
export { PgTelemetryRepository } from './postgres/telemetry.repository.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { DeterministicClock, systemClock } from './clock/deterministic-clock.js';
