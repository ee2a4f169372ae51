import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

/** One pool per process; the caller owns it and ends it on shutdown. */
export function createPool(connectionString: string): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: 'tc-telemetry-api',
  });
  pool.on('error', (err) => {
    console.error('[pg-pool] unexpected error on idle client', err);
  });
  return pool;
}
