/**
 * PostgreSQL repository tests
 *
 * The pool is replaced with a jest.fn stand-in; no database is contacted.
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import type { NewTelemetryRecord } from '@tc-telemetry/domain';
import { StorageFailureError } from '@tc-telemetry/domain';
import type { DbPool } from '../index.js';
import { DeterministicClock, PgTelemetryRepository } from '../index.js';

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyFn = (...args: any[]) => any;

const mockQuery = jest.fn<AnyFn>();
const mockEnd = jest.fn<AnyFn>();
const pool = { query: mockQuery, end: mockEnd } as unknown as DbPool;

const RECORD: NewTelemetryRecord = {
  device_id: 'ESP32_A1B2C3',
  longitude: 30.1,
  latitude: 60.25,
  battery: 100,
  date: '2024-05-01',
  time: '11:59:58',
};

function storedRow(id: number | string, insertedAt: string) {
  return { ...RECORD, id, inserted_at: insertedAt };
}

let repo: PgTelemetryRepository;

beforeEach(() => {
  jest.clearAllMocks();
  mockQuery.mockReset();
  repo = new PgTelemetryRepository(pool, new DeterministicClock(Date.UTC(2024, 4, 1, 12)));
});

describe('PgTelemetryRepository.init', () => {
  it('creates the telemetry table', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [] });
    await repo.init();
    expect(String(mockQuery.mock.calls[0]?.[0])).toContain('CREATE TABLE IF NOT EXISTS telemetry');
  });

  it('wraps connection errors', async () => {
    mockQuery.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    await expect(repo.init()).rejects.toThrow('Storage schema setup failed: ECONNREFUSED');
  });
});

describe('PgTelemetryRepository.insert', () => {
  it('sends the record with the clock timestamp and maps the returned row', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [storedRow('7', '2024-05-01T12:00:00.000Z')] });

    const stored = await repo.insert(RECORD);

    expect(stored).toEqual({ ...RECORD, id: 7, inserted_at: '2024-05-01T12:00:00.000Z' });
    expect(mockQuery.mock.calls[0]?.[1]).toEqual([
      'ESP32_A1B2C3',
      30.1,
      60.25,
      100,
      '2024-05-01',
      '11:59:58',
      '2024-05-01T12:00:00.000Z',
    ]);
  });

  it('runs inserts one at a time in call order', async () => {
    let open = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    mockQuery
      .mockImplementationOnce(async () => {
        await gate;
        return { rows: [storedRow(1, 'a')] };
      })
      .mockResolvedValueOnce({ rows: [storedRow(2, 'b')] });

    const first = repo.insert(RECORD);
    const second = repo.insert(RECORD);
    await new Promise((resolve) => setImmediate(resolve));
    expect(mockQuery).toHaveBeenCalledTimes(1);

    open();
    const ids = (await Promise.all([first, second])).map((r) => r.id);
    expect(ids).toEqual([1, 2]);
    expect(mockQuery).toHaveBeenCalledTimes(2);
  });

  it('reports a failed insert and keeps serving later ones', async () => {
    mockQuery
      .mockRejectedValueOnce(new Error('deadlock detected'))
      .mockResolvedValueOnce({ rows: [storedRow(2, 'b')] });

    const failed = repo.insert(RECORD);
    const next = repo.insert(RECORD);

    await expect(failed).rejects.toBeInstanceOf(StorageFailureError);
    await expect(next).resolves.toMatchObject({ id: 2 });
  });

  it('treats an empty RETURNING result as a failure', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [] });
    await expect(repo.insert(RECORD)).rejects.toThrow('Storage insert failed: INSERT returned no row');
  });
});

describe('PgTelemetryRepository.list / close', () => {
  it('orders newest first and converts numeric columns', async () => {
    mockQuery.mockResolvedValueOnce({
      rows: [storedRow('2', '2024-05-01T12:00:01.000Z'), storedRow('1', '2024-05-01T12:00:00.000Z')],
    });

    const rows = await repo.list();

    expect(String(mockQuery.mock.calls[0]?.[0])).toContain('ORDER BY inserted_at DESC, id DESC');
    expect(rows.map((r) => r.id)).toEqual([2, 1]);
  });

  it('ends the pool', async () => {
    mockEnd.mockResolvedValueOnce(undefined);
    await repo.close();
    expect(mockEnd).toHaveBeenCalledTimes(1);
  });
});
