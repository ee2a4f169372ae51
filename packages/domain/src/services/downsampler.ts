import type { DownsampledRecord, TelemetryRecord } from '../entities/telemetry-record.js';
import { InvalidTimestampError } from '../errors.js';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

export const DEFAULT_DOWNSAMPLE_HOURS = 12;

export interface DownsampleOptions {
  /** Maximum number of hour buckets returned, most recent first. */
  hours?: number;
}

const TIMESTAMP =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2}) (\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(?:([Zz])|([+-])(\d{2}):?(\d{2}))?$/;

/**
 * Parse a sender `date` + `time` pair into epoch milliseconds.
 * Without a zone suffix the value is a naive wall-clock time placed on the UTC
 * axis. A trailing `Z` or `±HH:MM` / `±HHMM` offset is shifted to UTC.
 * Fractions finer than a millisecond are truncated.
 */
export function parseRecordTimestamp(date: string, time: string, recordId?: number): number {
  const match = TIMESTAMP.exec(`${date.trim()} ${time.trim()}`);
  if (!match) throw new InvalidTimestampError(date, time, recordId);

  const [, y, mo, d, h, mi, s, frac, , sign, offH, offM] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = s === undefined ? 0 : Number(s);
  const millis = frac === undefined ? 0 : Number(frac.slice(0, 3).padEnd(3, '0'));

  const wallClock = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const check = new Date(wallClock);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    throw new InvalidTimestampError(date, time, recordId);
  }

  if (sign === undefined) return wallClock;

  const offsetHours = Number(offH);
  const offsetMins = Number(offM);
  if (offsetHours > 23 || offsetMins > 59) {
    throw new InvalidTimestampError(date, time, recordId);
  }
  const offsetMs = (offsetHours * 60 + offsetMins) * MINUTE_MS;
  return sign === '-' ? wallClock + offsetMs : wallClock - offsetMs;
}

/** Nearest hour boundary; an exact half hour rounds up. */
export function nearestHour(ms: number): number {
  return Math.floor((ms + HOUR_MS / 2) / HOUR_MS) * HOUR_MS;
}

interface Candidate {
  record: TelemetryRecord;
  datetime: number;
  hour: number;
  distance: number;
}

/**
 * One real record per hour boundary, picked by nearest-neighbour snapping,
 * for the most recent `hours` distinct boundaries present in the data.
 * Hours without data are absent rather than filled.
 *
 * Equal distances keep the later sender timestamp; identical timestamps keep
 * the record seen first in `records`.
 * Any unparseable `date`/`time` aborts with {@link InvalidTimestampError}.
 */
export function downsampleHourly(
  records: readonly TelemetryRecord[],
  options: DownsampleOptions = {},
): DownsampledRecord[] {
  const limit = options.hours ?? DEFAULT_DOWNSAMPLE_HOURS;
  const buckets = new Map<number, Candidate>();

  for (const record of records) {
    const datetime = parseRecordTimestamp(record.date, record.time, record.id);
    const hour = nearestHour(datetime);
    const distance = Math.abs(datetime - hour);

    const best = buckets.get(hour);
    if (!best || distance < best.distance || (distance === best.distance && datetime > best.datetime)) {
      buckets.set(hour, { record, datetime, hour, distance });
    }
  }

  return [...buckets.values()]
    .sort((a, b) => b.hour - a.hour)
    .slice(0, Math.max(0, limit))
    .map(({ record }) => ({
      device_id: record.device_id,
      longitude: record.longitude,
      latitude: record.latitude,
      battery: record.battery,
      date: record.date,
      time: record.time,
      inserted_at: record.inserted_at,
    }));
}
