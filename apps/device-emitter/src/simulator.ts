import type { DecodedPayload, TelemetryEnvelope } from '@tc-telemetry/domain';
import { encodePayload } from '@tc-telemetry/domain';
import { seededJitter } from './jitter.js';
import type { Jitter } from './jitter.js';

export interface SimulatorOptions {
  startLat: number;
  startLng: number;
  seed: number;
  /** Battery points lost per reading. */
  drainPerTick?: number;
}

// The payload carries unsigned whole degrees, so the walk stays in [0, 255)
const MIN_COORD = 0;
const MAX_COORD = 254.99;
const STEP_DEG = 0.01;

function clamp(value: number): number {
  return Math.min(MAX_COORD, Math.max(MIN_COORD, value));
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** Local calendar date as `YYYY-MM-DD`. */
export function formatDate(d: Date): string {
  return `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Local wall-clock time as `HH:MM:SS`. */
export function formatTime(d: Date): string {
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export function buildEnvelope(deviceId: string, reading: DecodedPayload, at: Date): TelemetryEnvelope {
  return {
    id: deviceId,
    payload: encodePayload(reading),
    date: formatDate(at),
    time: formatTime(at),
  };
}

/**
 * Random-walk position and a draining battery that recharges to 100 when empty.
 */
export class DeviceSimulator {
  private readonly jitter: Jitter;
  private lat: number;
  private lng: number;
  private battery = 100;

  constructor(private readonly options: SimulatorOptions) {
    this.jitter = seededJitter(options.seed);
    this.lat = clamp(options.startLat);
    this.lng = clamp(options.startLng);
  }

  step(): DecodedPayload {
    this.lat = clamp(this.lat + this.jitter(STEP_DEG));
    this.lng = clamp(this.lng + this.jitter(STEP_DEG));

    const drain = this.options.drainPerTick ?? 1;
    this.battery = this.battery - drain < 0 ? 100 : this.battery - drain;

    return {
      longitude: Math.round(this.lng * 100) / 100,
      latitude: Math.round(this.lat * 100) / 100,
      battery: this.battery,
    };
  }
}
