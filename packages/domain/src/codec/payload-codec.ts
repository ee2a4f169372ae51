import type { DecodedPayload } from '../entities/telemetry-record.js';
import { MalformedPayloadError } from '../errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Payload layout (5 bytes, 10 hex digits, one byte per pair):
//
//   [0:2] longitude integral   [2:4] longitude hundredths
//   [4:6] latitude integral    [6:8] latitude hundredths
//   [8:10] battery
// ─────────────────────────────────────────────────────────────────────────────

export const PAYLOAD_LENGTH = 10;

const HEX_PAYLOAD = /^[0-9A-F]{10}$/;

function parsePair(payload: string, offset: number): number {
  const pair = payload.slice(offset, offset + 2);
  const value = Number.parseInt(pair, 16);
  if (!/^[0-9A-F]{2}$/.test(pair) || Number.isNaN(value)) {
    throw new MalformedPayloadError(payload, `"${pair}" at offset ${offset} is not a hex byte`);
  }
  return value;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function decodePayload(payload: string): DecodedPayload {
  const normalized = payload.trim().toUpperCase();
  if (normalized.length !== PAYLOAD_LENGTH) {
    throw new MalformedPayloadError(normalized, `expected ${PAYLOAD_LENGTH} hex characters, got ${normalized.length}`);
  }
  if (!HEX_PAYLOAD.test(normalized)) {
    throw new MalformedPayloadError(normalized, 'contains non-hex characters');
  }

  const longitude = parsePair(normalized, 0) + parsePair(normalized, 2) / 100;
  const latitude = parsePair(normalized, 4) + parsePair(normalized, 6) / 100;
  const battery = parsePair(normalized, 8);

  return {
    longitude: round2(longitude),
    latitude: round2(latitude),
    battery,
  };
}

function toByte(value: number, label: string): string {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`${label} must be an integer in [0, 255], got ${value}`);
  }
  return value.toString(16).toUpperCase().padStart(2, '0');
}

function encodeCoordinate(value: number, label: string): string {
  const hundredths = Math.round(value * 100);
  const integral = Math.floor(hundredths / 100);
  return toByte(integral, `${label} integral part`) + toByte(hundredths - integral * 100, `${label} fraction`);
}

/** Inverse of {@link decodePayload} for values it can represent. */
export function encodePayload(reading: DecodedPayload): string {
  return (
    encodeCoordinate(reading.longitude, 'longitude') +
    encodeCoordinate(reading.latitude, 'latitude') +
    toByte(reading.battery, 'battery')
  );
}
