import { z } from 'zod';
import type { TelemetryEnvelope } from '../entities/telemetry-envelope.js';
import type { NewTelemetryRecord } from '../entities/telemetry-record.js';
import { decodePayload } from '../codec/payload-codec.js';
import { InvalidEnvelopeError, MissingFieldError } from '../errors.js';

/** Checked in this order; the first absent one is reported. */
export const REQUIRED_ENVELOPE_FIELDS = ['id', 'payload', 'date', 'time'] as const;

const objectSchema = z.record(z.unknown());

const envelopeSchema = z.object({
  id: z.string().min(1, 'must not be empty'),
  payload: z.string(),
  date: z.string(),
  time: z.string(),
});

/**
 * Convert a transport body (parsed JSON from MQTT or HTTP) into a typed envelope.
 * `null` counts as missing, matching what JSON senders mean by it.
 */
export function parseEnvelope(raw: unknown): TelemetryEnvelope {
  const object = objectSchema.safeParse(raw);
  if (!object.success) {
    throw new InvalidEnvelopeError('Telemetry message must be a JSON object');
  }

  for (const field of REQUIRED_ENVELOPE_FIELDS) {
    const value = object.data[field];
    if (value === undefined || value === null) {
      throw new MissingFieldError(field);
    }
  }

  const parsed = envelopeSchema.safeParse(object.data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.map(String).join('.') ?? '<root>';
    throw new InvalidEnvelopeError(`Invalid field ${field}: ${issue?.message ?? 'invalid value'}`, field);
  }
  return parsed.data;
}

export function normalizeEnvelope(envelope: TelemetryEnvelope): NewTelemetryRecord {
  const decoded = decodePayload(envelope.payload);
  return {
    device_id: envelope.id,
    longitude: decoded.longitude,
    latitude: decoded.latitude,
    battery: decoded.battery,
    date: envelope.date,
    time: envelope.time,
  };
}

/** Shared by the MQTT and HTTP paths so both store identical records. */
export function normalize(raw: unknown): NewTelemetryRecord {
  return normalizeEnvelope(parseEnvelope(raw));
}
