// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/telemetry-record.js';
export * from './entities/telemetry-envelope.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Codec & Services ─────────────────────────────────────────────────────────
export * from './codec/payload-codec.js';
export * from './services/record-normalizer.js';
export * from './services/downsampler.js';
export * from './services/csv-export.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-ingestion.port.js';
export * from './ports/inbound/telemetry-export.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/telemetry-repository.port.js';
export * from './ports/outbound/clock.port.js';
