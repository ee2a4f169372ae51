import 'dotenv/config';
import { buildEnvelope, DeviceSimulator } from './simulator.js';
import { createHttpTransport, createMqttTransport } from './transport.js';
import type { TelemetryTransport } from './transport.js';

/**
 * Device emitter: one process per simulated device.
 *
 * Env vars:
 *   DEVICE_ID          Device identifier, e.g. ESP32_A1B2C3 (required)
 *   EMIT_TRANSPORT     mqtt | http (default: mqtt)
 *   MQTT_URL           Broker URL (default: mqtt://localhost:1883)
 *   API_BASE_URL       Base URL of the API for http (default: http://localhost:8000)
 *   EMIT_INTERVAL_MS   Emit interval in ms (default: 5000)
 *   START_LAT          Starting latitude  (default: 60.17)
 *   START_LNG          Starting longitude (default: 24.94)
 *   SEED               Random-walk seed (default: 42)
 */

const DEVICE_ID = process.env['DEVICE_ID'];
const EMIT_TRANSPORT = process.env['EMIT_TRANSPORT'] ?? 'mqtt';
const MQTT_URL = process.env['MQTT_URL'] ?? 'mqtt://localhost:1883';
const API_BASE_URL = process.env['API_BASE_URL'] ?? 'http://localhost:8000';
const EMIT_INTERVAL_MS = parseInt(process.env['EMIT_INTERVAL_MS'] ?? '5000', 10);

function createTransport(deviceId: string): TelemetryTransport {
  switch (EMIT_TRANSPORT) {
    case 'http':
      return createHttpTransport(API_BASE_URL);
    case 'mqtt':
      return createMqttTransport(MQTT_URL, deviceId);
    default:
      throw new Error(`EMIT_TRANSPORT must be mqtt or http, got ${EMIT_TRANSPORT}`);
  }
}

function main(deviceId: string): void {
  const transport = createTransport(deviceId);
  const simulator = new DeviceSimulator({
    startLat: parseFloat(process.env['START_LAT'] ?? '60.17'),
    startLng: parseFloat(process.env['START_LNG'] ?? '24.94'),
    seed: parseInt(process.env['SEED'] ?? '42', 10),
  });

  async function emit(): Promise<void> {
    const envelope = buildEnvelope(deviceId, simulator.step(), new Date());
    try {
      await transport.send(envelope);
      console.log(`[emitter:${deviceId}] sent ${envelope.payload} ${envelope.date} ${envelope.time}`);
    } catch (err) {
      console.error(`[emitter:${deviceId}] send failed`, err instanceof Error ? err.message : String(err));
    }
  }

  console.log(`[emitter] starting for device ${deviceId} via ${EMIT_TRANSPORT}`);
  const timer = setInterval(() => void emit(), EMIT_INTERVAL_MS);

  const stop = () => {
    clearInterval(timer);
    transport
      .close()
      .catch((err) => console.error(`[emitter:${deviceId}] close failed`, err))
      .finally(() => process.exit(0));
  };
  process.on('SIGTERM', stop);
  process.on('SIGINT', stop);
}

if (!DEVICE_ID) {
  console.error('[emitter] DEVICE_ID is required');
  process.exit(1);
} else {
  main(DEVICE_ID);
}
