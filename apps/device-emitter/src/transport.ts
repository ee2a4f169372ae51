import { fetch } from 'undici';
import { connect } from 'mqtt';
import type { TelemetryEnvelope } from '@tc-telemetry/domain';

export type EmitTransport = 'mqtt' | 'http';

export interface TelemetryTransport {
  send(envelope: TelemetryEnvelope): Promise<void>;
  close(): Promise<void>;
}

export const TELEMETRY_TOPIC_PREFIX = 'tc-bn/telemetry/';

export function createHttpTransport(apiBaseUrl: string): TelemetryTransport {
  return {
    async send(envelope) {
      const resp = await fetch(`${apiBaseUrl}/ingest`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(envelope),
      });
      if (!resp.ok) {
        const text = await resp.text();
        throw new Error(`ingest failed ${resp.status}: ${text}`);
      }
    },
    async close() {},
  };
}

export function createMqttTransport(brokerUrl: string, deviceId: string): TelemetryTransport {
  const client = connect(brokerUrl, { clientId: `emitter-${deviceId}`, reconnectPeriod: 5_000 });
  client.on('error', (err) => {
    console.error(`[emitter:${deviceId}] mqtt error`, err.message);
  });
  const topic = `${TELEMETRY_TOPIC_PREFIX}${deviceId}`;

  return {
    async send(envelope) {
      await client.publishAsync(topic, JSON.stringify(envelope), { qos: 0 });
    },
    async close() {
      await client.endAsync();
    },
  };
}
