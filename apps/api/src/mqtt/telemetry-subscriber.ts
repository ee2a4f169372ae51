import { connect } from 'mqtt';
import type { IClientOptions, MqttClient } from 'mqtt';
import type { TelemetryIngestionPort, TelemetryRecord } from '@tc-telemetry/domain';
import type { MqttConfig } from '../config/env.js';

export type MqttConnectionState = 'connected' | 'disconnected' | 'disabled';

/** Resolves to the stored record, or null when the message was dropped. */
export type BusMessageHandler = (topic: string, payload: Buffer) => Promise<TelemetryRecord | null>;

export type MqttConnect = (url: string, options: IClientOptions) => MqttClient;

function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

/**
 * Best-effort, at-most-once handling: every failure is logged with the topic
 * and raw body, then the message is dropped. Never rejects.
 */
export function createBusMessageHandler(ingestion: TelemetryIngestionPort): BusMessageHandler {
  return async (topic, payload) => {
    const body = payload.toString('utf8');
    try {
      const message: unknown = JSON.parse(body);
      const stored = await ingestion.ingest(message, 'mqtt');

      const topicDevice = topic.split('/').pop();
      if (topicDevice && topicDevice !== stored.device_id) {
        console.warn(`[mqtt] topic ${topic} does not match device_id=${stored.device_id}; kept device_id`);
      }
      return stored;
    } catch (err) {
      console.error(`[mqtt] dropped message on ${topic}: ${describeError(err)} body=${body}`);
      return null;
    }
  };
}

/**
 * Owns the MQTT client. Connection, reconnect and backoff are left to the
 * mqtt library; this class only subscribes and forwards messages.
 */
export class TelemetrySubscriber {
  private client: MqttClient | null = null;
  private connected = false;

  constructor(
    private readonly config: Pick<MqttConfig, 'url' | 'topic' | 'clientId'>,
    private readonly handler: BusMessageHandler,
    private readonly connectFn: MqttConnect = connect,
  ) {}

  start(): void {
    if (this.client) return;

    const client = this.connectFn(this.config.url, {
      clientId: this.config.clientId,
      keepalive: 60,
      reconnectPeriod: 5_000,
      connectTimeout: 10_000,
    });
    this.client = client;

    client.on('connect', () => {
      this.connected = true;
      console.log(`[mqtt] connected to ${this.config.url}`);
      client.subscribe(this.config.topic, { qos: 0 }, (err) => {
        if (err) {
          console.error(`[mqtt] subscribe to ${this.config.topic} failed: ${err.message}`);
          return;
        }
        console.log(`[mqtt] subscribed to ${this.config.topic}`);
      });
    });

    client.on('close', () => {
      if (this.connected) console.log('[mqtt] disconnected');
      this.connected = false;
    });

    client.on('reconnect', () => {
      console.log(`[mqtt] reconnecting to ${this.config.url}`);
    });

    client.on('error', (err) => {
      console.warn(`[mqtt] client error (${this.config.url}): ${err.message}`);
    });

    client.on('message', (topic, payload) => {
      void this.handler(topic, payload);
    });
  }

  state(): MqttConnectionState {
    return this.connected ? 'connected' : 'disconnected';
  }

  async stop(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    this.connected = false;
    await client.endAsync();
    console.log('[mqtt] client stopped');
  }
}
