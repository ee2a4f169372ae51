import 'dotenv/config';
import { createServer } from 'node:http';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';
import { openRepository } from './config/storage.js';
import { createBusMessageHandler, TelemetrySubscriber } from './mqtt/telemetry-subscriber.js';
import { TelemetryExportService } from './services/export/telemetry-export.service.js';
import { TelemetryIngestionService } from './services/ingestion/telemetry-ingestion.service.js';

async function main() {
  const config = loadConfig();

  const repository = await openRepository(config.storage);
  const ingestion = new TelemetryIngestionService(repository);
  const exporter = new TelemetryExportService(repository, config.processedHours);

  // A broker that is down is not fatal; the client keeps retrying in the background
  let subscriber: TelemetrySubscriber | null = null;
  if (config.mqtt.enabled) {
    subscriber = new TelemetrySubscriber(config.mqtt, createBusMessageHandler(ingestion));
    subscriber.start();
  } else {
    console.log('[server] MQTT disabled via MQTT_ENABLED');
  }

  const app = buildApp({
    ingestion,
    exporter,
    corsOrigin: config.corsOrigin,
    mqttState: () => subscriber?.state() ?? 'disabled',
  });
  const httpServer = createServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[server] shutting down (${signal})...`);
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    await subscriber?.stop();
    await repository.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
