import type {
  TelemetryIngestionPort,
  TelemetryRecord,
  TelemetryRepositoryPort,
  TelemetrySource,
} from '@tc-telemetry/domain';
import { normalize } from '@tc-telemetry/domain';

export class TelemetryIngestionService implements TelemetryIngestionPort {
  constructor(private readonly repository: TelemetryRepositoryPort) {}

  async ingest(raw: unknown, source: TelemetrySource): Promise<TelemetryRecord> {
    const record = normalize(raw);
    const stored = await this.repository.insert(record);
    console.log(
      `[ingest] stored ${source} telemetry id=${stored.id} device_id=${stored.device_id} ` +
        `lon=${stored.longitude} lat=${stored.latitude} battery=${stored.battery}`,
    );
    return stored;
  }
}
