import type {
  DownsampledRecord,
  TelemetryExportPort,
  TelemetryRecord,
  TelemetryRepositoryPort,
} from '@tc-telemetry/domain';
import { downsampleHourly, toTelemetryCsv } from '@tc-telemetry/domain';

export class TelemetryExportService implements TelemetryExportPort {
  constructor(
    private readonly repository: TelemetryRepositoryPort,
    private readonly hours?: number,
  ) {}

  listRecords(): Promise<TelemetryRecord[]> {
    return this.repository.list();
  }

  async listProcessed(): Promise<DownsampledRecord[]> {
    return downsampleHourly(await this.repository.list(), { hours: this.hours });
  }

  async rawCsv(): Promise<string> {
    return toTelemetryCsv(await this.listRecords());
  }

  async processedCsv(): Promise<string> {
    return toTelemetryCsv(await this.listProcessed());
  }
}
