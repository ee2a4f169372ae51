import type { TelemetryRepositoryPort } from '@tc-telemetry/domain';
import { createPool, PgTelemetryRepository, SqliteTelemetryRepository } from '@tc-telemetry/adapters';
import type { StorageConfig } from './env.js';

/** Open the configured store; the caller closes it on shutdown. */
export async function openRepository(storage: StorageConfig): Promise<TelemetryRepositoryPort> {
  if (storage.kind === 'postgres') {
    const repository = new PgTelemetryRepository(createPool(storage.connectionString));
    await repository.init();
    console.log('[server] postgres storage ready');
    return repository;
  }

  const repository = SqliteTelemetryRepository.open(storage.path);
  console.log(`[server] sqlite storage ready at ${storage.path}`);
  return repository;
}
