/**
 * Repository backend factory
 * Select via STORE_BACKEND env var: memory | postgres
 * (default: postgres when DATABASE_URL is set, memory otherwise)
 */

import {
  InMemoryAnalysisRequestRepository,
  InMemoryDatasetRepository,
  PgAnalysisRequestRepository,
  PgDatasetRepository,
} from '@traffic-vault/adapters';
import type { AnalysisRequestRepositoryPort, DatasetRepositoryPort } from '@traffic-vault/domain';

export type StoreBackend = 'memory' | 'postgres';

export interface Repositories {
  datasets: DatasetRepositoryPort;
  requests: AnalysisRequestRepositoryPort;
}

export function getStoreBackend(env: NodeJS.ProcessEnv = process.env): StoreBackend {
  const raw = (env['STORE_BACKEND'] ?? '').toLowerCase();
  if (raw === 'postgres') return 'postgres';
  if (raw === 'memory') return 'memory';
  return env['DATABASE_URL'] ? 'postgres' : 'memory';
}

export function createRepositories(backend: StoreBackend): Repositories {
  switch (backend) {
    case 'postgres':
      return {
        datasets: new PgDatasetRepository(),
        requests: new PgAnalysisRequestRepository(),
      };

    case 'memory':
    default:
      return {
        datasets: new InMemoryDatasetRepository(),
        requests: new InMemoryAnalysisRequestRepository(),
      };
  }
}
