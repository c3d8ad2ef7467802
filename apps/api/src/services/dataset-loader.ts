import path from 'node:path';
import { readDatasetFile } from '@traffic-vault/adapters';
import { deserializeDataset } from '@traffic-vault/domain';
import type { DatasetSummary, SecureDomainPort } from '@traffic-vault/domain';
import { datasetUploadSchema } from '../schemas/dataset.schema.js';

/** Registers a dataset file (as written by the trace generator) with the domain. */
export async function preloadDataset(domain: SecureDomainPort, filePath: string): Promise<DatasetSummary> {
  const body = datasetUploadSchema.parse(await readDatasetFile(filePath));
  const name = body.name ?? path.basename(filePath, path.extname(filePath));
  return domain.uploadDataset(name, deserializeDataset(body.drivers));
}
