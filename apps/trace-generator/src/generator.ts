import 'dotenv/config';
import path from 'node:path';
import { fetch } from 'undici';
import { z } from 'zod';
import { createRandomSource, writeDatasetFile } from '@traffic-vault/adapters';
import { generateTrafficData, serializeDataset } from '@traffic-vault/domain';
import type { TrafficDatasetFile } from '@traffic-vault/domain';
import { readGeneratorConfig, type GeneratorConfig } from './config.js';

/**
 * Trace generator: simulates commute days for a fleet of drivers, writes the
 * dataset file and, when API_BASE_URL is set, registers it with the data domain.
 * See config.ts for the env vars.
 */

const PROGRESS_EVERY = 20;

const uploadResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
  totalPoints: z.number(),
});

export type UploadedDataset = z.infer<typeof uploadResponseSchema>;

export interface GeneratorOutcome {
  dataset: TrafficDatasetFile;
  uploaded?: UploadedDataset;
}

export async function uploadDataset(
  apiBaseUrl: string,
  name: string,
  dataset: TrafficDatasetFile,
): Promise<UploadedDataset> {
  const resp = await fetch(`${apiBaseUrl}/api/datasets`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ name, ...dataset }),
  });
  if (!resp.ok) {
    const text = await resp.text();
    throw new Error(`dataset upload failed ${resp.status}: ${text}`);
  }
  return uploadResponseSchema.parse(await resp.json());
}

export async function runGenerator(config: GeneratorConfig): Promise<GeneratorOutcome> {
  const { numDrivers, simulationDays } = config;
  console.log(
    `[generator] simulating ${numDrivers} drivers over ${simulationDays} day(s) from ${config.startDate.toISOString().slice(0, 10)}` +
      (config.seed !== undefined ? ` (seed ${config.seed})` : ''),
  );

  const samples = generateTrafficData({
    numDrivers,
    simulationDays,
    startDate: config.startDate,
    rng: createRandomSource(config.seed),
    onDriverComplete: (driverId) => {
      const done = driverId + 1;
      if (done % PROGRESS_EVERY === 0) {
        console.log(`[generator] generated routes for ${done}/${numDrivers} drivers`);
      }
    },
  });

  const dataset = serializeDataset(samples);
  await writeDatasetFile(config.outputFile, dataset);

  const { metadata } = dataset;
  console.log(`[generator] wrote ${metadata.total_points} GPS points for ${metadata.num_drivers} drivers to ${config.outputFile}`);
  if (metadata.date_range) {
    console.log(`[generator] time span ${metadata.date_range.start} .. ${metadata.date_range.end} UTC`);
  }

  if (!config.apiBaseUrl) return { dataset };

  const name = config.datasetName ?? path.basename(config.outputFile, path.extname(config.outputFile));
  const uploaded = await uploadDataset(config.apiBaseUrl, name, dataset);
  console.log(`[generator] registered with the data domain as dataset ${uploaded.id} ("${uploaded.name}")`);
  return { dataset, uploaded };
}

async function main(): Promise<void> {
  await runGenerator(readGeneratorConfig(process.env));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('[generator] failed:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
