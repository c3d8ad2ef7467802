import { z } from 'zod';
import { parseTimestamp } from '@traffic-vault/domain';

/**
 * Env vars:
 *   NUM_DRIVERS: simulated drivers (default: 100)
 *   SIMULATION_DAYS: consecutive commute days per driver (default: 1)
 *   START_DATE: first simulated day, YYYY-MM-DD in UTC (default: 2024-01-01)
 *   SEED: integer seed for reproducible traces (default: unseeded)
 *   OUTPUT_FILE: dataset file to write (default: traffic_data.json)
 *   API_BASE_URL: when set, the dataset is also uploaded to the data domain
 *   DATASET_NAME: name to register the upload under (default: output file basename)
 */
const generatorEnvSchema = z.object({
  NUM_DRIVERS: z.coerce.number().int().positive().default(100),
  SIMULATION_DAYS: z.coerce.number().int().positive().default(1),
  START_DATE: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
    .default('2024-01-01'),
  SEED: z.coerce.number().int().optional(),
  OUTPUT_FILE: z.string().min(1).default('traffic_data.json'),
  API_BASE_URL: z.string().url().optional(),
  DATASET_NAME: z.string().min(1).optional(),
});

export interface GeneratorConfig {
  numDrivers: number;
  simulationDays: number;
  startDate: Date;
  seed?: number;
  outputFile: string;
  apiBaseUrl?: string;
  datasetName?: string;
}

export function readGeneratorConfig(env: NodeJS.ProcessEnv = process.env): GeneratorConfig {
  // Blank entries in a .env file mean "unset".
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = generatorEnvSchema.parse(present);
  return {
    numDrivers: parsed.NUM_DRIVERS,
    simulationDays: parsed.SIMULATION_DAYS,
    startDate: parseTimestamp(`${parsed.START_DATE} 00:00:00`),
    seed: parsed.SEED,
    outputFile: parsed.OUTPUT_FILE,
    apiBaseUrl: parsed.API_BASE_URL?.replace(/\/+$/, ''),
    datasetName: parsed.DATASET_NAME,
  };
}
