import { z } from 'zod';

/**
 * Env vars:
 *   API_BASE_URL: data domain API (default: http://localhost:3001)
 *   DATASET_ID: dataset to analyze (default: most recently registered)
 *   GRID_SIZE: grid resolution per axis (default: domain default)
 *   HOTSPOT_RATIO: hotspot threshold as a fraction of the densest cell
 *   REQUESTED_BY: name recorded on the request (default: researcher)
 *   REASON: justification shown to the data owner
 *   POLL_INTERVAL_MS: approval polling interval (default: 2000)
 *   APPROVAL_TIMEOUT_MS: give up waiting after this long (default: 300000)
 */
const researcherEnvSchema = z.object({
  API_BASE_URL: z.string().url().default('http://localhost:3001'),
  DATASET_ID: z.string().min(1).optional(),
  GRID_SIZE: z.coerce.number().int().min(1).max(100).optional(),
  HOTSPOT_RATIO: z.coerce.number().gt(0).max(1).optional(),
  REQUESTED_BY: z.string().min(1).default('researcher'),
  REASON: z.string().optional(),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2_000),
  APPROVAL_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(300_000),
});

export interface ResearcherConfig {
  apiBaseUrl: string;
  datasetId?: string;
  gridSize?: number;
  hotspotRatio?: number;
  requestedBy: string;
  reason?: string;
  pollIntervalMs: number;
  approvalTimeoutMs: number;
}

export function readResearcherConfig(env: NodeJS.ProcessEnv = process.env): ResearcherConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = researcherEnvSchema.parse(present);
  return {
    apiBaseUrl: parsed.API_BASE_URL.replace(/\/+$/, ''),
    datasetId: parsed.DATASET_ID,
    gridSize: parsed.GRID_SIZE,
    hotspotRatio: parsed.HOTSPOT_RATIO,
    requestedBy: parsed.REQUESTED_BY,
    reason: parsed.REASON,
    pollIntervalMs: parsed.POLL_INTERVAL_MS,
    approvalTimeoutMs: parsed.APPROVAL_TIMEOUT_MS,
  };
}
