import { z } from 'zod';
import {
  aggregate,
  classifySpread,
  DEFAULT_GRID_SIZE,
  DEFAULT_HOTSPOT_RATIO,
  DEFAULT_SPREAD_THRESHOLD_DEG,
} from '@traffic-vault/domain';
import type { AnalysisKind, AnalysisResult, GeoPoint } from '@traffic-vault/domain';

/** A function the domain will run over private points once the owner approves. */
export interface RegisteredAnalysis {
  readonly description: string;
  /** Validates and fills defaults; the normalized params are what gets stored. */
  parseParams(raw: unknown): Record<string, unknown>;
  execute(points: readonly GeoPoint[], params: unknown): AnalysisResult;
}

const congestionParamsSchema = z
  .object({
    gridSize: z.number().int().min(1).max(100).default(DEFAULT_GRID_SIZE),
    hotspotRatio: z.number().gt(0).max(1).default(DEFAULT_HOTSPOT_RATIO),
  })
  .strict();

const spreadParamsSchema = z
  .object({
    stdDevThresholdDeg: z.number().positive().default(DEFAULT_SPREAD_THRESHOLD_DEG),
  })
  .strict();

export const ANALYSES: Record<AnalysisKind, RegisteredAnalysis> = {
  congestion_grid: {
    description: 'Point counts on a lat/lng grid over the bounding box, with hotspot cells near the maximum density',
    parseParams: (raw) => congestionParamsSchema.parse(raw ?? {}),
    execute: (points, params) => ({
      kind: 'congestion_grid',
      report: aggregate(points, congestionParamsSchema.parse(params ?? {})),
    }),
  },
  spread_deviation: {
    description: 'Latitude standard deviation; tightly bunched vehicles are reported as HIGH congestion',
    parseParams: (raw) => spreadParamsSchema.parse(raw ?? {}),
    execute: (points, params) => ({
      kind: 'spread_deviation',
      report: classifySpread(points, spreadParamsSchema.parse(params ?? {})),
    }),
  },
};
