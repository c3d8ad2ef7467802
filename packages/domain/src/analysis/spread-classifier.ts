import type { GeoPoint } from '../entities/gps-sample.js';
import type { SpreadAssessment } from '../entities/congestion.js';
import { ValidationError } from '../errors.js';

/** Roughly 550 m of latitude. */
export const DEFAULT_SPREAD_THRESHOLD_DEG = 0.005;

export interface SpreadOptions {
  stdDevThresholdDeg?: number;
}

/**
 * Tightly bunched vehicles read as a jam: a latitude standard deviation
 * below the threshold is HIGH congestion, anything wider is free flow.
 */
export function classifySpread(points: readonly GeoPoint[], options: SpreadOptions = {}): SpreadAssessment {
  const threshold = options.stdDevThresholdDeg ?? DEFAULT_SPREAD_THRESHOLD_DEG;
  if (!(Number.isFinite(threshold) && threshold > 0)) {
    throw new ValidationError(`stdDevThresholdDeg must be > 0, got ${threshold}`);
  }
  if (points.length === 0) {
    throw new ValidationError('spread classification needs at least one point');
  }
  if (points.some((p) => !Number.isFinite(p.lat))) {
    throw new ValidationError('points must have finite latitudes');
  }

  const mean = points.reduce((sum, p) => sum + p.lat, 0) / points.length;
  const variance = points.reduce((sum, p) => sum + (p.lat - mean) ** 2, 0) / points.length;
  const latitudeStdDev = Math.sqrt(variance);

  return {
    trafficLevel: latitudeStdDev < threshold ? 'HIGH' : 'LOW',
    latitudeStdDev,
    pointCount: points.length,
  };
}
