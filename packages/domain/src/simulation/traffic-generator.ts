import type { GpsSample } from '../entities/gps-sample.js';
import type { RandomSource } from '../ports/outbound/random-source.port.js';
import { ValidationError } from '../errors.js';
import { DEFAULT_ROUTE_PROFILE, validateRouteProfile, type RouteProfile } from './route-profile.js';
import { generateRoute } from './route-simulator.js';

const DAY_MS = 86_400_000;

export interface TrafficSimulationOptions {
  numDrivers: number;
  simulationDays: number;
  /** Midnight of the first simulated day. */
  startDate: Date;
  rng: RandomSource;
  profile?: RouteProfile;
  /** Called after each driver's days are generated. */
  onDriverComplete?: (driverId: number) => void;
}

/**
 * Commute traces for drivers `0..numDrivers-1` over consecutive days,
 * driver-major. Inputs are validated before anything is generated.
 */
export function generateTrafficData(opts: TrafficSimulationOptions): GpsSample[] {
  const { numDrivers, simulationDays, startDate, rng } = opts;
  const profile = opts.profile ?? DEFAULT_ROUTE_PROFILE;

  if (!Number.isInteger(numDrivers) || numDrivers < 1) {
    throw new ValidationError(`numDrivers must be a positive integer, got ${numDrivers}`);
  }
  if (!Number.isInteger(simulationDays) || simulationDays < 1) {
    throw new ValidationError(`simulationDays must be a positive integer, got ${simulationDays}`);
  }
  if (Number.isNaN(startDate.getTime())) {
    throw new ValidationError('startDate is not a valid date');
  }
  validateRouteProfile(profile);

  const samples: GpsSample[] = [];
  for (let driverId = 0; driverId < numDrivers; driverId++) {
    for (let day = 0; day < simulationDays; day++) {
      const dayStart = new Date(startDate.getTime() + day * DAY_MS);
      samples.push(...generateRoute(driverId, dayStart, rng, profile).samples);
    }
    opts.onDriverComplete?.(driverId);
  }
  return samples;
}
