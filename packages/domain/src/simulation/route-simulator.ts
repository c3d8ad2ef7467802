import type { DriverRoute, GeoPoint, GpsSample } from '../entities/gps-sample.js';
import type { RandomSource } from '../ports/outbound/random-source.port.js';
import { ValidationError } from '../errors.js';
import {
  DEFAULT_ROUTE_PROFILE,
  validateRouteProfile,
  type CommuteLeg,
  type CongestionWindow,
  type RouteProfile,
} from './route-profile.js';

function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

function jitter(rng: RandomSource, center: GeoPoint, amplitudeDeg: number): GeoPoint {
  return {
    lat: center.lat + uniform(rng, -amplitudeDeg, amplitudeDeg),
    lng: center.lng + uniform(rng, -amplitudeDeg, amplitudeDeg),
  };
}

/** Length of [0, t] that falls inside the window. */
function congestedProgress(t: number, window: CongestionWindow): number {
  return Math.max(0, Math.min(t, window.end) - window.start);
}

/**
 * Milliseconds from departure to progress `t` on a leg. Progress inside the
 * congestion window costs `multiplier` times the free-flow rate, so the
 * curve is monotonic and steeper inside the window.
 */
export function dilatedElapsedMs(t: number, leg: CommuteLeg): number {
  const slowdown = (leg.congestion.multiplier - 1) * congestedProgress(t, leg.congestion);
  return Math.round(leg.nominalDurationMs * (t + slowdown));
}

/** Appends the leg's samples and returns the arrival time (epoch ms). */
function simulateCommute(
  driverId: number,
  from: GeoPoint,
  to: GeoPoint,
  departureMs: number,
  leg: CommuteLeg,
  rng: RandomSource,
  out: GpsSample[],
): number {
  for (let i = 0; i < leg.pointCount; i++) {
    const t = leg.pointCount > 1 ? i / (leg.pointCount - 1) : 0;
    out.push({
      driverId,
      lat: from.lat + t * (to.lat - from.lat) + uniform(rng, -leg.noiseDeg, leg.noiseDeg),
      lng: from.lng + t * (to.lng - from.lng) + uniform(rng, -leg.noiseDeg, leg.noiseDeg),
      ts: new Date(departureMs + dilatedElapsedMs(t, leg)),
    });
  }
  return departureMs + dilatedElapsedMs(1, leg);
}

/**
 * Simulates one commute day: home → work, a dwell at work, work → home.
 * Samples come out in chronological order; adjacent segments may share a
 * timestamp at the join.
 */
export function generateRoute(
  driverId: number,
  dayStart: Date,
  rng: RandomSource,
  profile: RouteProfile = DEFAULT_ROUTE_PROFILE,
): DriverRoute {
  if (!Number.isInteger(driverId) || driverId < 0) {
    throw new ValidationError(`driverId must be a non-negative integer, got ${driverId}`);
  }
  if (Number.isNaN(dayStart.getTime())) {
    throw new ValidationError('dayStart is not a valid date');
  }
  validateRouteProfile(profile);

  const home = jitter(rng, profile.homeBase, profile.homeJitterDeg);
  const work = jitter(rng, profile.workBase, profile.workJitterDeg);
  const samples: GpsSample[] = [];

  const departure = dayStart.getTime() + profile.morningDepartureMs;
  const arrival = simulateCommute(driverId, home, work, departure, profile.morning, rng, samples);

  const { workday } = profile;
  for (let k = 0; k < workday.sampleCount; k++) {
    const spot = jitter(rng, work, workday.jitterDeg);
    samples.push({ driverId, lat: spot.lat, lng: spot.lng, ts: new Date(arrival + k * workday.intervalMs) });
  }

  const eveningDeparture = arrival + workday.sampleCount * workday.intervalMs;
  simulateCommute(driverId, work, home, eveningDeparture, profile.evening, rng, samples);

  return { driverId, dayStart, samples };
}
