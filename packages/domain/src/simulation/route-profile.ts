import type { GeoPoint } from '../entities/gps-sample.js';
import { ValidationError } from '../errors.js';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

/** Slice of normalized commute progress t ∈ [0, 1] travelled at reduced speed. */
export interface CongestionWindow {
  readonly start: number;
  readonly end: number;
  /** Time cost of one unit of progress inside the window, relative to free flow. */
  readonly multiplier: number;
}

export interface CommuteLeg {
  readonly pointCount: number;
  readonly nominalDurationMs: number;
  readonly congestion: CongestionWindow;
  readonly noiseDeg: number;
}

export interface WorkdayDwell {
  readonly sampleCount: number;
  readonly intervalMs: number;
  readonly jitterDeg: number;
}

export interface RouteProfile {
  readonly homeBase: GeoPoint;
  readonly homeJitterDeg: number;
  readonly workBase: GeoPoint;
  readonly workJitterDeg: number;
  /** Offset from the start of the day. */
  readonly morningDepartureMs: number;
  readonly morning: CommuteLeg;
  readonly workday: WorkdayDwell;
  readonly evening: CommuteLeg;
}

// Lower Manhattan homes, Midtown offices.
export const DEFAULT_ROUTE_PROFILE: RouteProfile = {
  homeBase: { lat: 40.7128, lng: -74.006 },
  homeJitterDeg: 0.05,
  workBase: { lat: 40.7589, lng: -73.9851 },
  workJitterDeg: 0.02,
  morningDepartureMs: 7 * HOUR_MS,
  morning: {
    pointCount: 20,
    nominalDurationMs: 2 * HOUR_MS,
    congestion: { start: 0.3, end: 0.7, multiplier: 1.5 },
    noiseDeg: 0.001,
  },
  workday: {
    sampleCount: 32,
    intervalMs: 15 * MINUTE_MS,
    jitterDeg: 0.005,
  },
  evening: {
    pointCount: 20,
    nominalDurationMs: 2 * HOUR_MS,
    congestion: { start: 0.2, end: 0.8, multiplier: 1.3 },
    noiseDeg: 0.001,
  },
};

/** Samples produced per route: morning + workday + evening. */
export function routeLength(profile: RouteProfile = DEFAULT_ROUTE_PROFILE): number {
  return profile.morning.pointCount + profile.workday.sampleCount + profile.evening.pointCount;
}

function requirePositiveInt(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer, got ${value}`);
  }
}

function requireNonNegative(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be a finite non-negative number, got ${value}`);
  }
}

function validateLeg(leg: CommuteLeg, name: string): void {
  requirePositiveInt(leg.pointCount, `${name}.pointCount`);
  requireNonNegative(leg.nominalDurationMs, `${name}.nominalDurationMs`);
  requireNonNegative(leg.noiseDeg, `${name}.noiseDeg`);
  const { start, end, multiplier } = leg.congestion;
  if (!(start >= 0 && start <= end && end <= 1)) {
    throw new ValidationError(`${name}.congestion window must satisfy 0 <= start <= end <= 1`);
  }
  if (!(Number.isFinite(multiplier) && multiplier > 0)) {
    throw new ValidationError(`${name}.congestion.multiplier must be > 0`);
  }
}

export function validateRouteProfile(profile: RouteProfile): void {
  for (const [field, point] of [['homeBase', profile.homeBase], ['workBase', profile.workBase]] as const) {
    if (!Number.isFinite(point.lat) || !Number.isFinite(point.lng)) {
      throw new ValidationError(`${field} must have finite coordinates`);
    }
  }
  requireNonNegative(profile.homeJitterDeg, 'homeJitterDeg');
  requireNonNegative(profile.workJitterDeg, 'workJitterDeg');
  requireNonNegative(profile.morningDepartureMs, 'morningDepartureMs');
  validateLeg(profile.morning, 'morning');
  validateLeg(profile.evening, 'evening');
  requirePositiveInt(profile.workday.sampleCount, 'workday.sampleCount');
  requireNonNegative(profile.workday.intervalMs, 'workday.intervalMs');
  requireNonNegative(profile.workday.jitterDeg, 'workday.jitterDeg');
}
