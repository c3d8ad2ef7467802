import type { GpsSample } from '../entities/gps-sample.js';
import type { GpsRecord, TrafficDatasetFile } from '../entities/traffic-dataset.js';
import { ValidationError } from '../errors.js';

const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})$/;

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatTimestamp(ts: Date): string {
  if (Number.isNaN(ts.getTime())) {
    throw new ValidationError('cannot format an invalid date');
  }
  return ts.toISOString().slice(0, 19).replace('T', ' ');
}

export function parseTimestamp(value: string): Date {
  const match = TIMESTAMP_PATTERN.exec(value);
  const parsed = match ? new Date(`${match[1]}T${match[2]}Z`) : null;
  // Rejects rollover dates such as 2024-02-30.
  if (!parsed || Number.isNaN(parsed.getTime()) || formatTimestamp(parsed) !== value) {
    throw new ValidationError(`invalid timestamp "${value}", expected YYYY-MM-DD HH:MM:SS`);
  }
  return parsed;
}

export interface SampleSummary {
  numDrivers: number;
  totalPoints: number;
  startTs: Date | null;
  endTs: Date | null;
}

export function summarizeSamples(samples: readonly GpsSample[]): SampleSummary {
  const drivers = new Set<number>();
  let start = Infinity;
  let end = -Infinity;
  for (const s of samples) {
    drivers.add(s.driverId);
    start = Math.min(start, s.ts.getTime());
    end = Math.max(end, s.ts.getTime());
  }
  return {
    numDrivers: drivers.size,
    totalPoints: samples.length,
    startTs: samples.length > 0 ? new Date(start) : null,
    endTs: samples.length > 0 ? new Date(end) : null,
  };
}

export function serializeDataset(samples: readonly GpsSample[]): TrafficDatasetFile {
  const summary = summarizeSamples(samples);
  return {
    drivers: samples.map((s) => ({
      driver_id: s.driverId,
      latitude: s.lat,
      longitude: s.lng,
      timestamp: formatTimestamp(s.ts),
    })),
    metadata: {
      num_drivers: summary.numDrivers,
      total_points: summary.totalPoints,
      date_range:
        summary.startTs && summary.endTs
          ? { start: formatTimestamp(summary.startTs), end: formatTimestamp(summary.endTs) }
          : null,
    },
  };
}

export function deserializeDataset(records: readonly GpsRecord[]): GpsSample[] {
  return records.map((r) => ({
    driverId: r.driver_id,
    lat: r.latitude,
    lng: r.longitude,
    ts: parseTimestamp(r.timestamp),
  }));
}
