import type { GeoPoint } from '../entities/gps-sample.js';
import type { CongestionAnalysis, CongestionGrid, Hotspot } from '../entities/congestion.js';
import { ValidationError } from '../errors.js';

export const DEFAULT_GRID_SIZE = 10;
/** Cells within 30% of the densest cell count as hotspots. */
export const DEFAULT_HOTSPOT_RATIO = 0.7;

export interface AggregationOptions {
  gridSize?: number;
  hotspotRatio?: number;
}

/** `gridSize + 1` evenly spaced edges across [min, max]; the last edge is max exactly. */
export function binEdges(min: number, max: number, gridSize: number): number[] {
  const step = (max - min) / gridSize;
  return Array.from({ length: gridSize + 1 }, (_, i) => (i === gridSize ? max : min + i * step));
}

/**
 * Index of the bin with `edges[i] <= value < edges[i + 1]`, clamped to the
 * grid. A zero-extent axis puts everything in bin 0.
 */
export function binIndex(value: number, edges: readonly number[]): number {
  const last = edges.length - 2;
  if (edges[0] === edges[edges.length - 1]) return 0;
  let idx = 0;
  while (idx < last && value >= edges[idx + 1]) idx++;
  return idx;
}

function emptyGrid(gridSize: number): CongestionGrid {
  return Array.from({ length: gridSize }, () => new Array<number>(gridSize).fill(0));
}

function validate(points: readonly GeoPoint[], gridSize: number, hotspotRatio: number): void {
  if (!Number.isInteger(gridSize) || gridSize < 1) {
    throw new ValidationError(`gridSize must be a positive integer, got ${gridSize}`);
  }
  if (!(hotspotRatio > 0 && hotspotRatio <= 1)) {
    throw new ValidationError(`hotspotRatio must be in (0, 1], got ${hotspotRatio}`);
  }
  points.forEach((p, i) => {
    if (!Number.isFinite(p.lat) || !Number.isFinite(p.lng)) {
      throw new ValidationError(`point ${i} has non-finite coordinates (${p.lat}, ${p.lng})`);
    }
  });
}

/**
 * Bins points into a `gridSize × gridSize` grid over their bounding box and
 * reports every cell holding at least `hotspotRatio × max` points.
 */
export function aggregate(points: readonly GeoPoint[], options: AggregationOptions = {}): CongestionAnalysis {
  const gridSize = options.gridSize ?? DEFAULT_GRID_SIZE;
  const hotspotRatio = options.hotspotRatio ?? DEFAULT_HOTSPOT_RATIO;
  validate(points, gridSize, hotspotRatio);

  const grid = emptyGrid(gridSize);
  if (points.length === 0) {
    return { totalGpsPoints: 0, averageLocation: null, congestionGrid: grid, hotspots: [], gridBounds: null };
  }

  let latMin = Infinity;
  let latMax = -Infinity;
  let lngMin = Infinity;
  let lngMax = -Infinity;
  let latSum = 0;
  let lngSum = 0;
  for (const p of points) {
    latMin = Math.min(latMin, p.lat);
    latMax = Math.max(latMax, p.lat);
    lngMin = Math.min(lngMin, p.lng);
    lngMax = Math.max(lngMax, p.lng);
    latSum += p.lat;
    lngSum += p.lng;
  }

  const latEdges = binEdges(latMin, latMax, gridSize);
  const lngEdges = binEdges(lngMin, lngMax, gridSize);
  let maxCount = 0;
  for (const p of points) {
    const row = grid[binIndex(p.lat, latEdges)];
    const col = binIndex(p.lng, lngEdges);
    row[col] += 1;
    maxCount = Math.max(maxCount, row[col]);
  }

  const threshold = maxCount * hotspotRatio;
  const hotspots: Hotspot[] = [];
  grid.forEach((row, i) => {
    row.forEach((count, j) => {
      if (count < threshold) return;
      hotspots.push({
        lat: (latEdges[i] + latEdges[i + 1]) / 2,
        lng: (lngEdges[j] + lngEdges[j + 1]) / 2,
        congestionLevel: count,
      });
    });
  });

  return {
    totalGpsPoints: points.length,
    averageLocation: { lat: latSum / points.length, lng: lngSum / points.length },
    congestionGrid: grid,
    hotspots,
    gridBounds: { latMin, latMax, lngMin, lngMax },
  };
}
