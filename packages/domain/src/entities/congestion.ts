import type { GeoPoint } from './gps-sample.js';

/** Point counts indexed `[latBin][lngBin]`. */
export type CongestionGrid = number[][];

export interface Hotspot {
  readonly lat: number;
  readonly lng: number;
  readonly congestionLevel: number;
}

export interface GridBounds {
  readonly latMin: number;
  readonly latMax: number;
  readonly lngMin: number;
  readonly lngMax: number;
}

export interface CongestionAnalysis {
  readonly totalGpsPoints: number;
  readonly averageLocation: GeoPoint | null; // null for empty input
  readonly congestionGrid: CongestionGrid;
  readonly hotspots: Hotspot[];
  readonly gridBounds: GridBounds | null;
}

export type TrafficLevel = 'HIGH' | 'LOW';

export interface SpreadAssessment {
  readonly trafficLevel: TrafficLevel;
  readonly latitudeStdDev: number;
  readonly pointCount: number;
}

// ─── Released wire form ───────────────────────────────────────────────────────
// What a researcher receives from an approved analysis.

export interface HotspotRecord {
  latitude: number;
  longitude: number;
  congestion_level: number;
}

export interface CongestionAnalysisRecord {
  total_gps_points: number;
  average_location: { lat: number; lon: number } | null;
  congestion_grid: number[][];
  hotspots: HotspotRecord[];
  grid_bounds: { lat_min: number; lat_max: number; lon_min: number; lon_max: number } | null;
}

export interface SpreadAssessmentRecord {
  traffic_level: TrafficLevel;
  latitude_std_dev: number;
  point_count: number;
}
