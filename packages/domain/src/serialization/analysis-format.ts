import type {
  CongestionAnalysis,
  CongestionAnalysisRecord,
  SpreadAssessment,
  SpreadAssessmentRecord,
} from '../entities/congestion.js';
import type { AnalysisResult } from '../entities/analysis-request.js';

export type AnalysisResultRecord = CongestionAnalysisRecord | SpreadAssessmentRecord;

export function serializeCongestionAnalysis(report: CongestionAnalysis): CongestionAnalysisRecord {
  const { averageLocation: avg, gridBounds: b } = report;
  return {
    total_gps_points: report.totalGpsPoints,
    average_location: avg ? { lat: avg.lat, lon: avg.lng } : null,
    congestion_grid: report.congestionGrid.map((row) => [...row]),
    hotspots: report.hotspots.map((h) => ({ latitude: h.lat, longitude: h.lng, congestion_level: h.congestionLevel })),
    grid_bounds: b ? { lat_min: b.latMin, lat_max: b.latMax, lon_min: b.lngMin, lon_max: b.lngMax } : null,
  };
}

export function deserializeCongestionAnalysis(record: CongestionAnalysisRecord): CongestionAnalysis {
  const { average_location: avg, grid_bounds: b } = record;
  return {
    totalGpsPoints: record.total_gps_points,
    averageLocation: avg ? { lat: avg.lat, lng: avg.lon } : null,
    congestionGrid: record.congestion_grid.map((row) => [...row]),
    hotspots: record.hotspots.map((h) => ({ lat: h.latitude, lng: h.longitude, congestionLevel: h.congestion_level })),
    gridBounds: b ? { latMin: b.lat_min, latMax: b.lat_max, lngMin: b.lon_min, lngMax: b.lon_max } : null,
  };
}

export function serializeSpreadAssessment(report: SpreadAssessment): SpreadAssessmentRecord {
  return {
    traffic_level: report.trafficLevel,
    latitude_std_dev: report.latitudeStdDev,
    point_count: report.pointCount,
  };
}

/** The declared output of an analysis, as released to the requester. */
export function serializeAnalysisResult(result: AnalysisResult): AnalysisResultRecord {
  switch (result.kind) {
    case 'congestion_grid':
      return serializeCongestionAnalysis(result.report);
    case 'spread_deviation':
      return serializeSpreadAssessment(result.report);
  }
}
