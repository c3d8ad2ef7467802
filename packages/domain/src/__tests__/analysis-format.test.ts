import { describe, it, expect } from '@jest/globals';

import { aggregate } from '../analysis/grid-aggregator.js';
import {
  deserializeCongestionAnalysis,
  serializeAnalysisResult,
  serializeCongestionAnalysis,
} from '../serialization/analysis-format.js';

const JAM = [
  { lat: 40, lng: -74 },
  { lat: 40, lng: -74 },
  { lat: 40, lng: -74 },
];

describe('serializeCongestionAnalysis', () => {
  it('releases the report under its published field names', () => {
    const record = serializeCongestionAnalysis(aggregate(JAM, { gridSize: 2 }));
    expect(record).toEqual({
      total_gps_points: 3,
      average_location: { lat: 40, lon: -74 },
      congestion_grid: [
        [3, 0],
        [0, 0],
      ],
      hotspots: [{ latitude: 40, longitude: -74, congestion_level: 3 }],
      grid_bounds: { lat_min: 40, lat_max: 40, lon_min: -74, lon_max: -74 },
    });
  });

  it('keeps null location and bounds for an empty report', () => {
    const record = serializeCongestionAnalysis(aggregate([], { gridSize: 1 }));
    expect(record).toEqual({
      total_gps_points: 0,
      average_location: null,
      congestion_grid: [[0]],
      hotspots: [],
      grid_bounds: null,
    });
  });

  it('reads back into the domain report', () => {
    const report = aggregate([...JAM, { lat: 41, lng: -73 }], { gridSize: 2 });
    expect(deserializeCongestionAnalysis(serializeCongestionAnalysis(report))).toEqual(report);
  });
});

describe('serializeAnalysisResult', () => {
  it('maps a spread assessment', () => {
    expect(
      serializeAnalysisResult({
        kind: 'spread_deviation',
        report: { trafficLevel: 'HIGH', latitudeStdDev: 0.001, pointCount: 4 },
      }),
    ).toEqual({ traffic_level: 'HIGH', latitude_std_dev: 0.001, point_count: 4 });
  });
});
