export interface DatasetSummary {
  readonly id: string;
  readonly name: string;
  readonly numDrivers: number;
  readonly totalPoints: number;
  readonly startTs: Date | null;
  readonly endTs: Date | null;
  readonly createdAt: Date;
}

// ─── Wire format (file on disk / upload body) ─────────────────────────────────

export interface GpsRecord {
  readonly driver_id: number;
  readonly latitude: number;
  readonly longitude: number;
  readonly timestamp: string; // YYYY-MM-DD HH:MM:SS, UTC
}

export interface DatasetMetadata {
  readonly num_drivers: number;
  readonly total_points: number;
  readonly date_range: { readonly start: string; readonly end: string } | null;
}

export interface TrafficDatasetFile {
  readonly drivers: GpsRecord[];
  readonly metadata: DatasetMetadata;
}
