import type { GeoPoint, GpsSample } from '../../entities/gps-sample.js';
import type { DatasetSummary } from '../../entities/traffic-dataset.js';

export interface NewDataset {
  name: string;
  samples: readonly GpsSample[];
}

export interface DatasetRepositoryPort {
  create(dataset: NewDataset): Promise<DatasetSummary>;
  list(): Promise<DatasetSummary[]>;
  findById(datasetId: string): Promise<DatasetSummary | null>;
  /** Coordinates only, in insertion order. Never exposed outside the domain. */
  readPoints(datasetId: string): Promise<GeoPoint[]>;
}
