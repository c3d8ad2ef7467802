import { v4 as uuidv4 } from 'uuid';
import type { DatasetRepositoryPort, NewDataset } from '@traffic-vault/domain';
import type { DatasetSummary, GeoPoint } from '@traffic-vault/domain';
import { summarizeSamples } from '@traffic-vault/domain';
import { wallClockNow } from '../clock/deterministic-clock.js';

interface StoredDataset {
  summary: DatasetSummary;
  points: GeoPoint[];
}

/** Process-local store for demos and tests; everything is lost on restart. */
export class InMemoryDatasetRepository implements DatasetRepositoryPort {
  private readonly datasets = new Map<string, StoredDataset>();

  constructor(private readonly now: () => Date = wallClockNow) {}

  async create(dataset: NewDataset): Promise<DatasetSummary> {
    const summary: DatasetSummary = {
      id: uuidv4(),
      name: dataset.name,
      ...summarizeSamples(dataset.samples),
      createdAt: this.now(),
    };
    const points = dataset.samples.map((s) => ({ lat: s.lat, lng: s.lng }));
    this.datasets.set(summary.id, { summary, points });
    return summary;
  }

  async list(): Promise<DatasetSummary[]> {
    return [...this.datasets.values()].map((d) => d.summary).reverse();
  }

  async findById(datasetId: string): Promise<DatasetSummary | null> {
    return this.datasets.get(datasetId)?.summary ?? null;
  }

  async readPoints(datasetId: string): Promise<GeoPoint[]> {
    return [...(this.datasets.get(datasetId)?.points ?? [])];
  }
}
