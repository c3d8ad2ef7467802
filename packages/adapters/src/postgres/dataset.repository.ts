import type { DatasetRepositoryPort, NewDataset } from '@traffic-vault/domain';
import type { DatasetSummary, GeoPoint, GpsSample } from '@traffic-vault/domain';
import { summarizeSamples } from '@traffic-vault/domain';
import { getPool, withTransaction, type DbClient } from './pool.js';

const SAMPLE_COLUMNS = 6;
// Keeps each INSERT well under the 65535 bind-parameter limit.
const SAMPLE_BATCH_SIZE = 1_000;

export class PgDatasetRepository implements DatasetRepositoryPort {
  async create(dataset: NewDataset): Promise<DatasetSummary> {
    const summary = summarizeSamples(dataset.samples);
    return withTransaction(async (client) => {
      const { rows } = await client.query(
        `INSERT INTO traffic.datasets (name, num_drivers, total_points, start_ts, end_ts)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING *`,
        [dataset.name, summary.numDrivers, summary.totalPoints, summary.startTs, summary.endTs],
      );
      const created = mapDatasetRow(rows[0]);
      for (let offset = 0; offset < dataset.samples.length; offset += SAMPLE_BATCH_SIZE) {
        await insertSamples(client, created.id, dataset.samples.slice(offset, offset + SAMPLE_BATCH_SIZE), offset);
      }
      return created;
    });
  }

  async list(): Promise<DatasetSummary[]> {
    const { rows } = await getPool().query(`SELECT * FROM traffic.datasets ORDER BY created_at DESC`);
    return rows.map(mapDatasetRow);
  }

  async findById(datasetId: string): Promise<DatasetSummary | null> {
    const { rows } = await getPool().query(`SELECT * FROM traffic.datasets WHERE id = $1`, [datasetId]);
    return rows[0] ? mapDatasetRow(rows[0]) : null;
  }

  async readPoints(datasetId: string): Promise<GeoPoint[]> {
    const { rows } = await getPool().query(
      `SELECT lat, lng FROM traffic.gps_samples WHERE dataset_id = $1 ORDER BY seq ASC`,
      [datasetId],
    );
    return rows.map((row: Record<string, unknown>) => ({ lat: Number(row['lat']), lng: Number(row['lng']) }));
  }
}

async function insertSamples(
  client: DbClient,
  datasetId: string,
  samples: readonly GpsSample[],
  seqOffset: number,
): Promise<void> {
  const values: unknown[] = [];
  const placeholders = samples.map((s, i) => {
    const base = i * SAMPLE_COLUMNS;
    values.push(datasetId, seqOffset + i, s.driverId, s.lat, s.lng, s.ts);
    const cols = Array.from({ length: SAMPLE_COLUMNS }, (_, k) => `$${base + k + 1}`);
    return `(${cols.join(',')})`;
  });
  await client.query(
    `INSERT INTO traffic.gps_samples (dataset_id, seq, driver_id, lat, lng, ts)
     VALUES ${placeholders.join(',')}`,
    values,
  );
}

function mapDatasetRow(row: Record<string, unknown>): DatasetSummary {
  return {
    id: row['id'] as string,
    name: row['name'] as string,
    numDrivers: Number(row['num_drivers']),
    totalPoints: Number(row['total_points']),
    startTs: (row['start_ts'] as Date | null) ?? null,
    endTs: (row['end_ts'] as Date | null) ?? null,
    createdAt: row['created_at'] as Date,
  };
}
