import { describe, it, expect, beforeEach } from '@jest/globals';
import { ConflictError, NotFoundError } from '@traffic-vault/domain';
import type { GpsSample } from '@traffic-vault/domain';

import { InMemoryDatasetRepository } from '../memory/in-memory-dataset.repository.js';
import { InMemoryAnalysisRequestRepository } from '../memory/in-memory-analysis-request.repository.js';
import { DeterministicClock } from '../clock/deterministic-clock.js';

const EPOCH = Date.parse('2024-03-01T12:00:00Z');

const SAMPLES: GpsSample[] = [
  { driverId: 0, lat: 40.71, lng: -74.0, ts: new Date('2024-01-01T07:00:00Z') },
  { driverId: 1, lat: 40.75, lng: -73.98, ts: new Date('2024-01-01T08:00:00Z') },
];

describe('InMemoryDatasetRepository', () => {
  let repo: InMemoryDatasetRepository;

  beforeEach(() => {
    repo = new InMemoryDatasetRepository(new DeterministicClock(EPOCH).now);
  });

  it('stores a summary and the coordinates', async () => {
    const created = await repo.create({ name: 'morning', samples: SAMPLES });

    expect(created).toMatchObject({ name: 'morning', numDrivers: 2, totalPoints: 2 });
    expect(created.startTs?.toISOString()).toBe('2024-01-01T07:00:00.000Z');
    expect(created.createdAt.toISOString()).toBe('2024-03-01T12:00:00.000Z');
    await expect(repo.findById(created.id)).resolves.toBe(created);
    await expect(repo.readPoints(created.id)).resolves.toEqual([
      { lat: 40.71, lng: -74.0 },
      { lat: 40.75, lng: -73.98 },
    ]);
  });

  it('lists the newest dataset first', async () => {
    const first = await repo.create({ name: 'first', samples: SAMPLES });
    const second = await repo.create({ name: 'second', samples: [] });
    const listed = await repo.list();
    expect(listed.map((d) => d.id)).toEqual([second.id, first.id]);
  });

  it('returns nothing for unknown ids', async () => {
    await expect(repo.findById('nope')).resolves.toBeNull();
    await expect(repo.readPoints('nope')).resolves.toEqual([]);
  });
});

describe('InMemoryAnalysisRequestRepository', () => {
  let repo: InMemoryAnalysisRequestRepository;

  beforeEach(() => {
    repo = new InMemoryAnalysisRequestRepository(new DeterministicClock(EPOCH, 60_000).now);
  });

  async function submit() {
    return repo.create({
      datasetId: 'ds-1',
      analysis: 'congestion_grid',
      params: { gridSize: 10, hotspotRatio: 0.7 },
      requestedBy: 'researcher',
    });
  }

  it('creates PENDING requests', async () => {
    const request = await submit();
    expect(request.status).toBe('PENDING');
    expect(request.createdAt.toISOString()).toBe('2024-03-01T12:00:00.000Z');
    await expect(repo.list('PENDING')).resolves.toEqual([request]);
    await expect(repo.list('COMPLETED')).resolves.toEqual([]);
  });

  it('records a review once', async () => {
    const request = await submit();
    const denied = await repo.recordReview(request.id, { status: 'DENIED', reviewedBy: 'owner', reviewNote: 'too broad' });

    expect(denied).toMatchObject({ status: 'DENIED', reviewedBy: 'owner', reviewNote: 'too broad' });
    expect(denied.reviewedAt?.toISOString()).toBe('2024-03-01T12:01:00.000Z');
    await expect(repo.recordReview(request.id, { status: 'DENIED', reviewedBy: 'owner' })).rejects.toThrow(
      ConflictError,
    );
  });

  it('rejects reviews of unknown requests', async () => {
    await expect(repo.recordReview('nope', { status: 'DENIED', reviewedBy: 'owner' })).rejects.toThrow(
      NotFoundError,
    );
  });
});
