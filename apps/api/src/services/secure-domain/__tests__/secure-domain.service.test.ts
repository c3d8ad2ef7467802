import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import {
  DeterministicClock,
  InMemoryAnalysisRequestRepository,
  InMemoryDatasetRepository,
} from '@traffic-vault/adapters';
import { ConflictError, NotFoundError, ValidationError } from '@traffic-vault/domain';
import type { GpsSample } from '@traffic-vault/domain';
import { ZodError } from 'zod';

import { SecureDomainService } from '../secure-domain.service.js';

const sample = (driverId: number, lat: number, lng: number): GpsSample => ({
  driverId,
  lat,
  lng,
  ts: new Date('2024-01-01T08:00:00Z'),
});

describe('SecureDomainService', () => {
  let datasets: InMemoryDatasetRepository;
  let requests: InMemoryAnalysisRequestRepository;
  let service: SecureDomainService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const clock = new DeterministicClock(Date.parse('2024-06-01T00:00:00Z'));
    datasets = new InMemoryDatasetRepository(clock.now);
    requests = new InMemoryAnalysisRequestRepository(clock.now);
    service = new SecureDomainService(datasets, requests);
  });

  describe('generateDataset', () => {
    it('names the dataset after its shape and start date', async () => {
      const dataset = await service.generateDataset({
        numDrivers: 3,
        simulationDays: 2,
        startDate: new Date('2024-03-05T00:00:00Z'),
        seed: 1,
      });
      expect(dataset.name).toBe('synthetic-3x2-2024-03-05');
      expect(dataset.numDrivers).toBe(3);
      expect(dataset.totalPoints).toBe(3 * 2 * 72);
    });

    it('is reproducible for a fixed seed', async () => {
      const cmd = { numDrivers: 2, simulationDays: 1, startDate: new Date('2024-01-01T00:00:00Z'), seed: 42 };
      const a = await service.generateDataset(cmd);
      const b = await service.generateDataset(cmd);
      expect(await datasets.readPoints(b.id)).toEqual(await datasets.readPoints(a.id));
    });

    it('rejects a zero driver count', async () => {
      await expect(
        service.generateDataset({ numDrivers: 0, simulationDays: 1, startDate: new Date('2024-01-01T00:00:00Z') }),
      ).rejects.toThrow(ValidationError);
    });
  });

  describe('submitAnalysis', () => {
    it('stores normalized params', async () => {
      const dataset = await service.uploadDataset('jam', [sample(0, 40, -74)]);
      const request = await service.submitAnalysis({
        datasetId: dataset.id,
        analysis: 'congestion_grid',
        params: { gridSize: 4 },
        requestedBy: 'transit-lab',
      });
      expect(request.status).toBe('PENDING');
      expect(request.params).toEqual({ gridSize: 4, hotspotRatio: 0.7 });
    });

    it('rejects an unknown dataset before touching params', async () => {
      await expect(
        service.submitAnalysis({ datasetId: 'nope', analysis: 'congestion_grid', params: { gridSize: -1 }, requestedBy: 'r' }),
      ).rejects.toThrow(NotFoundError);
    });

    it('rejects invalid params', async () => {
      const dataset = await service.uploadDataset('jam', [sample(0, 40, -74)]);
      await expect(
        service.submitAnalysis({ datasetId: dataset.id, analysis: 'spread_deviation', params: { stdDevThresholdDeg: 0 }, requestedBy: 'r' }),
      ).rejects.toThrow(ZodError);
    });
  });

  describe('approval gate', () => {
    it('runs the congestion grid over the private points', async () => {
      const dataset = await service.uploadDataset('two-clusters', [
        sample(0, 40, -74),
        sample(1, 40, -74),
        sample(2, 41, -73),
      ]);
      const request = await service.submitAnalysis({
        datasetId: dataset.id,
        analysis: 'congestion_grid',
        params: { gridSize: 2, hotspotRatio: 1 },
        requestedBy: 'r',
      });
      const approved = await service.approveRequest({ requestId: request.id, reviewer: 'owner' });
      expect(approved.status).toBe('COMPLETED');
      expect(approved.reviewedAt).toEqual(new Date('2024-06-01T00:00:02Z'));

      const result = await service.getResult(request.id);
      if (result.kind !== 'congestion_grid') throw new Error(`unexpected kind ${result.kind}`);
      expect(result.report.congestionGrid).toEqual([
        [2, 0],
        [0, 1],
      ]);
      expect(result.report.hotspots).toEqual([{ lat: 40.25, lng: -73.75, congestionLevel: 2 }]);
    });

    it('records FAILED when the analysis rejects the data', async () => {
      const dataset = await service.uploadDataset('empty', []);
      const request = await service.submitAnalysis({ datasetId: dataset.id, analysis: 'spread_deviation', requestedBy: 'r' });
      const approved = await service.approveRequest({ requestId: request.id, reviewer: 'owner' });
      expect(approved.status).toBe('FAILED');
      expect(approved.error).toBe('spread classification needs at least one point');
      await expect(service.getResult(request.id)).rejects.toThrow(
        `analysis request ${request.id} is FAILED; no result available`,
      );
    });

    it('leaves the request PENDING when the store fails', async () => {
      const dataset = await service.uploadDataset('jam', [sample(0, 40, -74)]);
      const request = await service.submitAnalysis({ datasetId: dataset.id, analysis: 'congestion_grid', requestedBy: 'r' });
      jest.spyOn(datasets, 'readPoints').mockRejectedValueOnce(new Error('connection lost'));

      await expect(service.approveRequest({ requestId: request.id, reviewer: 'owner' })).rejects.toThrow('connection lost');
      expect((await service.getRequest(request.id)).status).toBe('PENDING');
    });

    it('refuses to review a request twice', async () => {
      const dataset = await service.uploadDataset('jam', [sample(0, 40, -74)]);
      const request = await service.submitAnalysis({ datasetId: dataset.id, analysis: 'congestion_grid', requestedBy: 'r' });
      await service.denyRequest({ requestId: request.id, reviewer: 'owner', note: 'not today' });

      await expect(service.approveRequest({ requestId: request.id, reviewer: 'owner' })).rejects.toThrow(ConflictError);
      await expect(service.getResult(request.id)).rejects.toThrow(ConflictError);
      expect(await service.listRequests('DENIED')).toHaveLength(1);
    });
  });
});
