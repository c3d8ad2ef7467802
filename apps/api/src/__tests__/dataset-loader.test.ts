import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import path from 'node:path';
import { InMemoryAnalysisRequestRepository, InMemoryDatasetRepository } from '@traffic-vault/adapters';
import { preloadDataset } from '../services/dataset-loader.js';
import { SecureDomainService } from '../services/secure-domain/secure-domain.service.js';

const FIXTURE = path.join(__dirname, 'fixtures', 'small-dataset.json');

describe('preloadDataset', () => {
  let domain: SecureDomainService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    domain = new SecureDomainService(new InMemoryDatasetRepository(), new InMemoryAnalysisRequestRepository());
  });

  it('registers a generator file under its basename', async () => {
    const dataset = await preloadDataset(domain, FIXTURE);
    expect(dataset).toMatchObject({
      name: 'small-dataset',
      numDrivers: 2,
      totalPoints: 5,
      startTs: new Date('2024-01-01T07:00:00Z'),
      endTs: new Date('2024-01-01T09:24:00Z'),
    });
    expect(await domain.listDatasets()).toHaveLength(1);
  });

  it('rejects a missing file', async () => {
    await expect(preloadDataset(domain, path.join(__dirname, 'fixtures', 'absent.json'))).rejects.toThrow('ENOENT');
  });
});
