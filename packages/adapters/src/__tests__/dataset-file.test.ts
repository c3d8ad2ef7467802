import { describe, it, expect, afterAll } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { serializeDataset } from '@traffic-vault/domain';

import { readDatasetFile, writeDatasetFile } from '../file/dataset-file.js';

const dirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'traffic-vault-'));
  dirs.push(dir);
  return dir;
}

afterAll(async () => {
  await Promise.all(dirs.map((d) => rm(d, { recursive: true, force: true })));
});

describe('dataset files', () => {
  const dataset = serializeDataset([{ driverId: 3, lat: 40.7, lng: -74, ts: new Date('2024-01-01T07:00:00Z') }]);

  it('writes indented JSON and reads it back', async () => {
    const file = path.join(await tempDir(), 'nested', 'traffic_data.json');
    await writeDatasetFile(file, dataset);

    const text = await readFile(file, 'utf8');
    expect(text.startsWith('{\n  "drivers": [')).toBe(true);
    await expect(readDatasetFile(file)).resolves.toEqual(dataset);
  });

  it('surfaces malformed JSON', async () => {
    const file = path.join(await tempDir(), 'broken.json');
    await writeFile(file, '{"drivers": [', 'utf8');
    await expect(readDatasetFile(file)).rejects.toThrow(SyntaxError);
  });

  it('surfaces a missing file', async () => {
    const file = path.join(await tempDir(), 'absent.json');
    await expect(readDatasetFile(file)).rejects.toThrow('ENOENT');
  });
});
