import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { TrafficDatasetFile } from '@traffic-vault/domain';

export async function writeDatasetFile(filePath: string, dataset: TrafficDatasetFile): Promise<void> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(dataset, null, 2)}\n`, 'utf8');
}

/** Parsed JSON; callers validate the shape. */
export async function readDatasetFile(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf8');
  return JSON.parse(raw) as unknown;
}
