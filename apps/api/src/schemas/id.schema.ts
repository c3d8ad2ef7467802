import { z } from 'zod';
import { NotFoundError } from '@traffic-vault/domain';

const recordIdSchema = z.string().uuid();

/** Both stores issue UUIDs, so any other id names nothing. */
export function parseRecordId(raw: string, label: 'dataset' | 'analysis request'): string {
  if (!recordIdSchema.safeParse(raw).success) throw new NotFoundError(`${label} ${raw} not found`);
  return raw;
}
