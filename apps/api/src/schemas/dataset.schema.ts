import { z } from 'zod';

/** Largest dataset the domain accepts, uploaded or generated. */
export const MAX_DATASET_POINTS = 1_000_000;

export const gpsRecordSchema = z.object({
  driver_id: z.number().int().min(0),
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  timestamp: z.string(),
});

/** Body of `POST /api/datasets` and the contents of a generated `traffic_data.json`. */
export const datasetUploadSchema = z.object({
  name: z.string().min(1).max(200).optional(),
  drivers: z.array(gpsRecordSchema).max(MAX_DATASET_POINTS),
  metadata: z.unknown().optional(),
});

export type DatasetUpload = z.infer<typeof datasetUploadSchema>;
