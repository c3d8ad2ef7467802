import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { DEFAULT_ROUTE_PROFILE, deserializeDataset, parseTimestamp, routeLength } from '@traffic-vault/domain';
import type { SecureDomainPort } from '@traffic-vault/domain';
import { MAX_DATASET_POINTS, datasetUploadSchema } from '../schemas/dataset.schema.js';
import { parseRecordId } from '../schemas/id.schema.js';

const SAMPLES_PER_DRIVER_DAY = routeLength(DEFAULT_ROUTE_PROFILE);

const generateBodySchema = z
  .object({
    name: z.string().min(1).max(200).optional(),
    numDrivers: z.number().int().positive().max(10_000).default(100),
    simulationDays: z.number().int().positive().max(31).default(1),
    startDate: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
      .default('2024-01-01'),
    seed: z.number().int().optional(),
  })
  .refine((body) => body.numDrivers * body.simulationDays * SAMPLES_PER_DRIVER_DAY <= MAX_DATASET_POINTS, {
    message: `numDrivers x simulationDays x ${SAMPLES_PER_DRIVER_DAY} samples must not exceed ${MAX_DATASET_POINTS}`,
    path: ['numDrivers'],
  });

export function createDatasetsRouter(domain: SecureDomainPort): Router {
  const router = Router();

  /** GET /api/datasets - metadata of every registered dataset, newest first */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: await domain.listDatasets() });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/datasets/:datasetId */
  router.get('/:datasetId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await domain.getDataset(parseRecordId(req.params['datasetId'], 'dataset')));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/datasets - owner uploads records in the dataset file format */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = datasetUploadSchema.parse(req.body);
      const samples = deserializeDataset(body.drivers);
      const dataset = await domain.uploadDataset(body.name ?? 'uploaded-dataset', samples);
      res.status(201).json(dataset);
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/datasets/generate - owner simulates commute traces inside the domain */
  router.post('/generate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = generateBodySchema.parse(req.body ?? {});
      const dataset = await domain.generateDataset({
        name: body.name,
        numDrivers: body.numDrivers,
        simulationDays: body.simulationDays,
        startDate: parseTimestamp(`${body.startDate} 00:00:00`),
        seed: body.seed,
      });
      res.status(201).json(dataset);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
