import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { serializeAnalysisResult } from '@traffic-vault/domain';
import type { AnalysisRequest, SecureDomainPort } from '@traffic-vault/domain';
import { parseRecordId } from '../schemas/id.schema.js';

const statusSchema = z.enum(['PENDING', 'COMPLETED', 'DENIED', 'FAILED']);

const listQuerySchema = z.object({
  status: statusSchema.optional(),
});

const submitBodySchema = z.object({
  datasetId: z.string().min(1),
  analysis: z.enum(['congestion_grid', 'spread_deviation']),
  params: z.record(z.unknown()).optional(),
  requestedBy: z.string().min(1).max(200).default('researcher'),
  reason: z.string().max(2_000).optional(),
});

const reviewBodySchema = z.object({
  reviewer: z.string().min(1).max(200).default('data-owner'),
  note: z.string().max(2_000).optional(),
});

/** Request state as sent to clients; a released result is in its wire form. */
function toResponse(request: AnalysisRequest) {
  return { ...request, result: request.result ? serializeAnalysisResult(request.result) : undefined };
}

export function createRequestsRouter(domain: SecureDomainPort): Router {
  const router = Router();

  /** GET /api/requests?status=PENDING */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status } = listQuerySchema.parse(req.query);
      res.json({ data: (await domain.listRequests(status)).map(toResponse) });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/requests - researcher submits an analysis; it waits for the owner */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = submitBodySchema.parse(req.body);
      const datasetId = parseRecordId(body.datasetId, 'dataset');
      res.status(201).json(toResponse(await domain.submitAnalysis({ ...body, datasetId })));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/requests/:requestId */
  router.get('/:requestId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(toResponse(await domain.getRequest(parseRecordId(req.params['requestId'], 'analysis request'))));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/requests/:requestId/approve - owner releases the computation */
  router.post('/:requestId/approve', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = reviewBodySchema.parse(req.body ?? {});
      const requestId = parseRecordId(req.params['requestId'], 'analysis request');
      res.json(toResponse(await domain.approveRequest({ requestId, reviewer: body.reviewer, note: body.note })));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/requests/:requestId/deny */
  router.post('/:requestId/deny', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = reviewBodySchema.parse(req.body ?? {});
      const requestId = parseRecordId(req.params['requestId'], 'analysis request');
      res.json(toResponse(await domain.denyRequest({ requestId, reviewer: body.reviewer, note: body.note })));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/requests/:requestId/result - declared output of a completed request, in its wire form */
  router.get('/:requestId/result', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const requestId = parseRecordId(req.params['requestId'], 'analysis request');
      res.json(serializeAnalysisResult(await domain.getResult(requestId)));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
