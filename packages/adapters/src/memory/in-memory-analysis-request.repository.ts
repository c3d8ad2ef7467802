import { v4 as uuidv4 } from 'uuid';
import type {
  AnalysisRequestRepositoryPort,
  AnalysisRequestReview,
  NewAnalysisRequest,
} from '@traffic-vault/domain';
import type { AnalysisRequest, AnalysisRequestStatus } from '@traffic-vault/domain';
import { ConflictError, NotFoundError } from '@traffic-vault/domain';
import { wallClockNow } from '../clock/deterministic-clock.js';

export class InMemoryAnalysisRequestRepository implements AnalysisRequestRepositoryPort {
  private readonly requests = new Map<string, AnalysisRequest>();

  constructor(private readonly now: () => Date = wallClockNow) {}

  async create(request: NewAnalysisRequest): Promise<AnalysisRequest> {
    const ts = this.now();
    const created: AnalysisRequest = {
      id: uuidv4(),
      datasetId: request.datasetId,
      analysis: request.analysis,
      params: request.params,
      status: 'PENDING',
      requestedBy: request.requestedBy,
      reason: request.reason,
      createdAt: ts,
      updatedAt: ts,
    };
    this.requests.set(created.id, created);
    return created;
  }

  async findById(requestId: string): Promise<AnalysisRequest | null> {
    return this.requests.get(requestId) ?? null;
  }

  async list(status?: AnalysisRequestStatus): Promise<AnalysisRequest[]> {
    const all = [...this.requests.values()];
    return status ? all.filter((r) => r.status === status) : all;
  }

  async recordReview(requestId: string, review: AnalysisRequestReview): Promise<AnalysisRequest> {
    const existing = this.requests.get(requestId);
    if (!existing) throw new NotFoundError(`analysis request ${requestId} not found`);
    if (existing.status !== 'PENDING') {
      throw new ConflictError(`analysis request ${requestId} is already ${existing.status}`);
    }
    const ts = this.now();
    const reviewed: AnalysisRequest = {
      ...existing,
      status: review.status,
      reviewedBy: review.reviewedBy,
      reviewNote: review.reviewNote,
      result: review.result,
      error: review.error,
      reviewedAt: ts,
      updatedAt: ts,
    };
    this.requests.set(requestId, reviewed);
    return reviewed;
  }
}
