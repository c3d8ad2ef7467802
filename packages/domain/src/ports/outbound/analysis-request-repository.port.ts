import type {
  AnalysisKind,
  AnalysisRequest,
  AnalysisRequestStatus,
  AnalysisResult,
} from '../../entities/analysis-request.js';

export interface NewAnalysisRequest {
  datasetId: string;
  analysis: AnalysisKind;
  params: Record<string, unknown>;
  requestedBy: string;
  reason?: string;
}

export interface AnalysisRequestReview {
  status: Exclude<AnalysisRequestStatus, 'PENDING'>;
  reviewedBy: string;
  reviewNote?: string;
  result?: AnalysisResult;
  error?: string;
}

export interface AnalysisRequestRepositoryPort {
  create(request: NewAnalysisRequest): Promise<AnalysisRequest>;
  findById(requestId: string): Promise<AnalysisRequest | null>;
  list(status?: AnalysisRequestStatus): Promise<AnalysisRequest[]>;
  /** Throws NotFoundError when the request does not exist. */
  recordReview(requestId: string, review: AnalysisRequestReview): Promise<AnalysisRequest>;
}
