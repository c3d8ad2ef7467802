import type {
  AnalysisRequestRepositoryPort,
  AnalysisRequestReview,
  NewAnalysisRequest,
} from '@traffic-vault/domain';
import type {
  AnalysisKind,
  AnalysisRequest,
  AnalysisRequestStatus,
  AnalysisResult,
} from '@traffic-vault/domain';
import { ConflictError, NotFoundError } from '@traffic-vault/domain';
import { getPool } from './pool.js';

export class PgAnalysisRequestRepository implements AnalysisRequestRepositoryPort {
  async create(request: NewAnalysisRequest): Promise<AnalysisRequest> {
    const { rows } = await getPool().query(
      `INSERT INTO traffic.analysis_requests
         (dataset_id, analysis, params, requested_by, reason)
       VALUES ($1, $2, $3::jsonb, $4, $5)
       RETURNING *`,
      [
        request.datasetId,
        request.analysis,
        JSON.stringify(request.params),
        request.requestedBy,
        request.reason ?? null,
      ],
    );
    return mapRequestRow(rows[0]);
  }

  async findById(requestId: string): Promise<AnalysisRequest | null> {
    const { rows } = await getPool().query(`SELECT * FROM traffic.analysis_requests WHERE id = $1`, [requestId]);
    return rows[0] ? mapRequestRow(rows[0]) : null;
  }

  async list(status?: AnalysisRequestStatus): Promise<AnalysisRequest[]> {
    const params: unknown[] = [];
    let sql = `SELECT * FROM traffic.analysis_requests`;
    if (status) {
      params.push(status);
      sql += ` WHERE status = $1`;
    }
    sql += ` ORDER BY created_at ASC`;
    const { rows } = await getPool().query(sql, params);
    return rows.map(mapRequestRow);
  }

  async recordReview(requestId: string, review: AnalysisRequestReview): Promise<AnalysisRequest> {
    // Only a PENDING request can be reviewed; the WHERE clause makes that atomic.
    const { rows } = await getPool().query(
      `UPDATE traffic.analysis_requests
       SET status = $2, reviewed_by = $3, review_note = $4, result = $5::jsonb, error = $6,
           reviewed_at = NOW(), updated_at = NOW()
       WHERE id = $1 AND status = 'PENDING'
       RETURNING *`,
      [
        requestId,
        review.status,
        review.reviewedBy,
        review.reviewNote ?? null,
        review.result ? JSON.stringify(review.result) : null,
        review.error ?? null,
      ],
    );
    if (rows[0]) return mapRequestRow(rows[0]);

    const existing = await this.findById(requestId);
    if (!existing) throw new NotFoundError(`analysis request ${requestId} not found`);
    throw new ConflictError(`analysis request ${requestId} is already ${existing.status}`);
  }
}

function mapRequestRow(row: Record<string, unknown>): AnalysisRequest {
  return {
    id: row['id'] as string,
    datasetId: row['dataset_id'] as string,
    analysis: row['analysis'] as AnalysisKind,
    params: (row['params'] as Record<string, unknown>) ?? {},
    status: row['status'] as AnalysisRequestStatus,
    requestedBy: row['requested_by'] as string,
    reason: (row['reason'] as string | null) ?? undefined,
    reviewedBy: (row['reviewed_by'] as string | null) ?? undefined,
    reviewNote: (row['review_note'] as string | null) ?? undefined,
    result: (row['result'] as AnalysisResult | null) ?? undefined,
    error: (row['error'] as string | null) ?? undefined,
    createdAt: row['created_at'] as Date,
    updatedAt: row['updated_at'] as Date,
    reviewedAt: (row['reviewed_at'] as Date | null) ?? undefined,
  };
}
