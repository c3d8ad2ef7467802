import type { CongestionAnalysis, SpreadAssessment } from './congestion.js';

export type AnalysisKind = 'congestion_grid' | 'spread_deviation';

export const ANALYSIS_KINDS: readonly AnalysisKind[] = ['congestion_grid', 'spread_deviation'];

export type AnalysisRequestStatus = 'PENDING' | 'COMPLETED' | 'DENIED' | 'FAILED';

export type AnalysisResult =
  | { readonly kind: 'congestion_grid'; readonly report: CongestionAnalysis }
  | { readonly kind: 'spread_deviation'; readonly report: SpreadAssessment };

export interface AnalysisRequest {
  readonly id: string;
  readonly datasetId: string;
  readonly analysis: AnalysisKind;
  readonly params: Record<string, unknown>;
  readonly status: AnalysisRequestStatus;
  readonly requestedBy: string;
  readonly reason?: string;
  readonly reviewedBy?: string;
  readonly reviewNote?: string;
  readonly result?: AnalysisResult;
  readonly error?: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly reviewedAt?: Date;
}
