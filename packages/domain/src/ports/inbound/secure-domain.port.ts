import type { GpsSample } from '../../entities/gps-sample.js';
import type { DatasetSummary } from '../../entities/traffic-dataset.js';
import type {
  AnalysisKind,
  AnalysisRequest,
  AnalysisRequestStatus,
  AnalysisResult,
} from '../../entities/analysis-request.js';

// ---------------------------------------------------------------------------
// Owner side
// ---------------------------------------------------------------------------

export interface GenerateDatasetCommand {
  name?: string;
  numDrivers: number;
  simulationDays: number;
  startDate: Date;
  seed?: number;
}

// ---------------------------------------------------------------------------
// Researcher side
// ---------------------------------------------------------------------------

export interface SubmitAnalysisCommand {
  datasetId: string;
  analysis: AnalysisKind;
  params?: Record<string, unknown>;
  requestedBy: string;
  reason?: string;
}

export interface ReviewCommand {
  requestId: string;
  reviewer: string;
  note?: string;
}

export interface AnalysisDescriptor {
  kind: AnalysisKind;
  description: string;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

/**
 * submit(function, dataset) → approval gate → result.
 * Raw samples go in through the owner operations and never come back out;
 * researchers only see dataset metadata and the declared output of an
 * approved analysis.
 */
export interface SecureDomainPort {
  uploadDataset(name: string, samples: readonly GpsSample[]): Promise<DatasetSummary>;
  generateDataset(cmd: GenerateDatasetCommand): Promise<DatasetSummary>;
  listDatasets(): Promise<DatasetSummary[]>;
  getDataset(datasetId: string): Promise<DatasetSummary>;

  listAnalyses(): AnalysisDescriptor[];
  submitAnalysis(cmd: SubmitAnalysisCommand): Promise<AnalysisRequest>;
  listRequests(status?: AnalysisRequestStatus): Promise<AnalysisRequest[]>;
  getRequest(requestId: string): Promise<AnalysisRequest>;
  approveRequest(cmd: ReviewCommand): Promise<AnalysisRequest>;
  denyRequest(cmd: ReviewCommand): Promise<AnalysisRequest>;
  getResult(requestId: string): Promise<AnalysisResult>;
}
