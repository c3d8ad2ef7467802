import { ZodError } from 'zod';
import { createRandomSource } from '@traffic-vault/adapters';
import {
  ANALYSIS_KINDS,
  ConflictError,
  DomainError,
  NotFoundError,
  generateTrafficData,
  formatTimestamp,
} from '@traffic-vault/domain';
import type {
  AnalysisDescriptor,
  AnalysisRequest,
  AnalysisRequestRepositoryPort,
  AnalysisRequestReview,
  AnalysisRequestStatus,
  AnalysisResult,
  DatasetRepositoryPort,
  DatasetSummary,
  GenerateDatasetCommand,
  GpsSample,
  ReviewCommand,
  SecureDomainPort,
  SubmitAnalysisCommand,
} from '@traffic-vault/domain';
import { ANALYSES } from './analysis-registry.js';

/**
 * Data-owner enclave. Researchers submit a registered analysis against a
 * dataset; nothing runs until the owner approves, and only the analysis'
 * declared output is handed back.
 */
export class SecureDomainService implements SecureDomainPort {
  constructor(
    private readonly datasets: DatasetRepositoryPort,
    private readonly requests: AnalysisRequestRepositoryPort,
  ) {}

  // ─── Owner ──────────────────────────────────────────────────────────────────

  async uploadDataset(name: string, samples: readonly GpsSample[]): Promise<DatasetSummary> {
    const dataset = await this.datasets.create({ name, samples });
    console.log(`[secure-domain] dataset ${dataset.id} "${name}" registered (${dataset.totalPoints} points)`);
    return dataset;
  }

  async generateDataset(cmd: GenerateDatasetCommand): Promise<DatasetSummary> {
    const samples = generateTrafficData({
      numDrivers: cmd.numDrivers,
      simulationDays: cmd.simulationDays,
      startDate: cmd.startDate,
      rng: createRandomSource(cmd.seed),
    });
    const name =
      cmd.name ?? `synthetic-${cmd.numDrivers}x${cmd.simulationDays}-${formatTimestamp(cmd.startDate).slice(0, 10)}`;
    return this.uploadDataset(name, samples);
  }

  async listDatasets(): Promise<DatasetSummary[]> {
    return this.datasets.list();
  }

  async getDataset(datasetId: string): Promise<DatasetSummary> {
    const dataset = await this.datasets.findById(datasetId);
    if (!dataset) throw new NotFoundError(`dataset ${datasetId} not found`);
    return dataset;
  }

  // ─── Researcher ─────────────────────────────────────────────────────────────

  listAnalyses(): AnalysisDescriptor[] {
    return ANALYSIS_KINDS.map((kind) => ({ kind, description: ANALYSES[kind].description }));
  }

  async submitAnalysis(cmd: SubmitAnalysisCommand): Promise<AnalysisRequest> {
    await this.getDataset(cmd.datasetId);
    const params = ANALYSES[cmd.analysis].parseParams(cmd.params);
    const request = await this.requests.create({
      datasetId: cmd.datasetId,
      analysis: cmd.analysis,
      params,
      requestedBy: cmd.requestedBy,
      reason: cmd.reason,
    });
    console.log(
      `[secure-domain] request ${request.id}: ${cmd.requestedBy} asks for ${cmd.analysis} on dataset ${cmd.datasetId}`,
    );
    return request;
  }

  async listRequests(status?: AnalysisRequestStatus): Promise<AnalysisRequest[]> {
    return this.requests.list(status);
  }

  async getRequest(requestId: string): Promise<AnalysisRequest> {
    const request = await this.requests.findById(requestId);
    if (!request) throw new NotFoundError(`analysis request ${requestId} not found`);
    return request;
  }

  async getResult(requestId: string): Promise<AnalysisResult> {
    const request = await this.getRequest(requestId);
    if (request.status !== 'COMPLETED' || !request.result) {
      throw new ConflictError(`analysis request ${requestId} is ${request.status}; no result available`);
    }
    return request.result;
  }

  // ─── Approval gate ──────────────────────────────────────────────────────────

  async approveRequest(cmd: ReviewCommand): Promise<AnalysisRequest> {
    const request = await this.requirePending(cmd.requestId);
    const points = await this.datasets.readPoints(request.datasetId);

    let outcome: Pick<AnalysisRequestReview, 'status' | 'result' | 'error'>;
    try {
      outcome = { status: 'COMPLETED', result: ANALYSES[request.analysis].execute(points, request.params) };
    } catch (err) {
      if (!(err instanceof DomainError || err instanceof ZodError)) throw err;
      outcome = { status: 'FAILED', error: err.message };
      console.warn(`[secure-domain] request ${request.id} failed during execution: ${err.message}`);
    }

    const reviewed = await this.requests.recordReview(request.id, {
      ...outcome,
      reviewedBy: cmd.reviewer,
      reviewNote: cmd.note,
    });
    console.log(
      `[secure-domain] request ${request.id} approved by ${cmd.reviewer}; ${request.analysis} ran over ${points.length} points -> ${reviewed.status}`,
    );
    return reviewed;
  }

  async denyRequest(cmd: ReviewCommand): Promise<AnalysisRequest> {
    await this.requirePending(cmd.requestId);
    const reviewed = await this.requests.recordReview(cmd.requestId, {
      status: 'DENIED',
      reviewedBy: cmd.reviewer,
      reviewNote: cmd.note,
    });
    console.log(`[secure-domain] request ${cmd.requestId} denied by ${cmd.reviewer}`);
    return reviewed;
  }

  private async requirePending(requestId: string): Promise<AnalysisRequest> {
    const request = await this.getRequest(requestId);
    if (request.status !== 'PENDING') {
      throw new ConflictError(`analysis request ${requestId} is already ${request.status}`);
    }
    return request;
  }
}
