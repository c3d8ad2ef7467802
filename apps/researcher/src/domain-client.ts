import { fetch } from 'undici';
import { z } from 'zod';
import { deserializeCongestionAnalysis } from '@traffic-vault/domain';
import type { AnalysisKind, CongestionAnalysis } from '@traffic-vault/domain';

// ─── Response schemas ─────────────────────────────────────────────────────────
// The researcher only ever sees metadata, request state and declared results.

const datasetSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  numDrivers: z.number(),
  totalPoints: z.number(),
  startTs: z.string().nullable(),
  endTs: z.string().nullable(),
  createdAt: z.string(),
});

const analysisRequestSchema = z.object({
  id: z.string(),
  datasetId: z.string(),
  analysis: z.enum(['congestion_grid', 'spread_deviation']),
  status: z.enum(['PENDING', 'COMPLETED', 'DENIED', 'FAILED']),
  reviewedBy: z.string().optional(),
  reviewNote: z.string().optional(),
  error: z.string().optional(),
});

/** Released output of a congestion_grid analysis. */
const congestionRecordSchema = z.object({
  total_gps_points: z.number(),
  average_location: z.object({ lat: z.number(), lon: z.number() }).nullable(),
  congestion_grid: z.array(z.array(z.number())),
  hotspots: z.array(z.object({ latitude: z.number(), longitude: z.number(), congestion_level: z.number() })),
  grid_bounds: z
    .object({ lat_min: z.number(), lat_max: z.number(), lon_min: z.number(), lon_max: z.number() })
    .nullable(),
});

export type RemoteDataset = z.infer<typeof datasetSummarySchema>;
export type RemoteAnalysisRequest = z.infer<typeof analysisRequestSchema>;

export interface SubmitAnalysisBody {
  datasetId: string;
  analysis: AnalysisKind;
  params?: Record<string, unknown>;
  requestedBy: string;
  reason?: string;
}

/** What the researcher can ask of the data domain. */
export interface DomainApi {
  listDatasets(): Promise<RemoteDataset[]>;
  submitAnalysis(body: SubmitAnalysisBody): Promise<RemoteAnalysisRequest>;
  getRequest(requestId: string): Promise<RemoteAnalysisRequest>;
  getCongestionResult(requestId: string): Promise<CongestionAnalysis>;
}

export class DomainApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'DomainApiError';
  }
}

export class HttpDomainClient implements DomainApi {
  constructor(private readonly baseUrl: string) {}

  async listDatasets(): Promise<RemoteDataset[]> {
    const body = await this.request('GET', '/api/datasets');
    return z.object({ data: z.array(datasetSummarySchema) }).parse(body).data;
  }

  async submitAnalysis(body: SubmitAnalysisBody): Promise<RemoteAnalysisRequest> {
    return analysisRequestSchema.parse(await this.request('POST', '/api/requests', body));
  }

  async getRequest(requestId: string): Promise<RemoteAnalysisRequest> {
    return analysisRequestSchema.parse(await this.request('GET', `/api/requests/${encodeURIComponent(requestId)}`));
  }

  async getCongestionResult(requestId: string): Promise<CongestionAnalysis> {
    const body = await this.request('GET', `/api/requests/${encodeURIComponent(requestId)}/result`);
    return deserializeCongestionAnalysis(congestionRecordSchema.parse(body));
  }

  private async request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
    const resp = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!resp.ok) {
      const text = await resp.text();
      throw new DomainApiError(`${method} ${path} failed ${resp.status}: ${text}`, resp.status);
    }
    return resp.json();
  }
}
