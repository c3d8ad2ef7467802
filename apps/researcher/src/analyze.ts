import 'dotenv/config';
import { setTimeout as sleep } from 'node:timers/promises';
import type { CongestionAnalysis } from '@traffic-vault/domain';
import { readResearcherConfig, type ResearcherConfig } from './config.js';
import { HttpDomainClient, type DomainApi, type RemoteAnalysisRequest } from './domain-client.js';
import { formatInsights, renderHeatmap } from './insights.js';

/**
 * Researcher workflow: pick a dataset, ask the data domain for a congestion
 * grid, wait for the owner's decision and print what was released.
 */

export interface WaitOptions {
  pollIntervalMs: number;
  timeoutMs: number;
  sleep?: (ms: number) => Promise<unknown>;
}

/** Polls until the request leaves PENDING. */
export async function waitForReview(
  api: DomainApi,
  requestId: string,
  { pollIntervalMs, timeoutMs, sleep: pause = sleep }: WaitOptions,
): Promise<RemoteAnalysisRequest> {
  for (let waited = 0; ; waited += pollIntervalMs) {
    const request = await api.getRequest(requestId);
    if (request.status !== 'PENDING') return request;
    if (waited >= timeoutMs) {
      throw new Error(`request ${requestId} still awaiting approval after ${timeoutMs} ms`);
    }
    await pause(pollIntervalMs);
  }
}

export async function runAnalysis(
  api: DomainApi,
  config: Omit<ResearcherConfig, 'apiBaseUrl'>,
  sleepFn?: WaitOptions['sleep'],
): Promise<CongestionAnalysis> {
  let datasetId = config.datasetId;
  if (!datasetId) {
    const [latest] = await api.listDatasets();
    if (!latest) throw new Error('no datasets registered with the data domain; run the trace generator first');
    console.log(`[researcher] using most recent dataset ${latest.id} "${latest.name}" (${latest.totalPoints} points)`);
    datasetId = latest.id;
  }

  const params: Record<string, unknown> = {};
  if (config.gridSize !== undefined) params['gridSize'] = config.gridSize;
  if (config.hotspotRatio !== undefined) params['hotspotRatio'] = config.hotspotRatio;

  const submitted = await api.submitAnalysis({
    datasetId,
    analysis: 'congestion_grid',
    params,
    requestedBy: config.requestedBy,
    reason: config.reason,
  });
  console.log(`[researcher] submitted request ${submitted.id}; waiting for the data owner to approve`);

  const reviewed = await waitForReview(api, submitted.id, {
    pollIntervalMs: config.pollIntervalMs,
    timeoutMs: config.approvalTimeoutMs,
    sleep: sleepFn,
  });

  if (reviewed.status === 'DENIED') {
    const by = reviewed.reviewedBy ? ` by ${reviewed.reviewedBy}` : '';
    const note = reviewed.reviewNote ? `: ${reviewed.reviewNote}` : '';
    throw new Error(`request ${reviewed.id} denied${by}${note}`);
  }
  if (reviewed.status === 'FAILED') {
    throw new Error(`request ${reviewed.id} failed inside the data domain: ${reviewed.error ?? 'unknown error'}`);
  }

  return api.getCongestionResult(submitted.id);
}

async function main(): Promise<void> {
  const config = readResearcherConfig(process.env);
  const report = await runAnalysis(new HttpDomainClient(config.apiBaseUrl), config);

  console.log('\n=== Traffic Insights ===');
  console.log(formatInsights(report));
  console.log('\nCongestion heatmap (north up):');
  console.log(renderHeatmap(report.congestionGrid));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error('[researcher] failed:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
