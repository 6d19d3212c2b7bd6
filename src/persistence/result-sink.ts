import { Actor, log } from "apify";
import type { AcquisitionResult } from "../acquisition/types";

export interface ResultSink {
  write(result: AcquisitionResult): Promise<void>;
}

// A type alias rather than an interface so it satisfies the dataset's dictionary constraint.
export type ResultItem = {
  target_name: string;
  found: boolean;
  strategy_used: string | null;
  match_score: number | null;
  elapsed_ms: number;
  escalated: boolean;
  error_code: string | null;
  error_message: string | null;
  title: string | null;
  url: string | null;
  source: string | null;
  document_number: string | null;
  issuing_office: string | null;
  published_at: string | null;
  effective_at: string | null;
  status: string | null;
  keywords: string[];
  content: string | null;
  attempts: Array<{ strategy: string; outcome: string; elapsed_ms: number; error: string | null }>;
  stored_at: string;
};

export const toResultItem = (result: AcquisitionResult, now = new Date()): ResultItem => {
  const record = result.record;
  return {
    target_name: result.targetName,
    found: result.found,
    strategy_used: result.strategyUsed,
    match_score: result.matchScore === null ? null : Math.round(result.matchScore * 1000) / 1000,
    elapsed_ms: result.elapsedMs,
    escalated: result.escalated,
    error_code: result.error?.code ?? null,
    error_message: result.error?.message ?? null,
    title: record?.title ?? null,
    url: record?.url ?? null,
    source: record?.source ?? null,
    document_number: record?.documentNumber ?? null,
    issuing_office: record?.issuingOffice ?? null,
    published_at: record?.publishedAt ?? null,
    effective_at: record?.effectiveAt ?? null,
    status: record?.status ?? null,
    keywords: record ? [...record.keywords] : [],
    content: record?.content ?? null,
    attempts: result.attempts.map((attempt) => ({
      strategy: attempt.strategy,
      outcome: attempt.outcome,
      elapsed_ms: attempt.elapsedMs,
      error: attempt.error ? `${attempt.error.code}: ${attempt.error.message}` : null,
    })),
    stored_at: now.toISOString(),
  };
};

/** Pushes one flattened item per result into an actor dataset (the default one when no name is given). */
export class DatasetResultSink implements ResultSink {
  private readonly datasetName: string | null;
  private dataset: Awaited<ReturnType<typeof Actor.openDataset>> | null = null;

  public constructor(datasetName: string | null) {
    this.datasetName = datasetName;
  }

  public async init(): Promise<void> {
    this.dataset = await Actor.openDataset(this.datasetName ?? undefined);
    log.info("Result dataset opened.", { dataset: this.datasetName ?? "default" });
  }

  public async write(result: AcquisitionResult): Promise<void> {
    if (!this.dataset) await this.init();
    await this.dataset?.pushData(toResultItem(result));
  }
}

export class MemoryResultSink implements ResultSink {
  public readonly results: AcquisitionResult[] = [];

  public async write(result: AcquisitionResult): Promise<void> {
    this.results.push(result);
  }
}
