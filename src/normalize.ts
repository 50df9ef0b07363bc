import type { RawAnalysisPayload, RawModelResult, RawResultPage, RawResultsSummary } from './schema.js';
import { AnalysisStatus, type DetectionModelResult, type DetectionResult, type DetectionResultPage } from './types.js';

export type PredictionValue =
  | { kind: 'numeric'; value: number }
  | { kind: 'not-evaluated'; reason: string | null; decision: string | null }
  | { kind: 'absent' };

export type ScoreExtractor<T> = (source: T) => number | null | undefined;

export function mapStatus(status: string): string {
  return status === AnalysisStatus.FAKE ? AnalysisStatus.MANIPULATED : status;
}

/**
 * Maps a raw score onto 0-1. Upstream mixes a 0-100 scale with already
 * normalized values, so only values above 1 are divided.
 */
export function toUnitScale(value: number): number {
  const scaled = value > 1 ? value / 100 : value;
  return Math.min(1, Math.max(0, scaled));
}

export function firstScore<T>(source: T, extractors: ReadonlyArray<ScoreExtractor<T>>): number | null {
  for (const extract of extractors) {
    const raw = extract(source);
    if (typeof raw === 'number' && Number.isFinite(raw)) {
      return toUnitScale(raw);
    }
  }
  return null;
}

export function classifyPrediction(value: RawModelResult['predictionNumber']): PredictionValue {
  if (value === null || value === undefined) {
    return { kind: 'absent' };
  }
  if (typeof value === 'number') {
    return { kind: 'numeric', value };
  }
  return { kind: 'not-evaluated', reason: value.reason ?? null, decision: value.decision ?? null };
}

function summaryFinalScore(summary: RawResultsSummary | null | undefined): number | null {
  const candidate = summary?.metadata?.finalScore;
  return typeof candidate === 'number' ? candidate : null;
}

export const overallScoreExtractors: ReadonlyArray<ScoreExtractor<RawAnalysisPayload>> = [
  (payload) => payload.finalScore,
  (payload) => summaryFinalScore(payload.resultsSummary),
];

export const modelScoreExtractors: ReadonlyArray<ScoreExtractor<RawModelResult>> = [
  (model) => {
    const prediction = classifyPrediction(model.predictionNumber);
    return prediction.kind === 'numeric' ? prediction.value : null;
  },
  (model) => model.normalizedPredictionNumber,
  (model) => model.finalScore,
];

export function normalizeModel(model: RawModelResult): DetectionModelResult {
  return {
    name: model.name,
    status: mapStatus(model.status),
    score: firstScore(model, modelScoreExtractors),
  };
}

export function normalizeAnalysis(payload: RawAnalysisPayload): DetectionResult {
  const result: DetectionResult = {
    requestId: payload.requestId,
    status: mapStatus(payload.overallStatus),
    score: firstScore(payload, overallScoreExtractors),
    models: payload.models
      .filter((model) => model.status !== AnalysisStatus.NOT_APPLICABLE)
      .map(normalizeModel),
  };

  if (payload.resultsSummary) {
    result.summaryStatus = mapStatus(payload.resultsSummary.status);
  }

  return result;
}

export function normalizePage(page: RawResultPage): DetectionResultPage {
  return {
    totalItems: page.totalItems,
    totalPages: page.totalPages,
    currentPage: page.currentPage,
    currentPageItemsCount: page.currentPageItemsCount,
    items: page.mediaList.map(normalizeAnalysis),
  };
}

export function isInProgress(result: Pick<DetectionResult, 'status'>): boolean {
  return result.status === AnalysisStatus.ANALYZING;
}
