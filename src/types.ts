export const AnalysisStatus = {
  ANALYZING: 'ANALYZING',
  COMPLETED: 'COMPLETED',
  /** Wire-level label for manipulated media; never surfaces in canonical results. */
  FAKE: 'FAKE',
  MANIPULATED: 'MANIPULATED',
  NOT_APPLICABLE: 'NOT_APPLICABLE',
  PROCESSING: 'PROCESSING',
  ERROR: 'ERROR',
} as const;

export interface DetectionModelResult {
  name: string;
  status: string;
  /** 0-1, null when the model did not produce a usable score. */
  score: number | null;
}

export interface DetectionResult {
  requestId: string;
  status: string;
  /** 0-1, higher means more likely manipulated; null while processing or when unscored. */
  score: number | null;
  models: DetectionModelResult[];
  summaryStatus?: string;
}

export interface DetectionResultPage {
  totalItems: number;
  totalPages: number;
  currentPage: number;
  currentPageItemsCount: number;
  items: DetectionResult[];
}

export interface UploadHandle {
  requestId: string;
  mediaId?: string;
  resultUrl?: string;
}

export type UploadDescriptor = string | { filePath: string } | { socialLink: string };

export interface PollingPolicy {
  maxAttempts?: number;
  pollingIntervalMs?: number;
}

export interface Cancellable {
  signal?: AbortSignal;
}

export interface GetResultOptions extends PollingPolicy, Cancellable {}

export interface ResultsQuery {
  /** Zero-based. */
  pageNumber?: number;
  size?: number;
  name?: string;
  /** YYYY-MM-DD */
  startDate?: string;
  /** YYYY-MM-DD */
  endDate?: string;
}

export interface GetResultsOptions extends ResultsQuery, PollingPolicy, Cancellable {}

export interface BatchOptions extends PollingPolicy, Cancellable {
  maxConcurrency?: number;
}

export interface UploadOptions extends Cancellable {
  filePath: string;
}

export interface SocialMediaUploadOptions extends Cancellable {
  socialLink: string;
}
