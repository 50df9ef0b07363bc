import { DEFAULT_MAX_CONCURRENCY } from './config.js';
import { describeError } from './errors.js';
import type { Logger } from './logger.js';
import { isWaitRequested } from './poller.js';
import { describeUpload } from './upload.js';
import {
  AnalysisStatus,
  type BatchOptions,
  type DetectionResult,
  type PollingPolicy,
  type UploadDescriptor,
  type UploadHandle,
} from './types.js';

/**
 * Runs `task` over `items` in consecutive groups of at most `groupSize`.
 * Members of a group start together and the whole group settles before the
 * next one starts. Results are returned in input order.
 */
export async function mapInGroups<T, R>(
  items: readonly T[],
  groupSize: number,
  task: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<PromiseSettledResult<R>[]> {
  const settled: PromiseSettledResult<R>[] = [];
  for (let start = 0; start < items.length; start += groupSize) {
    signal?.throwIfAborted();
    const group = items.slice(start, start + groupSize);
    const results = await Promise.allSettled(group.map((item, offset) => task(item, start + offset)));
    settled.push(...results);
  }
  signal?.throwIfAborted();
  return settled;
}

export function pendingResult(requestId: string): DetectionResult {
  return {
    requestId,
    status: AnalysisStatus.PROCESSING,
    score: null,
    models: [],
  };
}

export interface BatchDependencies {
  upload: (input: UploadDescriptor, signal?: AbortSignal) => Promise<UploadHandle>;
  getResult: (requestId: string, policy: PollingPolicy, signal?: AbortSignal) => Promise<DetectionResult>;
  logger: Logger;
}

function isValidConcurrency(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

export async function processBatch(
  inputs: readonly UploadDescriptor[],
  options: BatchOptions,
  dependencies: BatchDependencies,
): Promise<DetectionResult[]> {
  if (inputs.length === 0) {
    return [];
  }

  const { signal } = options;
  const { upload, getResult, logger } = dependencies;
  const concurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
  if (!isValidConcurrency(concurrency)) {
    logger.warn({ maxConcurrency: concurrency, inputs: inputs.length }, 'maxConcurrency must be a positive integer; skipping batch');
    return [];
  }

  const uploads = await mapInGroups(inputs, concurrency, (input) => upload(input, signal), signal);
  const requestIds = uploads.flatMap((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      return [outcome.value.requestId];
    }
    logger.warn(
      { input: describeUpload(inputs[index] ?? ''), err: describeError(outcome.reason) },
      'upload failed; dropping from batch',
    );
    return [];
  });

  const policy: PollingPolicy = {
    maxAttempts: options.maxAttempts,
    pollingIntervalMs: options.pollingIntervalMs,
  };
  if (!isWaitRequested(policy)) {
    return requestIds.map(pendingResult);
  }

  const results = await mapInGroups(requestIds, concurrency, (requestId) => getResult(requestId, policy, signal), signal);
  return results.flatMap((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      return [outcome.value];
    }
    logger.warn(
      { requestId: requestIds[index], err: describeError(outcome.reason) },
      'result polling failed; dropping from batch',
    );
    return [];
  });
}
