import { z } from 'zod';

import { InvalidRequestError } from './errors.js';
import { apiPaths, type QueryParams, type Transport } from './http.js';
import type { Logger } from './logger.js';
import { isInProgress, normalizePage } from './normalize.js';
import { parseWith, rawResultPageSchema } from './schema.js';
import { pollUntilSettled, type WaitFn } from './poller.js';
import type { DetectionResultPage, GetResultsOptions, ResultsQuery } from './types.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be formatted as YYYY-MM-DD');

export const resultsQuerySchema = z.object({
  pageNumber: z.number().int().nonnegative().default(0),
  size: z.number().int().positive().optional(),
  name: z.string().optional(),
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
});

export interface ResultsRequest {
  path: string;
  query: QueryParams;
}

export function buildResultsRequest(query: ResultsQuery = {}): ResultsRequest {
  const parsed = resultsQuerySchema.safeParse(query);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'query';
    throw new InvalidRequestError(`Invalid results query: ${field} ${issue?.message ?? 'is invalid'}`);
  }

  const { pageNumber, size, name, startDate, endDate } = parsed.data;
  return {
    path: `${apiPaths.mediaResultPages}/${pageNumber}`,
    query: { size, name, startDate, endDate },
  };
}

export function pageHasPendingItems(page: DetectionResultPage): boolean {
  return page.items.some(isInProgress);
}

export interface PageFetcherDependencies {
  transport: Transport;
  wait?: WaitFn;
  logger?: Logger;
}

/**
 * Fetches one page of results. With a polling policy the whole page is
 * re-fetched until none of its items is still analyzing.
 */
export async function fetchResultsPage(
  options: GetResultsOptions,
  dependencies: PageFetcherDependencies,
): Promise<DetectionResultPage> {
  const { maxAttempts, pollingIntervalMs, signal, ...query } = options;
  const request = buildResultsRequest(query);
  const { transport, wait, logger } = dependencies;

  return pollUntilSettled({
    subject: `results page ${request.path}`,
    policy: { maxAttempts, pollingIntervalMs },
    wait,
    signal,
    logger,
    isPending: pageHasPendingItems,
    fetch: async (attemptSignal) => {
      const json = await transport.get(request.path, request.query, attemptSignal);
      return normalizePage(parseWith(rawResultPageSchema, json, 'results page'));
    },
  });
}
