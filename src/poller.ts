import { setTimeout as sleep } from 'node:timers/promises';

import { TimeoutError } from './errors.js';
import type { Logger } from './logger.js';
import { isInProgress } from './normalize.js';
import type { DetectionResult, PollingPolicy } from './types.js';

export type WaitFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultWait: WaitFn = (ms, signal) => sleep(ms, undefined, { signal });

export interface ActivePollingPolicy {
  maxAttempts: number;
  pollingIntervalMs: number;
}

/** Waiting happens only when both the attempt budget and the interval are positive. */
export function isWaitRequested(policy: PollingPolicy | undefined): policy is ActivePollingPolicy {
  return (policy?.maxAttempts ?? 0) > 0 && (policy?.pollingIntervalMs ?? 0) > 0;
}

export interface PollOptions<T> {
  fetch: (signal?: AbortSignal) => Promise<T>;
  isPending: (value: T) => boolean;
  /** Used in the timeout message and logs. */
  subject: string;
  policy?: PollingPolicy;
  wait?: WaitFn;
  signal?: AbortSignal;
  logger?: Logger;
}

export async function pollUntilSettled<T>(options: PollOptions<T>): Promise<T> {
  const { fetch, isPending, subject, policy, wait = defaultWait, signal, logger } = options;

  if (!isWaitRequested(policy)) {
    signal?.throwIfAborted();
    return fetch(signal);
  }

  const startedAt = Date.now();
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    signal?.throwIfAborted();
    const value = await fetch(signal);
    if (!isPending(value)) {
      return value;
    }

    logger?.debug({ subject, attempt, maxAttempts: policy.maxAttempts }, 'still analyzing');
    if (attempt < policy.maxAttempts) {
      signal?.throwIfAborted();
      await wait(policy.pollingIntervalMs, signal);
    }
  }

  const elapsedMs = Date.now() - startedAt;
  throw new TimeoutError(
    `Timed out waiting for ${subject} after ${policy.maxAttempts} attempts (${elapsedMs}ms)`,
    elapsedMs,
    policy.maxAttempts,
  );
}

export interface ResultPollerOptions {
  policy?: PollingPolicy;
  wait?: WaitFn;
  signal?: AbortSignal;
  logger?: Logger;
}

export function pollResult(
  requestId: string,
  fetchResult: (requestId: string, signal?: AbortSignal) => Promise<DetectionResult>,
  options: ResultPollerOptions = {},
): Promise<DetectionResult> {
  return pollUntilSettled({
    ...options,
    subject: `result ${requestId}`,
    fetch: (signal) => fetchResult(requestId, signal),
    isPending: isInProgress,
  });
}
