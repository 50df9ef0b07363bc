import { describe, expect, it, vi } from 'vitest';

import { TimeoutError } from '../src/errors.js';
import { isWaitRequested, pollResult, pollUntilSettled } from '../src/poller.js';
import type { DetectionResult } from '../src/types.js';

const analyzing = (requestId: string): DetectionResult => ({
  requestId,
  status: 'ANALYZING',
  score: null,
  models: [],
});

const completed = (requestId: string): DetectionResult => ({
  requestId,
  status: 'COMPLETED',
  score: 0.75,
  models: [],
});

function stubFetch(pendingCalls: number, terminal: (id: string) => DetectionResult = completed) {
  let calls = 0;
  return vi.fn(async (requestId: string) => {
    calls += 1;
    return calls <= pendingCalls ? analyzing(requestId) : terminal(requestId);
  });
}

describe('isWaitRequested', () => {
  it('requires both a positive attempt budget and interval', () => {
    expect(isWaitRequested(undefined)).toBe(false);
    expect(isWaitRequested({})).toBe(false);
    expect(isWaitRequested({ maxAttempts: 5 })).toBe(false);
    expect(isWaitRequested({ maxAttempts: 0, pollingIntervalMs: 1000 })).toBe(false);
    expect(isWaitRequested({ maxAttempts: 5, pollingIntervalMs: 0 })).toBe(false);
    expect(isWaitRequested({ maxAttempts: 5, pollingIntervalMs: 1000 })).toBe(true);
  });
});

describe('pollResult', () => {
  it('fetches once without sleeping when waiting is disabled', async () => {
    const fetchResult = stubFetch(10);
    const wait = vi.fn().mockResolvedValue(undefined);

    const result = await pollResult('req-1', fetchResult, { policy: { maxAttempts: 0, pollingIntervalMs: 1000 }, wait });

    expect(result.status).toBe('ANALYZING');
    expect(fetchResult).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it('returns the completed result after k + 1 fetches', async () => {
    const fetchResult = stubFetch(3);
    const wait = vi.fn().mockResolvedValue(undefined);

    const result = await pollResult('req-2', fetchResult, { policy: { maxAttempts: 5, pollingIntervalMs: 250 }, wait });

    expect(result).toEqual(completed('req-2'));
    expect(fetchResult).toHaveBeenCalledTimes(4);
    expect(wait).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledWith(250, undefined);
  });

  it('times out when the budget is spent while analyzing', async () => {
    const fetchResult = stubFetch(3);
    const wait = vi.fn().mockResolvedValue(undefined);

    const promise = pollResult('req-3', fetchResult, { policy: { maxAttempts: 3, pollingIntervalMs: 250 }, wait });

    await expect(promise).rejects.toBeInstanceOf(TimeoutError);
    await expect(promise).rejects.toMatchObject({ code: 'TIMEOUT', attempts: 3 });
    expect(fetchResult).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledTimes(2);
  });

  it('reports elapsed time on timeout', async () => {
    const fetchResult = stubFetch(1);

    const error = await pollResult('req-4', fetchResult, {
      policy: { maxAttempts: 1, pollingIntervalMs: 10 },
      wait: async () => {},
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TimeoutError);
    if (error instanceof TimeoutError) {
      expect(error.elapsedMs).toBeGreaterThanOrEqual(0);
      expect(error.message).toMatch(/Timed out waiting for result req-4 after 1 attempts/);
    }
  });

  it('treats an upstream error status as terminal', async () => {
    const fetchResult = stubFetch(1, (requestId) => ({ requestId, status: 'ERROR', score: null, models: [] }));

    const result = await pollResult('req-5', fetchResult, {
      policy: { maxAttempts: 10, pollingIntervalMs: 100 },
      wait: async () => {},
    });

    expect(result.status).toBe('ERROR');
    expect(fetchResult).toHaveBeenCalledTimes(2);
  });

  it('propagates fetch failures without retrying', async () => {
    const fetchResult = vi.fn().mockRejectedValue(new Error('boom'));

    await expect(
      pollResult('req-6', fetchResult, { policy: { maxAttempts: 5, pollingIntervalMs: 100 }, wait: async () => {} }),
    ).rejects.toThrow('boom');
    expect(fetchResult).toHaveBeenCalledTimes(1);
  });

  it('stops polling once the caller aborts', async () => {
    const controller = new AbortController();
    const fetchResult = stubFetch(10);
    const wait = vi.fn(async () => {
      controller.abort();
    });

    await expect(
      pollResult('req-7', fetchResult, {
        policy: { maxAttempts: 10, pollingIntervalMs: 100 },
        wait,
        signal: controller.signal,
      }),
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(fetchResult).toHaveBeenCalledTimes(1);
    expect(wait).toHaveBeenCalledTimes(1);
  });

  it('interrupts a pending sleep on abort', async () => {
    const controller = new AbortController();
    const fetchResult = stubFetch(10);

    const promise = pollResult('req-8', fetchResult, {
      policy: { maxAttempts: 10, pollingIntervalMs: 60_000 },
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 10);

    await expect(promise).rejects.toMatchObject({ name: 'AbortError' });
    expect(fetchResult).toHaveBeenCalledTimes(1);
  });
});

describe('pollUntilSettled', () => {
  it('uses the supplied pending check', async () => {
    const values = [3, 2, 1, 0];
    const fetch = vi.fn(async () => values.shift() ?? 0);

    const value = await pollUntilSettled({
      subject: 'countdown',
      fetch,
      isPending: (remaining) => remaining > 0,
      policy: { maxAttempts: 10, pollingIntervalMs: 1 },
      wait: async () => {},
    });

    expect(value).toBe(0);
    expect(fetch).toHaveBeenCalledTimes(4);
  });
});
