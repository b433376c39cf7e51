import type { Clock, FailureCounter } from '../types.js';

export const DEFAULT_BACKOFF_BASE_MS = 2_000;
export const DEFAULT_BACKOFF_MAX_MS = 30_000;

export type BackoffOptions = {
  baseDelayMs?: number;
  maxDelayMs?: number;
  clock?: Clock;
};

/**
 * Delay after the `failures`-th consecutive failure: base, 2·base, 4·base, … capped at max.
 * With the defaults this yields 2s, 4s, 8s, 16s, 30s, 30s, …
 */
export function computeBackoffDelay(
  failures: number,
  baseDelayMs = DEFAULT_BACKOFF_BASE_MS,
  maxDelayMs = DEFAULT_BACKOFF_MAX_MS
): number {
  if (failures <= 0) {
    return 0;
  }
  const exponent = Math.min(failures - 1, 30);
  return Math.min(baseDelayMs * 2 ** exponent, maxDelayMs);
}

export class BackoffController {
  private readonly counters = new Map<string, FailureCounter>();
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly clock: Clock;

  constructor(options: BackoffOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_BACKOFF_MAX_MS;
    this.clock = options.clock ?? Date.now;
  }

  recordFailure(cameraId: string, now = this.clock()): FailureCounter {
    const previous = this.counters.get(cameraId);
    const consecutiveFailures = (previous?.consecutiveFailures ?? 0) + 1;
    const delayMs = computeBackoffDelay(consecutiveFailures, this.baseDelayMs, this.maxDelayMs);
    const counter: FailureCounter = {
      cameraId,
      consecutiveFailures,
      nextRetryAt: now + delayMs
    };
    this.counters.set(cameraId, counter);
    return { ...counter };
  }

  recordSuccess(cameraId: string) {
    this.counters.set(cameraId, { cameraId, consecutiveFailures: 0, nextRetryAt: null });
  }

  mayAttempt(cameraId: string, now = this.clock()): boolean {
    const counter = this.counters.get(cameraId);
    if (!counter || counter.nextRetryAt === null) {
      return true;
    }
    return now >= counter.nextRetryAt;
  }

  getCounter(cameraId: string): FailureCounter {
    const counter = this.counters.get(cameraId);
    return counter ? { ...counter } : { cameraId, consecutiveFailures: 0, nextRetryAt: null };
  }
}
