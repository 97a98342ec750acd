import { DEFAULT_RETRY } from '../constants.js';
import type { RetryOptions } from '../types.js';

export type ResolvedRetry = Required<RetryOptions>;

export function resolveRetry(retry: RetryOptions = {}): ResolvedRetry {
  const pick = (value: number | undefined, fallback: number): number =>
    value !== undefined && Number.isFinite(value) && value >= 0 ? value : fallback;
  return {
    retries: Math.floor(pick(retry.retries, DEFAULT_RETRY.retries)),
    backoffMs: pick(retry.backoffMs, DEFAULT_RETRY.backoffMs),
    maxBackoffMs: pick(retry.maxBackoffMs, DEFAULT_RETRY.maxBackoffMs),
    jitter: Math.min(1, pick(retry.jitter, DEFAULT_RETRY.jitter)),
  };
}

/**
 * Delay before retry number `attempt` (1-based): exponential growth capped at
 * maxBackoffMs, then spread by ±jitter. `random` returns values in [0, 1).
 */
export function computeBackoffDelay(
  attempt: number,
  retry: ResolvedRetry,
  random: () => number = Math.random
): number {
  const exponential = Math.min(retry.backoffMs * 2 ** Math.max(0, attempt - 1), retry.maxBackoffMs);
  const spread = 1 - retry.jitter + 2 * retry.jitter * random();
  return Math.max(0, Math.round(Math.min(exponential * spread, retry.maxBackoffMs)));
}
