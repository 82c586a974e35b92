import type { RetryConfig } from "../config";

export const DEFAULT_RETRY: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  exponentialBase: 2,
};

/** Delay before the retry that follows failed attempt `attempt` (0-indexed). */
export function computeBackoffDelay(attempt: number, policy: RetryConfig = DEFAULT_RETRY): number {
  const delay = policy.baseDelayMs * Math.pow(policy.exponentialBase, attempt);
  return Math.min(delay, policy.maxDelayMs);
}

export function totalAttempts(policy: RetryConfig = DEFAULT_RETRY): number {
  return Math.max(0, Math.floor(policy.maxRetries)) + 1;
}
