import { DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_ATTEMPTS, DEFAULT_MAX_DELAY_MS } from '../constants';

export interface RetryPolicy {
  /** Total number of attempts, the first one included */
  maxAttempts: number;
  /** Delay before the second attempt, doubled on each further attempt */
  baseDelayMs: number;
  /** Upper bound of a single delay */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  baseDelayMs: DEFAULT_BASE_DELAY_MS,
  maxDelayMs: DEFAULT_MAX_DELAY_MS,
};

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  return {
    maxAttempts: Math.max(1, Math.floor(policy.maxAttempts)),
    baseDelayMs: Math.max(0, policy.baseDelayMs),
    maxDelayMs: Math.max(0, policy.maxDelayMs),
  };
}

/**
 * Delay to wait after the given failed attempt (1-based).
 * Exponential backoff: 100ms, 200ms, 400ms, ... capped at maxDelayMs
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export function isRetryableStatus(status: number): boolean {
  return status >= 500 && status <= 599;
}
