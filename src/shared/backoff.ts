export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  factor?: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Delay before retry number `retry` (0-based): base * factor^retry, capped.
 */
export function backoffDelay(policy: BackoffPolicy, retry: number): number {
  const factor = policy.factor ?? 2;
  const delay = policy.baseDelayMs * Math.pow(factor, retry);
  return Math.min(policy.maxDelayMs, Math.max(0, Math.round(delay)));
}
