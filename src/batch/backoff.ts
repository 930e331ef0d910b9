export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
  factor: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = { baseMs: 5_000, maxMs: 300_000, factor: 2 };

/**
 * Delay before retry number `attempt` (1-based) of a stage.
 * Exponential in the attempt number and capped at maxMs, so never decreasing.
 */
export function backoffDelayMs(policy: BackoffPolicy, attempt: number): number {
  if (attempt < 1) return 0;
  const raw = policy.baseMs * Math.pow(policy.factor, attempt - 1);
  return Math.min(policy.maxMs, Math.round(raw));
}
