export interface BackoffOptions {
  initialIntervalMs?: number;
  multiplier?: number;
  maxIntervalMs?: number;
  /** Fraction of the delay used as ± random jitter. */
  jitterRatio?: number;
}

// Delay before retry number `attempt` (1-indexed) of a failed task body.
// Defaults give 1s → 4s → 16s → 60s cap, ±10%.
export function calculateBackOff(attempt: number, opts: BackoffOptions = {}): number {
  const {
    initialIntervalMs = 1000,
    multiplier = 4.0,
    maxIntervalMs = 60000,
    jitterRatio = 0.1,
  } = opts;

  const delay = Math.min(initialIntervalMs * Math.pow(multiplier, Math.max(0, attempt - 1)), maxIntervalMs);
  const jitter = delay * jitterRatio;
  return Math.max(0, Math.floor(delay + (Math.random() * jitter * 2 - jitter)));
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
