export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryAttempt = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;          // extra attempts after the first one; 0 disables retrying
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryAttempt & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryAttempt) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleep?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Delay before the next attempt: the decision's own delay when it gives a usable one,
 * otherwise exponential backoff from `minDelayMs`; both capped at `maxDelayMs`, then jittered.
 */
export const computeBackoffMs = (
  attemptIndex: number,
  decisionDelayMs: number | undefined,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const usableDecisionDelay =
    typeof decisionDelayMs === "number" && Number.isFinite(decisionDelayMs) && decisionDelayMs >= 0;
  const base = usableDecisionDelay
    ? Math.min(maxDelayMs, decisionDelayMs)
    : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attemptIndex));
  return base + Math.floor(base * clamp01(jitterRatio) * clamp01(randomFn()));
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, sleep: wait = sleep } = opts;
  const maxAttempts = retries + 1;

  for (let attemptIndex = 0; ; attemptIndex += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized = typeof decision === "boolean" ? { retry: decision, delayMs: undefined } : decision;
      if (attemptIndex >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attemptIndex + 1, maxAttempts, error: err });
        throw err;
      }

      const delayMs = computeBackoffMs(attemptIndex, normalized.delayMs, opts);
      onRetry?.({ attempt: attemptIndex + 1, maxAttempts, delayMs, error: err });
      await wait(delayMs);
    }
  }
};
