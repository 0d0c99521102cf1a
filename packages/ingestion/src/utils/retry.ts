import { RetryExhaustedError } from '../errors.js';

export type RetryPolicy = Readonly<{
  maxAttempts: number;
  baseMs: number;
  factor: number;
  maxMs: number;
  jitterRatio?: number;
}>;

export type RetryOptions = {
  policy: RetryPolicy;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

/**
 * Delay to wait after the given (1-based) failed attempt:
 * `baseMs * factor^(attempt - 1)`, capped at `maxMs`, with optional jitter.
 */
export function computeExponentialBackoff(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));
  const rawDelay = policy.baseMs * Math.pow(policy.factor, normalizedAttempt - 1);
  const cappedDelay = clamp(rawDelay, policy.baseMs, policy.maxMs);

  const jitterRatio = policy.jitterRatio ?? 0;
  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const jitterSpan = cappedDelay * jitterRatio;
  const jitter = (random() * 2 - 1) * jitterSpan;
  return Math.round(clamp(cappedDelay + jitter, policy.baseMs, policy.maxMs));
}

/**
 * Runs `operation` until it resolves or the policy runs out of attempts.
 * Errors rejected by `shouldRetry` are rethrown as-is; exhaustion throws
 * RetryExhaustedError with the last error as its cause.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, shouldRetry, onRetry, random } = options;
  const sleep = options.sleep ?? delay;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (shouldRetry && !shouldRetry(err, attempt)) {
        throw err;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, err);
      }
      const waitMs = computeExponentialBackoff(attempt, policy, random);
      onRetry?.(err, attempt, waitMs);
      await sleep(waitMs);
    }
  }
}
