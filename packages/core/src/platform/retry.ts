import { TerminalResourceError, classifyResourceError, errorMessage } from "../errors.js";
import { sleep } from "../utils/async.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 16_000,
  jitterMs: 400
};

export interface RetryOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  /** Epoch ms after which no further attempt is started. */
  deadline?: number;
  random?: () => number;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export function computeBackoffMs(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const base = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  const jitter = Math.floor(random() * policy.jitterMs);
  return base + jitter;
}

/**
 * Runs `operation`, retrying transient resource errors with exponential
 * backoff. Terminal errors are rethrown as-is; exhausted transient errors are
 * rethrown as {@link TerminalResourceError}.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  let attempt = 0;

  while (true) {
    attempt += 1;
    try {
      return await operation(attempt);
    } catch (error) {
      if (classifyResourceError(error) === "terminal") {
        throw error;
      }

      if (attempt >= options.policy.maxAttempts) {
        throw new TerminalResourceError(
          `gave up after ${attempt} attempts: ${errorMessage(error)}`,
          { cause: error }
        );
      }

      const delayMs = computeBackoffMs(attempt, options.policy, options.random);
      if (options.deadline !== undefined && Date.now() + delayMs >= options.deadline) {
        throw new TerminalResourceError(
          `deadline reached after ${attempt} attempts: ${errorMessage(error)}`,
          { cause: error }
        );
      }

      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }
}
