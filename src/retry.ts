import { setTimeout as sleep } from "node:timers/promises";
import pTimeout, { TimeoutError } from "p-timeout";
import { EmbeddingUnavailable } from "./errors";

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles each time. */
  baseDelayMs: number;
  /** Upper bound for a single delay. */
  maxDelayMs: number;
  /** Per-attempt time limit; 0 disables it. */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 4000,
  timeoutMs: 30_000,
};

/** Delay before attempt `attempt + 1` (attempt is 1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Call `op` until it succeeds, retrying only {@link EmbeddingUnavailable}
 * (timeouts included) with exponential backoff. Any other error, an abort, or
 * the last failed attempt propagates unchanged.
 */
export async function withEmbeddingRetry<T>(
  op: () => Promise<T>,
  policy: RetryPolicy,
  opts: {
    signal?: AbortSignal;
    label?: string;
    onRetry?: (attempt: number, error: EmbeddingUnavailable) => void;
  } = {},
): Promise<T> {
  const { signal, label = "embedding" } = opts;
  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      const pending = op();
      return policy.timeoutMs > 0
        ? await pTimeout(pending, {
            milliseconds: policy.timeoutMs,
            message: `${label} timed out after ${policy.timeoutMs}ms`,
          })
        : await pending;
    } catch (e) {
      const error =
        e instanceof TimeoutError ? new EmbeddingUnavailable(e.message, { cause: e }) : e;
      if (!(error instanceof EmbeddingUnavailable) || signal?.aborted) throw error;
      if (attempt >= policy.maxAttempts) throw error;
      opts.onRetry?.(attempt, error);
      await sleep(backoffDelay(policy, attempt), undefined, { signal });
    }
  }
}
