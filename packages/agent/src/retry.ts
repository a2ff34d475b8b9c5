import debug from "debug";
import type { DispatchResult } from "@app/proto";

const debugRetry = debug("calbot:agent:retry");

/**
 * Caller-side retry policy for dispatch. Dispatch itself never retries.
 */
export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Base backoff delay in milliseconds */
  baseBackoffMs: number;
  /** Longest server-suggested delay (retryAfterMs) we are willing to wait */
  maxRetryAfterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseBackoffMs: 500,
  maxRetryAfterMs: 10_000,
};

/**
 * Calculate exponential backoff delay.
 *
 * @param attempt - Current retry number (1-indexed)
 */
export function calculateBackoff(
  attempt: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): number {
  return policy.baseBackoffMs * Math.pow(2, attempt - 1);
}

export interface RetryOptions {
  policy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run a dispatch, retrying only retryable backend errors with backoff.
 * A retryAfterMs hint replaces the backoff; a hint longer than the policy
 * allows ends the retries and the last result is returned.
 */
export async function withRetry(
  attempt: () => Promise<DispatchResult>,
  options: RetryOptions = {}
): Promise<DispatchResult> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const sleep = options.sleep ?? defaultSleep;

  let result = await attempt();
  for (let retry = 1; retry <= policy.maxRetries; retry++) {
    if (result.kind !== "backend_error" || !result.retryable) {
      return result;
    }

    let delayMs = calculateBackoff(retry, policy);
    if (result.retryAfterMs !== undefined) {
      if (result.retryAfterMs > policy.maxRetryAfterMs) {
        debugRetry(
          "Retry-after %dms exceeds limit, giving up",
          result.retryAfterMs
        );
        return result;
      }
      delayMs = result.retryAfterMs;
    }

    debugRetry(
      "Retry %d/%d after %s, waiting %dms",
      retry,
      policy.maxRetries,
      result.errorKind,
      delayMs
    );
    await sleep(delayMs);
    result = await attempt();
  }
  return result;
}
