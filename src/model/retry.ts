// pattern: Imperative Shell

/**
 * Retry logic shared across all model adapters.
 * Each adapter provides its own isRetryableError predicate.
 */

import type { RetryConfig } from "../config/schema.js";
import { ModelError } from "./types.js";

export const DEFAULT_RETRY_POLICY: RetryConfig = {
  enabled: true,
  max_retries: 3,
  initial_backoff_ms: 1000,
  max_backoff_ms: 30000,
  backoff_multiplier: 2,
};

export type RetryOptions = {
  policy?: RetryConfig;
  onError?: (error: unknown, attempt: number) => void;
  signal?: AbortSignal;
};

export function backoffDelay(policy: RetryConfig, attempt: number): number {
  return Math.min(
    policy.initial_backoff_ms * Math.pow(policy.backoff_multiplier, attempt),
    policy.max_backoff_ms,
  );
}

export function abortedError(): ModelError {
  return new ModelError("aborted", false, "model request aborted");
}

function sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * `policy.max_retries` is the total number of attempts, including the first.
 */
export async function callWithRetry<T>(
  fn: () => Promise<T>,
  isRetryableError: (error: unknown) => boolean,
  options: RetryOptions = {},
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const attempts = policy.enabled ? policy.max_retries : 1;
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    if (options.signal?.aborted) {
      throw abortedError();
    }

    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (options.onError) {
        options.onError(error, attempt);
      }

      if (options.signal?.aborted || !isRetryableError(error)) {
        throw error;
      }

      if (attempt < attempts - 1) {
        await sleep(backoffDelay(policy, attempt), options.signal);
      }
    }
  }

  throw lastError;
}
