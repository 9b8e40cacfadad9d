import { CancelledError, errorMessage, isRetryableLlmError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { ParseResponseError } from "./parse-json.js";

export type AttemptResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; reason: string };

export interface RetryOptions {
  maxAttempts: number;
  label: string;
  signal?: AbortSignal;
}

function isRetryable(error: unknown): boolean {
  return isRetryableLlmError(error) || error instanceof ParseResponseError;
}

/**
 * Runs `task` until it succeeds or `maxAttempts` retryable failures pile up.
 * Retries are immediate. Permanent failures and cancellation propagate.
 */
export async function attemptWithRetries<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<AttemptResult<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  let reason = "no attempts made";

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    try {
      const value = await task(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      reason = errorMessage(error);
      logger.warn("llm_attempt_failed", {
        label: options.label,
        attempt,
        max_attempts: maxAttempts,
        error_type: error instanceof Error ? error.name : "unknown",
        reason,
      });
    }
  }

  return { ok: false, attempts: maxAttempts, reason };
}
