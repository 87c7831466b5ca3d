/**
 * Bounded retry with linear backoff
 *
 * Every remote call in the poller (station API and sheets backend) runs
 * through `withRetry`: a fixed number of attempts with a wait proportional
 * to the attempt number, one structured log event per attempt, and a result
 * object instead of a thrown error once the budget is spent.
 */

import { errorMessage } from "../errors.js";
import { sleep as defaultSleep } from "./sleep.js";

import type { Logger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export interface RetryPolicy {
  /** Attempts after the first one */
  maxRetries: number;
  /** Multiplier applied to the attempt number */
  stepMs: number;
  /** Retry right after the first failure, then `stepMs`, `2 * stepMs`, ... */
  immediateFirstRetry: boolean;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: string; attempts: number };

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  policy: RetryPolicy;
  /** Name used in log events */
  operation: string;
  logger: Logger;
  sleep?: SleepFn;
  /** Returning false ends the loop on that error */
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

// ============================================================================
// Policies
// ============================================================================

const DEFAULT_STEP_MS = 10_000;

/** Station API: 4 attempts, waits of 0s, 10s, 20s */
export const FETCH_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  stepMs: DEFAULT_STEP_MS,
  immediateFirstRetry: true,
};

/** Sheets backend: 4 attempts, waits of 10s, 20s, 30s */
export const STORE_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  stepMs: DEFAULT_STEP_MS,
  immediateFirstRetry: false,
};

export function withStep(policy: RetryPolicy, stepMs: number): RetryPolicy {
  return { ...policy, stepMs };
}

/**
 * Wait before retrying after the given 1-based attempt failed.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const factor = policy.immediateFirstRetry ? attempt - 1 : attempt;
  return policy.stepMs * Math.max(factor, 0);
}

// ============================================================================
// Retry Loop
// ============================================================================

export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const { policy, operation, logger, signal } = options;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = policy.maxRetries + 1;
  let lastError = "no attempt made";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await task(attempt);
      logger.debug(
        { operation, attempt, maxAttempts, outcome: "success", waitMs: 0 },
        "Attempt succeeded"
      );
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = errorMessage(error);

      const retryable = options.shouldRetry?.(error) ?? true;
      if (!retryable || attempt === maxAttempts) {
        logger.error(
          {
            operation,
            attempt,
            maxAttempts,
            outcome: "exhausted",
            waitMs: 0,
            error: lastError,
          },
          retryable
            ? `Giving up on ${operation} after ${String(attempt)} attempts`
            : `Giving up on ${operation}: error is not retryable`
        );
        return { ok: false, error: lastError, attempts: attempt };
      }

      if (signal?.aborted === true) {
        logger.warn(
          { operation, attempt, maxAttempts, outcome: "aborted", waitMs: 0 },
          `Retry of ${operation} aborted`
        );
        return { ok: false, error: lastError, attempts: attempt };
      }

      const waitMs = backoffDelay(policy, attempt);
      logger.warn(
        {
          operation,
          attempt,
          maxAttempts,
          outcome: "retry",
          waitMs,
          error: lastError,
        },
        `Attempt ${String(attempt)} of ${operation} failed, retrying`
      );

      if (waitMs > 0) {
        await sleep(waitMs, signal);
        if (signal?.aborted) {
          logger.warn(
            { operation, attempt, maxAttempts, outcome: "aborted", waitMs },
            `Retry of ${operation} aborted`
          );
          return { ok: false, error: lastError, attempts: attempt };
        }
      }
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}
