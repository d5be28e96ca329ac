/**
 * Retry with exponential backoff for transient orchestrator faults.
 *
 * Only errors the predicate marks transient are retried; everything else
 * propagates on the first throw. The last transient error is rethrown once
 * the attempt budget is spent.
 */

import { isOrchestratorError } from "../errors/index.js";
import type { BackoffSettings } from "../config/orchestrator/schema.js";
import type { Logger } from "../logging/index.js";

const BACKOFF_MULTIPLIER = 2;

export interface RetryOptions extends BackoffSettings {
  /** Label used in log lines (e.g. "store put resolved/editing/tone") */
  readonly context?: string;
  /** Decides whether an error is worth retrying (default: transient orchestrator errors) */
  readonly shouldRetry?: (error: unknown) => boolean;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
  /** Replaces the timer-based sleep; tests pass a no-op */
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Default retry predicate: orchestrator errors flagged transient.
 */
export function isTransientError(error: unknown): boolean {
  return isOrchestratorError(error) && error.transient;
}

/**
 * Delay before retry number `retry` (0-based), capped at maxDelayMs.
 * Jitter keeps concurrent runs from retrying in lockstep.
 */
export function calculateDelay(
  retry: number,
  initialDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const capped = Math.min(initialDelayMs * Math.pow(BACKOFF_MULTIPLIER, retry), maxDelayMs);
  const jitter = capped * 0.25 * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

/**
 * Sleep for `ms`, rejecting early with the signal's reason when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Execute `fn`, retrying transient failures with exponential backoff.
 *
 * @example
 * const entry = await retryWithBackoff(() => store.get(runId, key), {
 *   ...config.storeRetry,
 *   context: "load payload",
 * });
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const delay = calculateDelay(attempt - 1, options.initialDelayMs, options.maxDelayMs);
      options.logger?.warn("Transient failure, retrying", {
        context: options.context,
        attempt,
        maxAttempts: options.maxAttempts,
        delayMs: delay,
        error: error instanceof Error ? error.message : String(error),
      });
      await wait(delay, options.signal);
    }
  }
}
