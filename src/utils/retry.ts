import { DEFAULT_CONFIG } from "../constants";
import { isRetryableGitError } from "../errors";

import type { RetryConfig } from "../types";

export interface RetryOptions extends RetryConfig {
  maxAttempts?: number;
  shouldRetry?: (error: unknown) => boolean;
  /** Called before waiting `delayMs` for the next attempt. Not called after the last one. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: DEFAULT_CONFIG.RETRY.PUBLISH_ATTEMPTS,
  initialDelayMs: DEFAULT_CONFIG.RETRY.DELAY_MS,
  maxDelayMs: DEFAULT_CONFIG.RETRY.MAX_DELAY_MS,
  backoffMultiplier: DEFAULT_CONFIG.RETRY.BACKOFF_MULTIPLIER,
  jitterMs: DEFAULT_CONFIG.RETRY.JITTER_MS,
  shouldRetry: isRetryableGitError,
  onRetry: () => {},
};

export function computeDelay(attempt: number, options: RetryConfig = {}): number {
  const initialDelayMs = options.initialDelayMs ?? DEFAULT_OPTIONS.initialDelayMs;
  const backoffMultiplier = options.backoffMultiplier ?? DEFAULT_OPTIONS.backoffMultiplier;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs;
  const jitterMs = options.jitterMs ?? DEFAULT_OPTIONS.jitterMs;

  const baseDelay = Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs);
  const jitter = jitterMs > 0 ? Math.random() * jitterMs : 0;
  return baseDelay + jitter;
}

/**
 * Runs `fn` until it resolves, a failure is not retryable, or `maxAttempts` is used up.
 * Only pull and push failures are retried unless `shouldRetry` says otherwise.
 * The last error is rethrown unchanged.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts: Required<RetryOptions> = {
    maxAttempts: options.maxAttempts ?? DEFAULT_OPTIONS.maxAttempts,
    initialDelayMs: options.initialDelayMs ?? DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_OPTIONS.backoffMultiplier,
    jitterMs: options.jitterMs ?? DEFAULT_OPTIONS.jitterMs,
    shouldRetry: options.shouldRetry ?? DEFAULT_OPTIONS.shouldRetry,
    onRetry: options.onRetry ?? DEFAULT_OPTIONS.onRetry,
  };
  let attempt = 1;

  while (true) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!opts.shouldRetry(error) || attempt >= opts.maxAttempts) {
        throw error;
      }

      const delay = computeDelay(attempt, opts);
      opts.onRetry(error, attempt, delay);

      await new Promise((resolve) => setTimeout(resolve, delay));
      attempt++;
    }
  }
}
