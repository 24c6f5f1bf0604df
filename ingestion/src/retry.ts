import { extractErrorMessage, type Logger } from "poster-engine";
import type { Clock } from "./clock.js";

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  backoffFactor: number;
}

export const defaultRetryConfig: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  backoffFactor: 2,
};

export type RetryDecision = { retry: false } | { retry: true; extraDelayMs?: number };

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempt(s): ${extractErrorMessage(cause)}`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

export function backoffDelay(attempt: number, config: RetryConfig): number {
  return config.baseDelayMs * Math.pow(config.backoffFactor, attempt - 1);
}

/**
 * Run `fn` until it succeeds, `classify` says stop, or attempts run out.
 * Non-retryable errors are rethrown as is; exhaustion raises RetryExhaustedError.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  classify: (error: unknown) => RetryDecision,
  options: { config?: Partial<RetryConfig>; clock: Clock; logger?: Logger; label?: string }
): Promise<T> {
  const config: RetryConfig = { ...defaultRetryConfig, ...options.config };
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const decision = classify(error);
      if (!decision.retry) throw error;
      if (attempt >= config.maxAttempts) throw new RetryExhaustedError(attempt, error);
      const delayMs = backoffDelay(attempt, config) + (decision.extraDelayMs ?? 0);
      options.logger?.warn(
        { attempt, maxAttempts: config.maxAttempts, delayMs, err: extractErrorMessage(error) },
        `${options.label ?? "request"} failed, retrying`
      );
      await options.clock.sleep(delayMs);
    }
  }
}
