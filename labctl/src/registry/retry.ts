import type { RetryConfig } from "../types/config.js";
import { TransientServiceError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";

const log = createLogger("retry");

export type RetryOptions = {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  jitter: boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  factor: 2,
  jitter: true,
};

export function retryOptionsFromConfig(config: RetryConfig): RetryOptions {
  return {
    maxAttempts: config.max_attempts,
    baseDelayMs: config.base_delay_ms,
    maxDelayMs: config.max_delay_ms,
    factor: config.factor,
    jitter: config.jitter,
  };
}

/**
 * Delay before retry number `attempt` (0-based): exponential, capped, with
 * optional ±25% jitter.
 */
export function calculateDelay(attempt: number, opts: RetryOptions): number {
  let delay = Math.min(opts.baseDelayMs * Math.pow(opts.factor, attempt), opts.maxDelayMs);
  if (opts.jitter) {
    const range = delay * 0.25;
    delay = delay - range + (opts.random ?? Math.random)() * range * 2;
  }
  return Math.round(delay);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying on TransientServiceError only. Auth, not-found and every
 * other error propagate on the first throw.
 */
export async function withRetry<T>(operation: string, fn: () => Promise<T>, opts: RetryOptions = DEFAULT_RETRY): Promise<T> {
  const wait = opts.sleep ?? sleep;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (e) {
      if (!(e instanceof TransientServiceError) || attempt + 1 >= opts.maxAttempts) throw e;
      const delayMs = calculateDelay(attempt, opts);
      log.warn({ operation, attempt: attempt + 1, delayMs, error: e.message }, "transient failure, retrying");
      await wait(delayMs);
    }
  }
}
