import { CallPolicyConfig } from "../config/app.config";
import { ProviderTimeoutError } from "../errors/errors";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetriesExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`,
      { cause: lastError }
    );
    this.name = "RetriesExhaustedError";
  }
}

export function backoffDelay(policy: CallPolicyConfig, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

/**
 * Rejects with ProviderTimeoutError when `task` has not settled within `timeoutMs`.
 * A task that settles after the deadline is ignored.
 */
export function withTimeout<T>(task: () => Promise<T>, timeoutMs: number, provider: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new ProviderTimeoutError(provider, timeoutMs)), timeoutMs);
    task().then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

export interface CallOptions {
  provider: string;
  /** Runs before every attempt, e.g. a rate-limiter slot. */
  beforeAttempt?: () => Promise<void>;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  sleep?: Sleep;
}

/**
 * Runs `task` with a per-attempt timeout, retrying up to `maxRetries` times
 * with exponential backoff (base × 2^attempt, capped at maxDelayMs).
 */
export async function callWithPolicy<T>(
  task: () => Promise<T>,
  policy: CallPolicyConfig,
  options: CallOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (attempt > 0) {
      const delayMs = backoffDelay(policy, attempt - 1);
      options.onRetry?.(attempt, lastError, delayMs);
      if (delayMs > 0) await wait(delayMs);
    }

    try {
      if (options.beforeAttempt) await options.beforeAttempt();
      return await withTimeout(task, policy.timeoutMs, options.provider);
    } catch (error) {
      lastError = error;
    }
  }

  throw new RetriesExhaustedError(policy.maxRetries + 1, lastError);
}
