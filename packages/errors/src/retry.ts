import type { Logger } from "@papertrail/logger";
import { AppError } from "./app-error.js";
import { RateLimitedError } from "./errors.js";

export interface RetryOptions {
  /** Total attempts including the first call. Default: 3 */
  maxAttempts?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Fraction of the delay that is randomised, 0..1. Default: 0.5 */
  jitter?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Called before each retry sleep. */
  onRetry?: (info: RetryAttempt) => void;
}

export interface RetryAttempt {
  label: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "jitter">
> = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
  jitter: 0.5,
};

const NEVER_RETRIED_CODES: ReadonlySet<string> = new Set([
  "COLLABORATOR_PERMANENT",
  "LOGGING_FAILURE",
]);

/**
 * Determines whether an error is retryable.
 * 429 and 5xx are retried, other 4xx and permanent collaborator failures are not.
 */
export function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    if (NEVER_RETRIED_CODES.has(error.code)) {
      return false;
    }

    const clientError = error.statusCode >= 400 && error.statusCode < 500;
    if (clientError && error.statusCode !== 429) {
      return false;
    }

    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    return error.statusCode === 429 || error.statusCode >= 500;
  }

  // Non-AppError errors (network failures, unexpected errors) are retryable
  // unless a retryableErrors filter is specified
  if (retryableErrors && retryableErrors.length > 0) {
    const code =
      typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
    return typeof code === "string" && retryableErrors.includes(code);
  }

  return true;
}

/**
 * Exponential backoff with jitter.
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(1 - jitter, 1.0)
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitter: number,
  random: () => number = Math.random,
): number {
  const cappedDelay = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  const factor = 1 - jitter + random() * jitter;
  return Math.floor(cappedDelay * factor);
}

/**
 * Backoff for one failed attempt. A rate-limited collaborator's Retry-After
 * raises the wait, still bounded by `maxDelayMs`.
 */
function delayFor(error: unknown, calculatedMs: number, maxDelayMs: number): number {
  if (error instanceof RateLimitedError) {
    return Math.min(maxDelayMs, Math.max(calculatedMs, error.retryAfter * 1000));
  }
  return calculatedMs;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * The function receives the zero-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
  label = "operation",
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, jitter } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };
  const attempts = Math.max(1, maxAttempts);

  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      lastError = error;

      if (attempt + 1 >= attempts || !isRetryable(error, options?.retryableErrors)) {
        break;
      }

      const delayMs = delayFor(
        error,
        calculateDelay(attempt, baseDelayMs, maxDelayMs, jitter),
        maxDelayMs,
      );
      options?.onRetry?.({ label, attempt: attempt + 1, maxAttempts: attempts, delayMs, error });
      await sleep(delayMs);
    }
  }

  throw lastError;
}

/**
 * Reusable retry policy injected into every collaborator wrapper, so
 * attempt budgets and backoff are configured in one place.
 */
export class RetryPolicy {
  readonly options: Readonly<RetryOptions>;

  constructor(options?: RetryOptions, logger?: Logger) {
    this.options = {
      ...DEFAULT_RETRY_OPTIONS,
      ...options,
      onRetry:
        options?.onRetry ??
        (logger
          ? (info) => {
              logger.warn(
                {
                  label: info.label,
                  attempt: info.attempt,
                  maxAttempts: info.maxAttempts,
                  delayMs: info.delayMs,
                  err: info.error,
                },
                "Attempt failed, retrying",
              );
            }
          : undefined),
    };
  }

  get maxAttempts(): number {
    return this.options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts;
  }

  execute<T>(fn: (attempt: number) => Promise<T>, label?: string): Promise<T> {
    return withRetry(fn, this.options, label);
  }
}
