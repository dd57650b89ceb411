import CircuitBreaker from "opossum";
import type { Logger } from "@papertrail/logger";

export interface CircuitBreakerOptions {
  /**
   * Milliseconds after which a call counts as failed, or false to rely on the
   * call's own timeout. Default: false
   */
  timeout?: number | false;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum calls in the rolling window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
}

const DEFAULT_OPTIONS: Required<CircuitBreakerOptions> = {
  timeout: false,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export const OPEN_CIRCUIT_CODE = "EOPENBREAKER";

export function isOpenCircuitError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === OPEN_CIRCUIT_CODE
  );
}

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
  logger?: Logger,
): CircuitBreaker<TArgs, TResult> {
  const breaker = new CircuitBreaker(fn, { ...DEFAULT_OPTIONS, ...options, name });

  breaker.on("open", () => {
    logger?.warn({ breaker: name }, "Circuit opened, calls are short-circuited");
  });

  breaker.on("halfOpen", () => {
    logger?.warn({ breaker: name }, "Circuit half-open, next call is a probe");
  });

  breaker.on("close", () => {
    logger?.info({ breaker: name }, "Circuit closed");
  });

  return breaker;
}
