export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";
export type { ErrorContext } from "./errors.js";

export {
  InputError,
  NotFoundError,
  RateLimitedError,
  CitationResolutionError,
  CollaboratorTransientError,
  CollaboratorPermanentError,
  LoggingFailure,
} from "./errors.js";

export {
  collaboratorErrorFromStatus,
  parseRetryAfter,
  toCollaboratorError,
} from "./collaborator.js";

export { createCircuitBreaker, isOpenCircuitError, OPEN_CIRCUIT_CODE } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry, isRetryable, calculateDelay, RetryPolicy } from "./retry.js";
export type { RetryOptions, RetryAttempt } from "./retry.js";
