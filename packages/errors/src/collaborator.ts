import { AppError } from "./app-error.js";
import {
  CollaboratorPermanentError,
  CollaboratorTransientError,
  NotFoundError,
  RateLimitedError,
} from "./errors.js";

const DEFAULT_RETRY_AFTER_SECONDS = 1;

/**
 * Map an HTTP status from a collaborator onto the error taxonomy.
 * Rate limits and missing resources stay distinguishable from transient failure.
 */
export function collaboratorErrorFromStatus(
  service: string,
  status: number,
  message: string,
  retryAfterSeconds?: number,
): AppError {
  const details = { service, status };

  if (status === 404) {
    return new NotFoundError(`${service}: ${message}`, { details });
  }
  if (status === 429) {
    return new RateLimitedError(
      `${service}: ${message}`,
      retryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS,
      { details },
    );
  }
  if (status === 408 || status >= 500) {
    return new CollaboratorTransientError(`${service}: ${message}`, service, { details });
  }
  return new CollaboratorPermanentError(`${service}: ${message}`, service, { details });
}

/** Parse a Retry-After header given in seconds. HTTP-date values are ignored. */
export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Normalize anything thrown by a collaborator call. AppErrors pass through;
 * timeouts and unrecognised failures (DNS, socket resets) count as transient.
 */
export function toCollaboratorError(service: string, error: unknown): AppError {
  if (AppError.isAppError(error)) {
    return error;
  }
  if (isTimeout(error)) {
    return new CollaboratorTransientError(`${service}: request timed out`, service, {
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CollaboratorTransientError(`${service}: ${message}`, service, { cause: error });
}
